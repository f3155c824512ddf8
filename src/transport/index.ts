export {
  FetchTransport,
  buildUrl,
  encodeBody,
  createTransport,
  type Transport,
  type TransportRequest,
  type TransportResponse,
  type FetchTransportOptions,
} from './http-transport.js';
