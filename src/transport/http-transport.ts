import { CancelledError, TimeoutError, TransportError } from '../errors/index.js';
import { isRecord } from '../types/common.js';
import type { BodyEncoding, HttpMethod, QueryValue } from '../types/common.js';

/**
 * A request as handed to the transport, headers already merged
 */
export interface TransportRequest {
  method: HttpMethod;
  /** Relative to the base URL, or absolute */
  path: string;
  params?: Readonly<Record<string, QueryValue>>;
  headers: Record<string, string>;
  body?: unknown;
  bodyEncoding: BodyEncoding;
}

/**
 * Any HTTP response, successful or not. Header names are lower-case.
 */
export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: unknown;
}

/**
 * The capability to perform one HTTP exchange.
 *
 * Resolves for every HTTP status. Rejects with TransportError on connection
 * failures, TimeoutError when the per-attempt timeout fires, and
 * CancelledError when `signal` aborts.
 */
export interface Transport {
  send(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse>;
}

export interface FetchTransportOptions {
  baseUrl: string;
  /** Per-attempt timeout in milliseconds */
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

const ABSOLUTE_URL = /^https?:\/\//i;

/**
 * Resolves a request path against the base URL and appends query parameters
 */
export function buildUrl(
  baseUrl: string,
  path: string,
  params?: Readonly<Record<string, QueryValue>>
): string {
  const url = ABSOLUTE_URL.test(path)
    ? new URL(path)
    : new URL(`${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`);

  if (params) {
    for (const [name, value] of Object.entries(params)) {
      url.searchParams.set(name, String(value));
    }
  }
  return url.toString();
}

/**
 * Encodes a request body and returns the content type it needs
 */
export function encodeBody(
  body: unknown,
  encoding: BodyEncoding
): { payload: string; contentType: string } | undefined {
  if (body === undefined || body === null) {
    return undefined;
  }

  if (encoding === 'json') {
    return { payload: JSON.stringify(body), contentType: 'application/json' };
  }

  if (typeof body === 'string') {
    return { payload: body, contentType: 'application/x-www-form-urlencoded' };
  }

  const form = new URLSearchParams();
  if (isRecord(body)) {
    for (const [name, value] of Object.entries(body)) {
      if (value === undefined || value === null) continue;
      if (Array.isArray(value)) {
        value.forEach(item => form.append(name, String(item)));
      } else {
        form.append(name, String(value));
      }
    }
  }
  return { payload: form.toString(), contentType: 'application/x-www-form-urlencoded' };
}

/**
 * Implementation of Transport using the Fetch API
 */
export class FetchTransport implements Transport {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FetchTransportOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch;
  }

  async send(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse> {
    if (signal?.aborted) {
      throw new CancelledError();
    }

    const url = buildUrl(this.baseUrl, request.path, request.params);
    const encoded = encodeBody(request.body, request.bodyEncoding);

    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(request.headers)) {
      if (encoded && name.toLowerCase() === 'content-type') continue;
      headers[name] = value;
    }
    if (encoded) {
      headers['Content-Type'] = encoded.contentType;
    }

    const controller = new AbortController();
    let timedOut = false;

    // Set up timeout
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await this.fetchImpl(url, {
        method: request.method,
        headers,
        body: encoded?.payload,
        signal: controller.signal,
      });

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, name) => {
        responseHeaders[name.toLowerCase()] = value;
      });

      const text = await response.text();
      return {
        status: response.status,
        headers: responseHeaders,
        body: parseBody(text, responseHeaders['content-type']),
      };
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      if (signal?.aborted) {
        throw new CancelledError('Request was cancelled', { cause });
      }
      if (timedOut) {
        throw new TimeoutError(`Request timeout after ${this.timeoutMs}ms`, { cause });
      }
      throw new TransportError(
        cause ? `Network request failed: ${cause.message}` : 'Network request failed',
        { cause }
      );
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

function parseBody(text: string, contentType: string | undefined): unknown {
  if (text.length === 0) {
    return undefined;
  }

  const looksJson = (contentType?.includes('json') ?? false) || /^\s*[[{]/.test(text);
  if (!looksJson) {
    return text;
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    // Unparseable JSON is handed back as text
    return text;
  }
}

/**
 * Creates a fetch-based transport instance
 */
export function createTransport(options: FetchTransportOptions): Transport {
  return new FetchTransport(options);
}
