import { vi } from 'vitest';
import { CancelledError } from '../errors/index.js';
import type { Transport, TransportRequest, TransportResponse } from '../transport/http-transport.js';

/**
 * Builds a transport response
 */
export function response(
  status: number,
  body?: unknown,
  headers: Record<string, string> = {}
): TransportResponse {
  return { status, body, headers };
}

function createSendMock() {
  return vi.fn(async (_request: TransportRequest, _signal?: AbortSignal): Promise<TransportResponse> =>
    response(200, {})
  );
}

export interface MockTransport extends Transport {
  send: ReturnType<typeof createSendMock>;
}

/**
 * Transport that plays back `script` in order, repeating the last entry.
 * Errors in the script are thrown.
 */
export function createMockTransport(...script: Array<TransportResponse | Error>): MockTransport {
  const send = createSendMock();
  let index = 0;

  if (script.length > 0) {
    send.mockImplementation(async () => {
      const next = script[Math.min(index, script.length - 1)];
      index++;
      if (next instanceof Error) {
        throw next;
      }
      return next;
    });
  }

  return { send };
}

/**
 * Transport whose calls never settle until their signal aborts
 */
export function createHangingTransport(): MockTransport {
  const send = createSendMock();
  send.mockImplementation(
    (_request: TransportRequest, signal?: AbortSignal) =>
      new Promise<TransportResponse>((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(new CancelledError()), { once: true });
      })
  );
  return { send };
}

/**
 * Transport answering per path, 404 for anything unknown
 */
export function createRoutingTransport(routes: Record<string, TransportResponse>): MockTransport {
  const send = createSendMock();
  send.mockImplementation(async (request: TransportRequest) =>
    routes[request.path] ?? response(404, { detail: 'Not found.' })
  );
  return { send };
}
