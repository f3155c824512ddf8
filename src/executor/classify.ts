import { ErrorKind, fromStatus, toBrokerageError } from '../errors/index.js';
import type { TransportResponse } from '../transport/http-transport.js';
import type { AttemptOutcome } from '../types/common.js';

/**
 * Maps a transport response to the closed outcome set
 */
export function classifyResponse(response: TransportResponse, group: string): AttemptOutcome {
  if (response.status >= 200 && response.status < 300) {
    return { type: 'success', response: response.body };
  }

  const error = fromStatus(response.status, response.body, response.headers, group);
  return error.isRetryable
    ? { type: 'retryable_failure', error }
    : { type: 'fatal_failure', error };
}

/**
 * Maps a thrown value to the closed outcome set
 */
export function classifyError(thrown: unknown, group: string): AttemptOutcome {
  const error = toBrokerageError(thrown, group);

  if (error.kind === ErrorKind.Cancelled) {
    return { type: 'cancelled', error };
  }
  return error.isRetryable
    ? { type: 'retryable_failure', error }
    : { type: 'fatal_failure', error };
}

/**
 * True for a 401 answer, which earns one forced credential refresh
 */
export function isAuthRejection(outcome: AttemptOutcome): boolean {
  return outcome.type === 'fatal_failure'
    && outcome.error.kind === ErrorKind.ClientError
    && outcome.error.status === 401;
}
