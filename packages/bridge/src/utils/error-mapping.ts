import { TransportError } from '../types/error.js';

export type MapHttpErrorOptions = {
  readonly statusCode: number;
  readonly body: string;
  readonly headers: Headers;
};

/**
 * Parses the Retry-After header from response headers.
 * Returns milliseconds, or null if header is not present.
 *
 * - Numeric value (seconds): parsed as int and converted to ms
 * - HTTP date string: computed as delta from now in ms
 */
export function parseRetryAfter(headers: Headers): number | null {
  const retryAfter = headers.get('Retry-After');
  if (!retryAfter) {
    return null;
  }

  if (/^\d+$/.test(retryAfter)) {
    return Number(retryAfter) * 1000;
  }

  const retryDate = new Date(retryAfter);
  if (!isNaN(retryDate.getTime())) {
    return Math.max(0, retryDate.getTime() - Date.now());
  }

  return null;
}

function statusLabel(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'Bad request';
    case 401:
      return 'Authentication failed';
    case 403:
      return 'Access denied';
    case 404:
      return 'Resource not found';
    case 413:
      return 'Payload too large';
    case 422:
      return 'Unprocessable entity';
    case 429:
      return 'Rate limit exceeded';
    default:
      return statusCode >= 500 ? 'Server error' : `HTTP ${statusCode}`;
  }
}

/**
 * Wraps a non-2xx upstream reply. Status code, body text and Retry-After are
 * kept on the error so callers can decide whether to retry.
 */
export function mapHttpError(options: MapHttpErrorOptions): TransportError {
  const { statusCode, body, headers } = options;
  return new TransportError(`${statusLabel(statusCode)} (${statusCode}): ${body}`, 'http-status', {
    statusCode,
    body,
    retryAfterMs: parseRetryAfter(headers),
  });
}

function isAbortError(err: unknown): err is Error {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

/**
 * Classifies a failure thrown by fetch or by reading a response body.
 * `timedOut` tells a timeout apart from a caller-initiated abort.
 */
export function mapFetchFailure(err: unknown, timedOut: boolean): TransportError {
  if (err instanceof TransportError) {
    return err;
  }
  const cause = err instanceof Error ? err : undefined;
  if (timedOut) {
    return new TransportError('request timed out', 'timeout', { cause });
  }
  if (isAbortError(err)) {
    return new TransportError('request was aborted', 'aborted', { cause });
  }
  return new TransportError(
    `connection failed: ${cause?.message ?? String(err)}`,
    'connection',
    { cause },
  );
}
