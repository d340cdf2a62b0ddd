import { TransportError } from '../types/error.js';
import { mapFetchFailure, mapHttpError } from './error-mapping.js';

export const DEFAULT_TIMEOUT_MS = 60_000;

export type FetchOptions = {
  readonly url: string;
  readonly method?: string;
  readonly headers?: Record<string, string>;
  readonly body?: unknown;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
};

export type FetchResult = {
  readonly response: globalThis.Response;
  readonly body: unknown;
};

/**
 * Runs `fetch` with a timeout linked to the caller's signal. `consume` runs
 * before the timer is cleared, so for JSON replies the timeout also covers
 * reading the body. With `keepLinked`, a successful call leaves the caller's
 * signal attached so it can still abort the body read; otherwise the link is
 * removed when the call settles.
 */
async function fetchWith<T>(
  options: FetchOptions,
  consume: (response: globalThis.Response) => Promise<T>,
  keepLinked = false,
): Promise<T> {
  const {
    url,
    method = 'GET',
    headers: customHeaders = {},
    body: bodyData,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    signal: externalSignal,
  } = options;

  if (externalSignal?.aborted) {
    throw new TransportError('Signal was already aborted', 'aborted');
  }

  const timeoutController = new AbortController();
  const linked = linkSignals(externalSignal, timeoutController.signal);
  let settledOk = false;

  let timeoutId: ReturnType<typeof setTimeout> | null = null;
  if (timeoutMs > 0) {
    timeoutId = setTimeout(() => {
      timeoutController.abort();
    }, timeoutMs);
  }

  try {
    const mergedHeaders: Record<string, string> = {
      'Content-Type': 'application/json',
      ...customHeaders,
    };

    const body = bodyData !== undefined ? JSON.stringify(bodyData) : undefined;

    let response: globalThis.Response;
    try {
      response = await fetch(url, {
        method,
        headers: mergedHeaders,
        body,
        signal: linked.signal,
      });
    } catch (err) {
      throw mapFetchFailure(err, timeoutController.signal.aborted);
    }

    if (!response.ok) {
      const text = await response.text();
      throw mapHttpError({
        statusCode: response.status,
        body: text,
        headers: response.headers,
      });
    }

    let result: T;
    try {
      result = await consume(response);
    } catch (err) {
      throw mapFetchFailure(err, timeoutController.signal.aborted);
    }
    settledOk = true;
    return result;
  } finally {
    if (timeoutId !== null) {
      clearTimeout(timeoutId);
    }
    if (!(keepLinked && settledOk)) {
      linked.unlink();
    }
  }
}

/**
 * Decodes a reply body. JSON when the body parses as JSON; plain text when
 * the server did not claim JSON; an empty body becomes `{}`.
 */
async function decodeBody(response: globalThis.Response): Promise<unknown> {
  const text = await response.text();
  if (text.trim() === '') {
    return {};
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    const contentType = response.headers.get('Content-Type') ?? '';
    if (!contentType.includes('json')) {
      return text;
    }
    throw new TransportError('response body is not valid JSON', 'decode', {
      body: text,
      cause: err instanceof Error ? err : undefined,
    });
  }
}

/**
 * Fetches with timeout support, header merging, and JSON body serialization.
 * Returns both the raw response and the decoded body.
 */
export async function fetchWithTimeout(options: FetchOptions): Promise<FetchResult> {
  return fetchWith(options, async (response) => ({
    response,
    body: await decodeBody(response),
  }));
}

/**
 * Fetches and returns the raw Response object for streaming. The timeout
 * covers the wait for response headers only.
 */
export async function fetchStream(options: FetchOptions): Promise<globalThis.Response> {
  return fetchWith(options, async (response) => response, true);
}

type LinkedSignal = {
  readonly signal: AbortSignal;
  /** Detaches the listener left on the caller's signal. */
  readonly unlink: () => void;
};

/**
 * Links two abort signals so that either one being aborted triggers the target.
 */
function linkSignals(
  externalSignal: AbortSignal | undefined,
  targetSignal: AbortSignal,
): LinkedSignal {
  if (!externalSignal) {
    return { signal: targetSignal, unlink: () => {} };
  }

  if (externalSignal.aborted) {
    return { signal: externalSignal, unlink: () => {} };
  }

  const controller = new AbortController();
  const onExternalAbort = (): void => controller.abort();

  externalSignal.addEventListener('abort', onExternalAbort, { once: true });
  targetSignal.addEventListener('abort', () => controller.abort(), { once: true });

  return {
    signal: controller.signal,
    unlink: () => externalSignal.removeEventListener('abort', onExternalAbort),
  };
}
