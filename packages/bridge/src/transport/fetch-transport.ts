import type { Transport, TransportCall } from '../types/index.js';
import { fetchStream, fetchWithTimeout, DEFAULT_TIMEOUT_MS } from '../utils/http.js';
import { createLineStream, createSSEStream, type SSEEvent } from '../utils/sse.js';

export type FetchTransportOptions = {
  readonly timeoutMs?: number;
};

const LINE_DELIMITED_TYPES = ['application/x-ndjson', 'application/jsonl', 'application/json'];

function isLineDelimited(response: globalThis.Response): boolean {
  const contentType = response.headers.get('Content-Type')?.toLowerCase() ?? '';
  return LINE_DELIMITED_TYPES.some((type) => contentType.startsWith(type));
}

/**
 * Default transport over the global `fetch`. Streams are decoded as SSE, or
 * line by line when the upstream answers with a JSON lines content type.
 */
export class FetchTransport implements Transport {
  private readonly timeoutMs: number;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async send(call: TransportCall): Promise<unknown> {
    const result = await fetchWithTimeout({
      url: call.url,
      method: 'POST',
      headers: call.headers,
      body: call.body,
      timeoutMs: call.timeoutMs ?? this.timeoutMs,
      signal: call.signal,
    });
    return result.body;
  }

  async open(call: TransportCall): Promise<AsyncIterable<SSEEvent>> {
    const response = await fetchStream({
      url: call.url,
      method: 'POST',
      headers: { Accept: 'text/event-stream', ...call.headers },
      body: call.body,
      timeoutMs: call.timeoutMs ?? this.timeoutMs,
      signal: call.signal,
    });
    return isLineDelimited(response) ? createLineStream(response) : createSSEStream(response);
  }
}
