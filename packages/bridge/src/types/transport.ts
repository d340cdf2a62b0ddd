import type { SSEEvent } from '../utils/sse.js';

export type TransportCall = {
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: Record<string, unknown>;
  readonly signal?: AbortSignal;
  readonly timeoutMs?: number;
};

/**
 * Performs the HTTP exchange. Implementations decide blocking, timeout and
 * cancellation behaviour; errors they throw reach the caller unchanged.
 */
export interface Transport {
  send(call: TransportCall): Promise<unknown>;
  open(call: TransportCall): Promise<AsyncIterable<SSEEvent>>;
}
