import type { NormalizedEvent } from '../types/index.js';
import { StreamTruncatedError } from '../types/index.js';
import type { SSEEvent } from '../utils/sse.js';
import { isRecord } from '../utils/json.js';

export const DONE_SENTINEL = '[DONE]';

function delta(text: string): NormalizedEvent {
  return { type: 'response.delta', delta: { output_text: text } };
}

/**
 * Maps one upstream `data` payload to an event. Returns null for payloads
 * that carry nothing for the caller (blank, not JSON, unknown type).
 */
export function normalizeEventData(data: string): NormalizedEvent | null {
  const trimmed = data.trim();
  if (!trimmed) {
    return null;
  }
  if (trimmed === DONE_SENTINEL) {
    return { type: 'response.completed' };
  }

  let message: unknown;
  try {
    message = JSON.parse(trimmed);
  } catch {
    return null;
  }
  if (!isRecord(message)) {
    return null;
  }

  const text = message['text'];
  switch (message['type']) {
    case 'delta':
      return delta(typeof text === 'string' ? text : '');
    case 'done':
      return { type: 'response.completed' };
    default:
      return typeof text === 'string' ? delta(text) : null;
  }
}

/**
 * Lazily translates upstream events. Ends after the first completion event;
 * if the source runs dry first, throws StreamTruncatedError.
 */
export async function* normalizeStream(
  events: AsyncIterable<SSEEvent>,
): AsyncGenerator<NormalizedEvent, void, undefined> {
  let delivered = 0;

  for await (const event of events) {
    const normalized = normalizeEventData(event.data);
    if (normalized === null) {
      continue;
    }

    delivered += 1;
    yield normalized;

    if (normalized.type === 'response.completed') {
      return;
    }
  }

  throw new StreamTruncatedError(delivered);
}
