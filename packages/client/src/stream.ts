import type { NormalizedEvent } from '@switchboard/bridge';
import { StreamError } from '@switchboard/bridge';

/**
 * Single-consumer view over a normalized event sequence. It can be iterated
 * once; a second iteration (concurrent or not) throws StreamError.
 */
export class ResponseStream implements AsyncIterable<NormalizedEvent> {
  private readonly source: AsyncIterable<NormalizedEvent>;
  private consumed = false;

  constructor(source: AsyncIterable<NormalizedEvent>) {
    this.source = source;
  }

  get locked(): boolean {
    return this.consumed;
  }

  [Symbol.asyncIterator](): AsyncIterator<NormalizedEvent> {
    if (this.consumed) {
      throw new StreamError('stream already consumed');
    }
    this.consumed = true;
    return this.source[Symbol.asyncIterator]();
  }

  /** Drains the stream and returns every event. */
  async toArray(): Promise<Array<NormalizedEvent>> {
    const events: Array<NormalizedEvent> = [];
    for await (const event of this) {
      events.push(event);
    }
    return events;
  }

  /** Drains the stream and joins the text deltas. */
  async text(): Promise<string> {
    let text = '';
    for await (const event of this) {
      if (event.type === 'response.delta') {
        text += event.delta.output_text;
      }
    }
    return text;
  }
}
