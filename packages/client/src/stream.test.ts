import { describe, it, expect } from 'vitest';
import { StreamError, type NormalizedEvent } from '@switchboard/bridge';
import { ResponseStream } from './stream.js';

async function* events(texts: ReadonlyArray<string>): AsyncGenerator<NormalizedEvent> {
  for (const text of texts) {
    yield { type: 'response.delta', delta: { output_text: text } };
  }
  yield { type: 'response.completed' };
}

describe('ResponseStream', () => {
  it('yields every event in order', async () => {
    const stream = new ResponseStream(events(['a', 'b']));

    expect(await stream.toArray()).toEqual([
      { type: 'response.delta', delta: { output_text: 'a' } },
      { type: 'response.delta', delta: { output_text: 'b' } },
      { type: 'response.completed' },
    ]);
  });

  it('joins deltas with text()', async () => {
    const stream = new ResponseStream(events(['Hel', 'lo', '']));

    expect(await stream.text()).toBe('Hello');
  });

  it('can only be consumed once', async () => {
    const stream = new ResponseStream(events(['a']));
    expect(stream.locked).toBe(false);

    await stream.text();

    expect(stream.locked).toBe(true);
    expect(() => stream[Symbol.asyncIterator]()).toThrow(StreamError);
    await expect(stream.toArray()).rejects.toThrow('stream already consumed');
  });

  it('rejects a second consumer while the first is still reading', () => {
    const stream = new ResponseStream(events(['a']));

    stream[Symbol.asyncIterator]();

    expect(() => stream[Symbol.asyncIterator]()).toThrow('stream already consumed');
  });

  it('surfaces errors raised by the source', async () => {
    async function* failing(): AsyncGenerator<NormalizedEvent> {
      yield { type: 'response.delta', delta: { output_text: 'partial' } };
      throw new StreamError('upstream went away');
    }
    const received: Array<NormalizedEvent> = [];
    const stream = new ResponseStream(failing());

    await expect(
      (async () => {
        for await (const event of stream) {
          received.push(event);
        }
      })(),
    ).rejects.toThrow('upstream went away');
    expect(received).toHaveLength(1);
  });
});
