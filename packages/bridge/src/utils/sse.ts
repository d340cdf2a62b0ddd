import { EventSourceParserStream } from 'eventsource-parser/stream';
import { TransportError } from '../types/error.js';
import { mapFetchFailure } from './error-mapping.js';

export type SSEEvent = {
  readonly event: string;
  readonly data: string;
  readonly id?: string;
};

/**
 * Reads a stream to the end, cancelling it if the consumer stops early.
 * Read failures surface as TransportError.
 */
async function* readAll<T>(stream: ReadableStream<T>): AsyncGenerator<T, void, undefined> {
  const reader = stream.getReader();
  let finished = false;

  try {
    // eslint-disable-next-line no-constant-condition
    while (true) {
      let chunk: ReadableStreamReadResult<T>;
      try {
        chunk = await reader.read();
      } catch (err) {
        finished = true;
        throw mapFetchFailure(err, false);
      }

      if (chunk.done) {
        finished = true;
        return;
      }
      yield chunk.value;
    }
  } finally {
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

function bodyOf(response: globalThis.Response): ReadableStream<Uint8Array> {
  const body = response.body;
  if (!body) {
    throw new TransportError('Response body is null or undefined', 'decode');
  }
  return body;
}

/**
 * Creates an async iterable of SSE events from a Response body.
 * Pipes the response body through EventSourceParserStream and yields parsed events.
 */
export async function* createSSEStream(
  response: globalThis.Response,
): AsyncIterable<SSEEvent> {
  const parsed = bodyOf(response)
    .pipeThrough(new TextDecoderStream())
    .pipeThrough(new EventSourceParserStream());

  for await (const value of readAll(parsed)) {
    yield {
      event: value.event || '',
      data: value.data || '',
      ...(value.id && { id: value.id }),
    };
  }
}

function splitLines(): TransformStream<string, string> {
  let buffer = '';
  return new TransformStream<string, string>({
    transform(chunk, controller) {
      buffer += chunk;
      const lines = buffer.split(/\r?\n/);
      buffer = lines.pop() ?? '';
      for (const line of lines) {
        controller.enqueue(line);
      }
    },
    flush(controller) {
      if (buffer) {
        controller.enqueue(buffer);
      }
    },
  });
}

/**
 * Newline-delimited JSON bodies: every non-blank line becomes an event whose
 * `data` is the line itself.
 */
export async function* createLineStream(
  response: globalThis.Response,
): AsyncIterable<SSEEvent> {
  const lines = bodyOf(response).pipeThrough(new TextDecoderStream()).pipeThrough(splitLines());

  for await (const line of readAll(lines)) {
    if (line.trim()) {
      yield { event: '', data: line };
    }
  }
}
