import { vi, type Mock } from 'vitest';
import type { SSEEvent, Transport, TransportCall } from '@switchboard/bridge';

export const BASE_ENV = {
  OPENAI_BASE_URL: 'https://upstream.test',
  OPENAI_TOKEN: 'test-token',
} as const;

export async function* sseEvents(data: ReadonlyArray<string>): AsyncIterable<SSEEvent> {
  for (const item of data) {
    yield { event: '', data: item };
  }
}

export type FakeTransport = Transport & {
  readonly send: Mock<(call: TransportCall) => Promise<unknown>>;
  readonly open: Mock<(call: TransportCall) => Promise<AsyncIterable<SSEEvent>>>;
};

/** In-process transport that answers every call with canned data. */
export function createFakeTransport(
  reply: { readonly body?: unknown; readonly events?: ReadonlyArray<string> } = {},
): FakeTransport {
  return {
    send: vi.fn(async (_call: TransportCall) => reply.body ?? {}),
    open: vi.fn(async (_call: TransportCall) => sseEvents(reply.events ?? [])),
  };
}

export function sseResponse(lines: ReadonlyArray<string>): Response {
  return new Response(lines.map((line) => `data: ${line}\n\n`).join(''), {
    status: 200,
    headers: { 'Content-Type': 'text/event-stream' },
  });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function requestBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}
