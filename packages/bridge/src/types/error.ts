export class SDKError extends Error {
  override name: string;
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }
}

/** Missing, malformed or placeholder configuration. Raised at construction. */
export class ConfigurationError extends SDKError {}

/** A single request could not be translated (bad payload, bad route pattern). */
export class TranslationError extends SDKError {}

export type TransportErrorKind =
  | 'connection'
  | 'timeout'
  | 'aborted'
  | 'http-status'
  | 'decode';

export class TransportError extends SDKError {
  readonly kind: TransportErrorKind;
  readonly statusCode: number | null;
  readonly body: string | null;
  readonly retryAfterMs: number | null;

  constructor(
    message: string,
    kind: TransportErrorKind,
    options: {
      readonly statusCode?: number;
      readonly body?: string;
      readonly retryAfterMs?: number | null;
      readonly cause?: Error;
    } = {},
  ) {
    super(message, options.cause);
    this.kind = kind;
    this.statusCode = options.statusCode ?? null;
    this.body = options.body ?? null;
    this.retryAfterMs = options.retryAfterMs ?? null;
  }
}

export class StreamError extends SDKError {}

/** The upstream closed the event stream before sending an end marker. */
export class StreamTruncatedError extends StreamError {
  readonly eventsReceived: number;

  constructor(eventsReceived: number) {
    super(`stream closed after ${eventsReceived} event(s) without an end marker`);
    this.eventsReceived = eventsReceived;
  }
}
