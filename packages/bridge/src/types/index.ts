export type {
  AuthType,
  Credential,
  ModelRoute,
  ModelRouteEntry,
  MappingTables,
  StreamingPolicy,
  AdapterSettings,
  EnvRecord,
} from './config.js';
export type { NormalizedUsage, NormalizedResponse } from './response.js';
export type { ResponseDelta, ResponseCompleted, NormalizedEvent } from './stream.js';
export type { TransportCall, Transport } from './transport.js';
export type { LogFields, Logger } from './logger.js';
export { noopLogger } from './logger.js';
export {
  SDKError,
  ConfigurationError,
  TranslationError,
  TransportError,
  StreamError,
  StreamTruncatedError,
  type TransportErrorKind,
} from './error.js';
