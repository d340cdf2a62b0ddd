export * from './types/index.js';
export { resolveSettings, resolveCredential, resolveBaseUrl, resolveAuthType, resolveToken } from './config/resolve.js';
export {
  BASE_URL_ENV_VARS,
  TOKEN_ENV_VARS,
  AUTH_TYPE_ENV_VAR,
  DISABLE_STREAMING_ENV_VAR,
  ALIAS_LIBRARY_ENV_VAR,
  JSON_KNOB_ENV_VARS,
  type JsonKnob,
} from './config/env.js';
export { PLACEHOLDER_TOKENS, isPlaceholderToken } from './config/placeholders.js';
export { createMappingTables, matchModelRoute, type MappingInput } from './mapping/tables.js';
export { compileRoutePattern } from './mapping/glob.js';
export {
  RequestTranslator,
  STREAM_SUFFIX,
  type TranslatedRequest,
  type ResolvedPath,
} from './translate/translator.js';
export { DEFAULT_ALLOWED_FIELDS, transformPayload } from './translate/payload.js';
export { authorizationValue, buildHeaders } from './translate/headers.js';
export {
  messagesToPrompt,
  type ChatMessage,
  type ChatMessageContent,
  type ChatTextPart,
} from './translate/chat.js';
export { normalizeResponse, generateResponseId } from './normalize/response.js';
export { normalizeStream, normalizeEventData, DONE_SENTINEL } from './normalize/stream.js';
export { FetchTransport, type FetchTransportOptions } from './transport/fetch-transport.js';
export { DEFAULT_TIMEOUT_MS } from './utils/http.js';
export { parseRetryAfter } from './utils/error-mapping.js';
export type { SSEEvent } from './utils/sse.js';
