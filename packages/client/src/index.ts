export { SwitchboardClient, type ClientOptions } from './client.js';
export { getDefaultClient, setDefaultClient, resetDefaultClient } from './default-client.js';
export { ResponseStream } from './stream.js';
export { RequestDispatcher, joinUrl, type RequestControls } from './dispatcher.js';
export { Responses, RESPONSES_KEY, type ResponseCreateParams } from './resources/responses.js';
export {
  Chat,
  ChatCompletions,
  CHAT_COMPLETIONS_KEY,
  type ChatCompletionCreateParams,
} from './resources/chat.js';
