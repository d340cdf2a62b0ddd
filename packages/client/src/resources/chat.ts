import type { ChatMessage, NormalizedResponse } from '@switchboard/bridge';
import { messagesToPrompt } from '@switchboard/bridge';
import type { RequestControls, RequestDispatcher } from '../dispatcher.js';
import type { ResponseStream } from '../stream.js';

export const CHAT_COMPLETIONS_KEY = '/chat/completions';

export type ChatCompletionCreateParams = RequestControls & {
  readonly model: string;
  readonly messages: ReadonlyArray<ChatMessage>;
  readonly stream?: boolean;
  readonly [param: string]: unknown;
};

/** Chat calls are sent as a single flattened prompt in `input`. */
export class ChatCompletions {
  private readonly dispatcher: RequestDispatcher;

  constructor(dispatcher: RequestDispatcher) {
    this.dispatcher = dispatcher;
  }

  create(params: ChatCompletionCreateParams & { readonly stream: true }): Promise<NormalizedResponse | ResponseStream>;
  create(params: ChatCompletionCreateParams & { readonly stream?: false }): Promise<NormalizedResponse>;
  create(params: ChatCompletionCreateParams): Promise<NormalizedResponse | ResponseStream>;
  async create(params: ChatCompletionCreateParams): Promise<NormalizedResponse | ResponseStream> {
    const { model, messages, stream = false, signal, timeoutMs, ...rest } = params;
    return this.dispatcher.dispatch(
      CHAT_COMPLETIONS_KEY,
      model,
      { model, input: messagesToPrompt(messages), ...rest },
      stream,
      { signal, timeoutMs },
    );
  }
}

export class Chat {
  readonly completions: ChatCompletions;

  constructor(dispatcher: RequestDispatcher) {
    this.completions = new ChatCompletions(dispatcher);
  }
}
