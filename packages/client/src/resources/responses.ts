import type { NormalizedResponse } from '@switchboard/bridge';
import type { RequestControls, RequestDispatcher } from '../dispatcher.js';
import type { ResponseStream } from '../stream.js';

export const RESPONSES_KEY = '/responses';

export type ResponseCreateParams = RequestControls & {
  readonly model: string;
  readonly input: unknown;
  readonly stream?: boolean;
  readonly [param: string]: unknown;
};

export class Responses {
  private readonly dispatcher: RequestDispatcher;

  constructor(dispatcher: RequestDispatcher) {
    this.dispatcher = dispatcher;
  }

  /**
   * With `stream: true` the result is a ResponseStream, unless streaming is
   * disabled in configuration, in which case it is a single response.
   */
  create(params: ResponseCreateParams & { readonly stream: true }): Promise<NormalizedResponse | ResponseStream>;
  create(params: ResponseCreateParams & { readonly stream?: false }): Promise<NormalizedResponse>;
  create(params: ResponseCreateParams): Promise<NormalizedResponse | ResponseStream>;
  async create(params: ResponseCreateParams): Promise<NormalizedResponse | ResponseStream> {
    const { model, input, stream = false, signal, timeoutMs, ...rest } = params;
    return this.dispatcher.dispatch(
      RESPONSES_KEY,
      model,
      { model, input, ...rest },
      stream,
      { signal, timeoutMs },
    );
  }
}
