export type ResponseDelta = {
  readonly type: 'response.delta';
  readonly delta: { readonly output_text: string };
};

export type ResponseCompleted = {
  readonly type: 'response.completed';
};

export type NormalizedEvent = ResponseDelta | ResponseCompleted;
