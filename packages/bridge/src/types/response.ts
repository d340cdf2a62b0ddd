export type NormalizedUsage = {
  readonly prompt_tokens: number | null;
  readonly completion_tokens: number | null;
  readonly total_tokens: number | null;
  readonly [field: string]: unknown;
};

/**
 * Response object handed back to callers. Field names follow the wire shape
 * the calling library expects; upstream fields not listed here are copied
 * through untouched.
 */
export type NormalizedResponse = {
  /** Upstream id when it sent one, otherwise a generated `resp-` id. */
  readonly id: string | number;
  readonly model: string | null;
  readonly output_text: string;
  readonly usage: NormalizedUsage;
  readonly [field: string]: unknown;
};
