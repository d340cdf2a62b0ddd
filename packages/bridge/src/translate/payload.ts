import type { MappingTables } from '../types/index.js';

// Fields of the Responses and Chat Completions request bodies that are
// forwarded without being listed in the extra-allow set.
export const DEFAULT_ALLOWED_FIELDS: ReadonlySet<string> = new Set([
  'model',
  'input',
  'instructions',
  'messages',
  'max_output_tokens',
  'max_tokens',
  'max_completion_tokens',
  'temperature',
  'top_p',
  'n',
  'stop',
  'presence_penalty',
  'frequency_penalty',
  'logit_bias',
  'logprobs',
  'top_logprobs',
  'seed',
  'user',
  'metadata',
  'tools',
  'tool_choice',
  'parallel_tool_calls',
  'response_format',
  'text',
  'reasoning',
  'previous_response_id',
  'store',
  'truncation',
  'include',
  'service_tier',
]);

/**
 * Rewrites the top level of `payload` in three fixed steps:
 * rename via the param map, delete dropped keys, then keep only allowed
 * fields. A renamed value replaces an existing field of the target name.
 * Renamed targets count as allowed.
 */
export function transformPayload(
  payload: Readonly<Record<string, unknown>>,
  tables: MappingTables,
  renamedTargets: ReadonlySet<string>,
): Record<string, unknown> {
  const fields = new Map<string, unknown>();
  const renamed: Array<[string, unknown]> = [];

  for (const [key, value] of Object.entries(payload)) {
    const target = tables.paramMap.get(key);
    if (target === undefined) {
      fields.set(key, value);
    } else {
      renamed.push([target, value]);
    }
  }
  for (const [key, value] of renamed) {
    fields.set(key, value);
  }

  for (const key of tables.dropParams) {
    fields.delete(key);
  }

  const allowed = Array.from(fields).filter(
    ([key]) =>
      DEFAULT_ALLOWED_FIELDS.has(key) || renamedTargets.has(key) || tables.extraAllow.has(key),
  );

  return Object.fromEntries(allowed);
}
