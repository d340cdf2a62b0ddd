import { nanoid } from 'nanoid';
import type { NormalizedResponse, NormalizedUsage } from '../types/index.js';
import { TranslationError } from '../types/index.js';
import { firstNonEmptyString, isRecord } from '../utils/json.js';

export function generateResponseId(): string {
  return `resp-${nanoid()}`;
}

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

// Upstream usage keys are kept; the three token counts are always present.
function normalizeUsage(raw: unknown): NormalizedUsage {
  const usage: Record<string, unknown> = isRecord(raw) ? raw : {};
  return {
    ...usage,
    prompt_tokens: numberOrNull(usage['prompt_tokens']),
    completion_tokens: numberOrNull(usage['completion_tokens']),
    total_tokens: numberOrNull(usage['total_tokens']),
  };
}

function upstreamId(value: unknown): string | number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  return firstNonEmptyString(value);
}

function firstChoiceContent(choices: unknown): unknown {
  if (!Array.isArray(choices)) {
    return undefined;
  }
  const first: unknown = choices[0];
  const message = isRecord(first) ? first['message'] : undefined;
  return isRecord(message) ? message['content'] : undefined;
}

/**
 * Lays the caller-facing fields over the upstream body. Output text comes
 * from `result.text`, then `text`, then the first chat choice, then an
 * upstream `output_text`.
 */
export function normalizeResponse(raw: unknown): NormalizedResponse {
  if (typeof raw === 'string') {
    return {
      id: generateResponseId(),
      model: null,
      output_text: raw,
      usage: normalizeUsage(undefined),
    };
  }
  if (!isRecord(raw)) {
    throw new TranslationError('upstream response must be a JSON object');
  }

  const result: Record<string, unknown> = isRecord(raw['result']) ? raw['result'] : {};
  const model = raw['model'];

  return {
    ...raw,
    id: upstreamId(raw['id']) ?? generateResponseId(),
    model: typeof model === 'string' ? model : null,
    output_text:
      firstNonEmptyString(
        result['text'],
        raw['text'],
        firstChoiceContent(raw['choices']),
        raw['output_text'],
      ) ?? '',
    usage: normalizeUsage(raw['usage']),
  };
}
