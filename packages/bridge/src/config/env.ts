import type { EnvRecord } from '../types/index.js';
import { ConfigurationError } from '../types/index.js';

export const BASE_URL_ENV_VARS: ReadonlyArray<string> = [
  'OPENAI_BASE_URL',
  'OPENAI_BASIC_BASE_URL',
];

// Primary, legacy, bearer-specific, API key, generic key.
export const TOKEN_ENV_VARS: ReadonlyArray<string> = [
  'OPENAI_TOKEN',
  'OPENAI_BASIC_TOKEN',
  'OPENAI_BEARER_TOKEN',
  'OPENAI_API_KEY',
  'OPENAI_KEY',
];

export const AUTH_TYPE_ENV_VAR = 'OPENAI_AUTH_TYPE';
export const DISABLE_STREAMING_ENV_VAR = 'OPENAI_BASIC_DISABLE_STREAMING';
export const ALIAS_LIBRARY_ENV_VAR = 'OPENAI_BASIC_ALIAS_OPENAI';

export type JsonKnob =
  | 'pathMap'
  | 'paramMap'
  | 'dropParams'
  | 'extraAllow'
  | 'modelRoutes'
  | 'extraHeaders';

export const JSON_KNOB_ENV_VARS: { readonly [K in JsonKnob]: string } = {
  pathMap: 'OPENAI_BASIC_PATH_MAP',
  paramMap: 'OPENAI_BASIC_PARAM_MAP',
  dropParams: 'OPENAI_BASIC_DROP_PARAMS',
  extraAllow: 'OPENAI_BASIC_EXTRA_ALLOW',
  modelRoutes: 'OPENAI_BASIC_MODEL_ROUTES',
  extraHeaders: 'OPENAI_BASIC_HEADERS',
};

const TRUE_VALUES = new Set(['1', 'true', 't', 'yes', 'y', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'f', 'no', 'n', 'off']);

/**
 * Returns the trimmed value of the first variable in `names` that is set to
 * something other than whitespace.
 */
export function pickEnv(env: EnvRecord, names: ReadonlyArray<string>): string | null {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) {
      return value;
    }
  }
  return null;
}

export function parseBooleanFlag(env: EnvRecord, name: string): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return false;
  }

  const normalized = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }

  throw new ConfigurationError(
    `invalid boolean flag for ${name}: '${raw}' (accepted values: 1/0/true/false/yes/no/on/off)`,
  );
}

/** Parses a JSON-valued variable. Unset or blank yields `undefined`. */
export function readJsonEnv(env: EnvRecord, name: string): unknown {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }

  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(
      `invalid JSON for ${name}`,
      err instanceof Error ? err : undefined,
    );
  }
}
