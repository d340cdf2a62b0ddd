import type { z } from 'zod';
import type { AdapterSettings, AuthType, Credential, EnvRecord } from '../types/index.js';
import { ConfigurationError } from '../types/index.js';
import { createMappingTables } from '../mapping/tables.js';
import {
  ALIAS_LIBRARY_ENV_VAR,
  AUTH_TYPE_ENV_VAR,
  BASE_URL_ENV_VARS,
  DISABLE_STREAMING_ENV_VAR,
  JSON_KNOB_ENV_VARS,
  TOKEN_ENV_VARS,
  parseBooleanFlag,
  pickEnv,
  readJsonEnv,
  type JsonKnob,
} from './env.js';
import { isPlaceholderToken } from './placeholders.js';
import {
  describeIssues,
  modelRoutesSchema,
  stringListSchema,
  stringMapSchema,
} from './schema.js';

const AUTH_TYPES: ReadonlyArray<AuthType> = ['basic', 'bearer'];

function isAuthType(value: string): value is AuthType {
  return AUTH_TYPES.some((authType) => authType === value);
}

export function resolveBaseUrl(env: EnvRecord): string {
  const raw = pickEnv(env, BASE_URL_ENV_VARS);
  if (raw === null) {
    throw new ConfigurationError(`missing base url: set ${BASE_URL_ENV_VARS.join(' or ')}`);
  }

  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch (err) {
    throw new ConfigurationError(
      `invalid base url: '${raw}' is not an absolute URL`,
      err instanceof Error ? err : undefined,
    );
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigurationError(`invalid base url: unsupported protocol '${parsed.protocol}'`);
  }

  return raw.replace(/\/+$/, '');
}

export function resolveAuthType(env: EnvRecord): AuthType {
  const raw = env[AUTH_TYPE_ENV_VAR]?.trim().toLowerCase();
  if (!raw) {
    return 'basic';
  }
  if (!isAuthType(raw)) {
    throw new ConfigurationError(
      `invalid auth type: '${raw}' (supported: ${AUTH_TYPES.join(', ')})`,
    );
  }
  return raw;
}

export function resolveToken(env: EnvRecord): string {
  const token = pickEnv(env, TOKEN_ENV_VARS);
  if (token === null) {
    throw new ConfigurationError(`missing token: set one of ${TOKEN_ENV_VARS.join(', ')}`);
  }
  if (isPlaceholderToken(token)) {
    throw new ConfigurationError('placeholder token: configure a real credential');
  }
  return token;
}

export function resolveCredential(env: EnvRecord): Credential {
  const baseUrl = resolveBaseUrl(env);
  const authType = resolveAuthType(env);
  const token = resolveToken(env);
  return Object.freeze({ authType, token, baseUrl });
}

function readKnob<S extends z.ZodTypeAny>(
  env: EnvRecord,
  knob: JsonKnob,
  schema: S,
): z.output<S> | undefined {
  const name = JSON_KNOB_ENV_VARS[knob];
  const value = readJsonEnv(env, name);
  if (value === undefined) {
    return undefined;
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`invalid value for ${name}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Builds the immutable adapter settings from an environment record. Pure
 * apart from reading `env`; call it once and keep the result.
 */
export function resolveSettings(env: EnvRecord = process.env): AdapterSettings {
  const credential = resolveCredential(env);

  const tables = createMappingTables({
    pathMap: readKnob(env, 'pathMap', stringMapSchema),
    paramMap: readKnob(env, 'paramMap', stringMapSchema),
    dropParams: readKnob(env, 'dropParams', stringListSchema),
    extraAllow: readKnob(env, 'extraAllow', stringListSchema),
    modelRoutes: readKnob(env, 'modelRoutes', modelRoutesSchema),
    extraHeaders: readKnob(env, 'extraHeaders', stringMapSchema),
  });

  return Object.freeze({
    credential,
    tables,
    streaming: Object.freeze({
      disableStreaming: parseBooleanFlag(env, DISABLE_STREAMING_ENV_VAR),
    }),
    aliasLibrary: parseBooleanFlag(env, ALIAS_LIBRARY_ENV_VAR),
  });
}
