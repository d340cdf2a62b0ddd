import type { MappingTables, ModelRoute, ModelRouteEntry } from '../types/index.js';
import { ConfigurationError } from '../types/index.js';
import { compileRoutePattern, indexLikePatternMessage, isIndexLikePattern } from './glob.js';

export type MappingInput = {
  readonly pathMap?: Readonly<Record<string, string>>;
  readonly paramMap?: Readonly<Record<string, string>>;
  readonly dropParams?: Iterable<string>;
  readonly extraAllow?: Iterable<string>;
  readonly modelRoutes?: Readonly<Record<string, ModelRoute>>;
  readonly extraHeaders?: Readonly<Record<string, string>>;
};

/**
 * Snapshots plain records into read-only tables. Callers may keep mutating
 * their input objects afterwards without affecting the tables.
 *
 * Model routes keep the record's key order. Index-like patterns (`7`) are
 * rejected because objects always list them first.
 */
export function createMappingTables(input: MappingInput = {}): MappingTables {
  const modelRoutes: Array<ModelRouteEntry> = Object.entries(input.modelRoutes ?? {}).map(
    ([pattern, route]) => {
      if (isIndexLikePattern(pattern)) {
        throw new ConfigurationError(
          `invalid model route ${indexLikePatternMessage(pattern)}`,
        );
      }
      return Object.freeze({ pattern, route: Object.freeze({ ...route }) });
    },
  );

  return Object.freeze({
    pathMap: new Map(Object.entries(input.pathMap ?? {})),
    paramMap: new Map(Object.entries(input.paramMap ?? {})),
    dropParams: new Set(input.dropParams ?? []),
    extraAllow: new Set(input.extraAllow ?? []),
    modelRoutes: Object.freeze(modelRoutes),
    extraHeaders: new Map(Object.entries(input.extraHeaders ?? {})),
  });
}

const compiledPatterns = new WeakMap<ModelRouteEntry, RegExp>();

function patternFor(entry: ModelRouteEntry): RegExp {
  let compiled = compiledPatterns.get(entry);
  if (!compiled) {
    compiled = compileRoutePattern(entry.pattern);
    compiledPatterns.set(entry, compiled);
  }
  return compiled;
}

/**
 * First entry whose pattern matches `model`, in configured order. Patterns
 * after the match are never compiled.
 */
export function matchModelRoute(
  routes: ReadonlyArray<ModelRouteEntry>,
  model: string,
): ModelRouteEntry | null {
  for (const entry of routes) {
    if (patternFor(entry).test(model)) {
      return entry;
    }
  }
  return null;
}
