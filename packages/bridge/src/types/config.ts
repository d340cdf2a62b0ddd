export type AuthType = 'basic' | 'bearer';

export type Credential = {
  readonly authType: AuthType;
  readonly token: string;
  readonly baseUrl: string;
};

/**
 * Override record attached to a model pattern. Only `path` affects routing;
 * any other fields are kept so callers can inspect the matched route.
 */
export type ModelRoute = {
  readonly path?: string;
  readonly [field: string]: unknown;
};

export type ModelRouteEntry = {
  readonly pattern: string;
  readonly route: ModelRoute;
};

export type MappingTables = {
  readonly pathMap: ReadonlyMap<string, string>;
  readonly paramMap: ReadonlyMap<string, string>;
  readonly dropParams: ReadonlySet<string>;
  readonly extraAllow: ReadonlySet<string>;
  readonly modelRoutes: ReadonlyArray<ModelRouteEntry>;
  readonly extraHeaders: ReadonlyMap<string, string>;
};

export type StreamingPolicy = {
  readonly disableStreaming: boolean;
};

export type AdapterSettings = {
  readonly credential: Credential;
  readonly tables: MappingTables;
  readonly streaming: StreamingPolicy;
  /** Consumed by import-aliasing tooling only; translation ignores it. */
  readonly aliasLibrary: boolean;
};

export type EnvRecord = Readonly<Record<string, string | undefined>>;
