import type { AdapterSettings, ModelRouteEntry } from '../types/index.js';
import { TranslationError } from '../types/index.js';
import { matchModelRoute } from '../mapping/tables.js';
import { isRecord } from '../utils/json.js';
import { buildHeaders } from './headers.js';
import { transformPayload } from './payload.js';

export const STREAM_SUFFIX = ':stream';

export type TranslatedRequest = {
  readonly path: string;
  readonly headers: Record<string, string>;
  readonly body: Record<string, unknown>;
  /** False whenever streaming is disabled, whatever the caller asked for. */
  readonly stream: boolean;
  readonly route: ModelRouteEntry | null;
};

export type ResolvedPath = {
  readonly path: string;
  readonly route: ModelRouteEntry | null;
};

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export class RequestTranslator {
  private readonly settings: AdapterSettings;
  private readonly renamedTargets: ReadonlySet<string>;

  constructor(settings: AdapterSettings) {
    this.settings = settings;
    this.renamedTargets = new Set(settings.tables.paramMap.values());
  }

  /** Whether a request asking for `requested` streaming will actually stream. */
  effectiveStream(requested: boolean): boolean {
    return requested && !this.settings.streaming.disableStreaming;
  }

  /**
   * Model route path first, then the path map entry for the (possibly
   * `:stream`-suffixed) key, then the logical key itself.
   */
  resolvePath(logicalKey: string, model: string, stream: boolean): ResolvedPath {
    const route = matchModelRoute(this.settings.tables.modelRoutes, model);
    if (route?.route.path) {
      return { path: route.route.path, route };
    }

    const key = stream ? `${logicalKey}${STREAM_SUFFIX}` : logicalKey;
    const mapped = this.settings.tables.pathMap.get(key);
    return { path: mapped ?? logicalKey, route };
  }

  translate(
    logicalKey: string,
    model: string,
    payload: unknown,
    isStream: boolean,
  ): TranslatedRequest {
    if (!isRecord(payload)) {
      throw new TranslationError(
        `payload must be a JSON object, got ${describeValue(payload)}`,
      );
    }

    const stream = this.effectiveStream(isStream);
    const { path, route } = this.resolvePath(logicalKey, model, stream);
    const { credential, tables } = this.settings;

    return {
      path,
      headers: buildHeaders(credential, tables.extraHeaders),
      body: transformPayload(payload, tables, this.renamedTargets),
      stream,
      route,
    };
  }
}
