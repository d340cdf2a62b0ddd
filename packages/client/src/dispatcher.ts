import type {
  AdapterSettings,
  Logger,
  NormalizedResponse,
  Transport,
  TransportCall,
} from '@switchboard/bridge';
import { RequestTranslator, normalizeResponse, normalizeStream } from '@switchboard/bridge';
import { ResponseStream } from './stream.js';

export type RequestControls = {
  readonly signal?: AbortSignal;
  readonly timeoutMs?: number;
};

export function joinUrl(baseUrl: string, path: string): string {
  return path.startsWith('/') ? `${baseUrl}${path}` : `${baseUrl}/${path}`;
}

/**
 * Translate, send, normalize. Shared by every resource on the client.
 */
export class RequestDispatcher {
  readonly translator: RequestTranslator;
  private readonly settings: AdapterSettings;
  private readonly transport: Transport;
  private readonly logger: Logger;

  constructor(settings: AdapterSettings, transport: Transport, logger: Logger) {
    this.settings = settings;
    this.translator = new RequestTranslator(settings);
    this.transport = transport;
    this.logger = logger;
  }

  async dispatch(
    logicalKey: string,
    model: string,
    payload: Record<string, unknown>,
    requestedStream: boolean,
    controls: RequestControls,
  ): Promise<NormalizedResponse | ResponseStream> {
    const translated = this.translator.translate(logicalKey, model, payload, requestedStream);

    if (requestedStream && !translated.stream) {
      this.logger.warn('streaming is disabled; returning a single response', {
        model,
        path: translated.path,
      });
    }
    this.logger.debug('dispatching request', {
      logicalKey,
      model,
      path: translated.path,
      stream: translated.stream,
      route: translated.route?.pattern ?? null,
    });

    const call: TransportCall = {
      url: joinUrl(this.settings.credential.baseUrl, translated.path),
      headers: translated.headers,
      body: translated.body,
      signal: controls.signal,
      timeoutMs: controls.timeoutMs,
    };

    if (translated.stream) {
      const events = await this.transport.open(call);
      return new ResponseStream(normalizeStream(events));
    }

    return normalizeResponse(await this.transport.send(call));
  }
}
