import type { AdapterSettings, EnvRecord, Logger, Transport } from '@switchboard/bridge';
import { FetchTransport, noopLogger, resolveSettings } from '@switchboard/bridge';
import { RequestDispatcher } from './dispatcher.js';
import { Chat } from './resources/chat.js';
import { Responses } from './resources/responses.js';

export type ClientOptions = {
  /** Pre-built settings. When absent they are resolved from `env`. */
  readonly settings?: AdapterSettings;
  readonly env?: EnvRecord;
  readonly transport?: Transport;
  readonly logger?: Logger;
  /** Request timeout for the default fetch transport. */
  readonly timeoutMs?: number;
};

/**
 * Drop-in client exposing `responses.create` and `chat.completions.create`.
 * Settings are resolved once, at construction; configuration problems throw
 * here rather than on the first request.
 */
export class SwitchboardClient {
  readonly settings: AdapterSettings;
  readonly responses: Responses;
  readonly chat: Chat;

  constructor(options: ClientOptions = {}) {
    this.settings = options.settings ?? resolveSettings(options.env ?? process.env);
    const transport = options.transport ?? new FetchTransport({ timeoutMs: options.timeoutMs });
    const dispatcher = new RequestDispatcher(
      this.settings,
      transport,
      options.logger ?? noopLogger,
    );

    this.responses = new Responses(dispatcher);
    this.chat = new Chat(dispatcher);
  }

  static fromEnv(env: EnvRecord = process.env, options: Omit<ClientOptions, 'env' | 'settings'> = {}): SwitchboardClient {
    return new SwitchboardClient({ ...options, env });
  }
}
