import { SwitchboardClient } from './client.js';

let defaultClient: SwitchboardClient | null = null;

/** Lazily builds a client from `process.env` and reuses it afterwards. */
export function getDefaultClient(): SwitchboardClient {
  if (defaultClient === null) {
    defaultClient = SwitchboardClient.fromEnv();
  }
  return defaultClient;
}

export function setDefaultClient(client: SwitchboardClient): void {
  defaultClient = client;
}

export function resetDefaultClient(): void {
  defaultClient = null;
}
