/**
 * wave-channel login -- Store the session token sent on first connect.
 *
 * OFFLINE: only writes the local credential store.
 */

import { ChannelConfig } from "../../sdk/config.js";
import { FileCredentialStore } from "../../sdk/credentials.js";
import { cliError } from "../helpers.js";

export function loginCommand(
  token: string,
  options: { dataDir?: string } = {}
): void {
  const trimmed = token.trim();
  if (!trimmed) {
    cliError("Session token must not be empty.");
  }

  const cfg = new ChannelConfig({ dataDir: options.dataDir });
  const store = new FileCredentialStore(cfg.dataDir);
  store.setToken(cfg.sessionCookieName, trimmed);

  console.log(`Stored ${cfg.sessionCookieName} in ${store.tokenPath(cfg.sessionCookieName)}`);
}
