/**
 * wave-channel logout -- Forget the stored session token.
 */

import { ChannelConfig } from "../../sdk/config.js";
import { FileCredentialStore } from "../../sdk/credentials.js";

export function logoutCommand(options: { dataDir?: string } = {}): void {
  const cfg = new ChannelConfig({ dataDir: options.dataDir });
  const store = new FileCredentialStore(cfg.dataDir);

  if (store.removeToken(cfg.sessionCookieName)) {
    console.log(`Removed ${cfg.sessionCookieName}.`);
  } else {
    console.log(`No ${cfg.sessionCookieName} stored.`);
  }
}
