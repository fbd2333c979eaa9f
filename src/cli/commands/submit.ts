/**
 * wave-channel submit -- Submit a delta to a wavelet and print the response.
 */

import { createChannel } from "../../sdk/channel.js";
import { ChannelConfig } from "../../sdk/config.js";
import { FileCredentialStore } from "../../sdk/credentials.js";
import type { SubmitResponsePayload } from "../../protocol/index.js";
import { cliError, describeError, readJsonObject } from "../helpers.js";

const DEFAULT_TIMEOUT_MS = 30000;

export async function submitCommand(
  waveletName: string,
  deltaFile: string,
  options: {
    server?: string;
    dataDir?: string;
    timeout?: number;
    channelFactory?: typeof createChannel;
  } = {}
): Promise<void> {
  let delta: Record<string, unknown>;
  try {
    delta = readJsonObject(deltaFile);
  } catch (err) {
    cliError(`Error: ${describeError(err)}`);
  }

  const cfg = new ChannelConfig({
    serverUrl: options.server,
    dataDir: options.dataDir,
  });
  const store = new FileCredentialStore(cfg.dataDir);
  const channel = (options.channelFactory ?? createChannel)(cfg, {
    credentials: store,
  });

  let response: SubmitResponsePayload | null = null;
  let failure: string | null = null;
  try {
    channel.connect();
    response = await channel.submit(
      { waveletName, delta },
      { timeoutMs: options.timeout ?? DEFAULT_TIMEOUT_MS }
    );
  } catch (err) {
    failure = describeError(err);
  } finally {
    channel.disconnect(true);
  }

  if (failure !== null || response === null) {
    cliError(`Error: ${failure ?? "no response"}`);
  }

  console.log(JSON.stringify(response, null, 2));
  if (response.errorMessage !== undefined) {
    cliError(`Submit rejected: ${response.errorMessage}`);
  }
}
