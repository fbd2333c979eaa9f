/**
 * wave-channel open -- Open a wave and stream its updates as JSON lines.
 *
 * Runs until `updates` updates have been printed, or until SIGINT.
 */

import { ConnectionStatus } from "../../protocol/index.js";
import { createChannel } from "../../sdk/channel.js";
import { ChannelConfig } from "../../sdk/config.js";
import { FileCredentialStore } from "../../sdk/credentials.js";

export async function openCommand(
  waveId: string,
  options: {
    server?: string;
    dataDir?: string;
    participant?: string;
    prefix?: string[];
    updates?: number;
    channelFactory?: typeof createChannel;
  } = {}
): Promise<void> {
  const cfg = new ChannelConfig({
    serverUrl: options.server,
    dataDir: options.dataDir,
  });
  const store = new FileCredentialStore(cfg.dataDir);

  const channel = (options.channelFactory ?? createChannel)(cfg, {
    credentials: store,
    onStatus: (status) => {
      if (status === ConnectionStatus.SERVER_ERROR) {
        process.stderr.write("Connection lost (server error), retrying...\n");
      }
    },
  });

  await new Promise<void>((resolve) => {
    let received = 0;

    const finish = () => {
      process.removeListener("SIGINT", finish);
      channel.disconnect(true);
      resolve();
    };

    channel.attachListener((update) => {
      console.log(JSON.stringify(update));
      received += 1;
      if (options.updates !== undefined && received >= options.updates) {
        finish();
      }
    });

    process.once("SIGINT", finish);

    channel.connect();
    channel.openConversation({
      waveId,
      participantId: options.participant,
      waveletIdPrefix: options.prefix ?? [],
    });
  });
}
