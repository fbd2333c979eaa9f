/**
 * wave-channel CLI -- command-line client for the wave socket protocol.
 */

import { Command } from "commander";

import { loginCommand } from "./commands/login.js";
import { logoutCommand } from "./commands/logout.js";
import { openCommand } from "./commands/open.js";
import { submitCommand } from "./commands/submit.js";
import { collect, parsePositiveInt } from "./helpers.js";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("wave-channel")
    .description("Wave socket protocol client")
    .version("0.1.0");

  // Global option: --server/-s (falls back to WAVE_SERVER_URL)
  program.option("-s, --server <url>", "Server URL (default: http://localhost:9898)");

  // ---- login -----------------------------------------------------------------
  program
    .command("login <token>")
    .description("Store the session token sent when a connection first opens")
    .action((token: string) => {
      loginCommand(token);
    });

  // ---- logout ----------------------------------------------------------------
  program
    .command("logout")
    .description("Remove the stored session token")
    .action(() => {
      logoutCommand();
    });

  // ---- open ------------------------------------------------------------------
  program
    .command("open <waveId>")
    .description("Open a wave and print its updates as JSON lines")
    .option("-p, --participant <id>", "Participant id to open as")
    .option("--prefix <prefix>", "Wavelet id prefix (repeatable)", collect, [])
    .option("-u, --updates <n>", "Exit after this many updates", parsePositiveInt)
    .action(async (waveId: string, opts: { participant?: string; prefix: string[]; updates?: number }) => {
      const server: string | undefined = program.opts().server;
      await openCommand(waveId, {
        server,
        participant: opts.participant,
        prefix: opts.prefix,
        updates: opts.updates,
      });
    });

  // ---- submit ----------------------------------------------------------------
  program
    .command("submit <waveletName> <deltaFile>")
    .description("Submit a JSON delta to a wavelet and print the response")
    .option("-t, --timeout <ms>", "Response timeout in milliseconds", parsePositiveInt, 30000)
    .action(async (waveletName: string, deltaFile: string, opts: { timeout: number }) => {
      const server: string | undefined = program.opts().server;
      await submitCommand(waveletName, deltaFile, {
        server,
        timeout: opts.timeout,
      });
    });

  return program;
}
