/**
 * Channel configuration.
 *
 * Priority (highest wins): constructor arg > env var > default.
 */

import { homedir } from "node:os";
import { join } from "node:path";

import { InvalidConfigError } from "../protocol/index.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

const DEFAULT_SERVER_URL = "http://localhost:9898";
const DEFAULT_SESSION_COOKIE = "WSESSIONID";
const SOCKET_PATH = "/socket";

/**
 * What happens to submitted requests still awaiting a response when the
 * connection goes away.
 *
 * - leave-pending: entries stay registered; a response on a later
 *   connection still resolves them.
 * - fail-fast: every entry is failed with ConnectionLostError.
 */
export type PendingPolicy = "leave-pending" | "fail-fast";

const VALID_POLICIES: ReadonlySet<string> = new Set<PendingPolicy>([
  "leave-pending",
  "fail-fast",
]);

export interface ChannelConfigOptions {
  serverUrl?: string | null;
  socketUrl?: string | null;
  sessionCookieName?: string | null;
  dataDir?: string | null;
  pendingPolicy?: string;
  logLevel?: string;
  reconnect?: boolean;
  connectTimeoutMs?: number;
}

export class ChannelConfig {
  readonly serverUrl: string;
  readonly socketUrl: string;
  readonly sessionCookieName: string;
  readonly dataDir: string;
  readonly pendingPolicy: PendingPolicy;
  readonly logLevel: LogLevel;
  readonly reconnect: boolean;
  readonly connectTimeoutMs: number;

  constructor(options: ChannelConfigOptions = {}) {
    // Server URL: constructor arg > env var > default
    this.serverUrl =
      options.serverUrl ?? process.env["WAVE_SERVER_URL"] ?? DEFAULT_SERVER_URL;

    // Derive socketUrl from serverUrl if not explicitly set
    if (options.socketUrl) {
      this.socketUrl = options.socketUrl;
    } else {
      let wsUrl = this.serverUrl
        .replace(/^https:\/\//, "wss://")
        .replace(/^http:\/\//, "ws://");
      if (!wsUrl.endsWith(SOCKET_PATH)) {
        wsUrl = wsUrl.replace(/\/+$/, "") + SOCKET_PATH;
      }
      this.socketUrl = wsUrl;
    }

    this.sessionCookieName =
      options.sessionCookieName ??
      process.env["WAVE_SESSION_COOKIE"] ??
      DEFAULT_SESSION_COOKIE;

    // WAVE_HOME env var overrides ~/.wave-channel (useful for testing / isolation).
    const waveHome = process.env["WAVE_HOME"];
    this.dataDir = options.dataDir ?? (waveHome || join(homedir(), ".wave-channel"));

    this.pendingPolicy = parsePendingPolicy(
      options.pendingPolicy ?? process.env["WAVE_PENDING_POLICY"] ?? "leave-pending"
    );
    this.logLevel = parseLogLevel(
      options.logLevel ?? process.env["WAVE_LOG_LEVEL"] ?? "warn"
    );

    this.reconnect = options.reconnect ?? true;

    const timeout = options.connectTimeoutMs ?? 30000;
    if (!Number.isFinite(timeout) || timeout <= 0) {
      throw new InvalidConfigError(
        `Invalid connectTimeoutMs ${timeout}. Must be a positive number.`
      );
    }
    this.connectTimeoutMs = timeout;
  }
}

function parsePendingPolicy(value: string): PendingPolicy {
  if (value === "leave-pending" || value === "fail-fast") {
    return value;
  }
  throw new InvalidConfigError(
    `Invalid pending_policy '${value}'. ` +
      `Must be one of: ${JSON.stringify([...VALID_POLICIES].sort())}`
  );
}

function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((l) => l === value);
  if (level === undefined) {
    throw new InvalidConfigError(
      `Invalid log_level '${value}'. Must be one of: ${JSON.stringify(LOG_LEVELS)}`
    );
  }
  return level;
}
