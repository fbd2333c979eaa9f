/**
 * Tests for ChannelConfig.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { homedir } from "node:os";
import { join } from "node:path";

import { InvalidConfigError } from "../../src/protocol/index.js";
import { ChannelConfig } from "../../src/sdk/config.js";

describe("ChannelConfig", () => {
  // Save and restore env vars
  const savedEnv: Record<string, string | undefined> = {};
  const envKeys = [
    "WAVE_SERVER_URL",
    "WAVE_SESSION_COOKIE",
    "WAVE_HOME",
    "WAVE_PENDING_POLICY",
    "WAVE_LOG_LEVEL",
  ];

  beforeEach(() => {
    for (const key of envKeys) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of envKeys) {
      if (savedEnv[key] !== undefined) {
        process.env[key] = savedEnv[key];
      } else {
        delete process.env[key];
      }
    }
  });

  it("uses defaults when nothing is provided", () => {
    const cfg = new ChannelConfig();
    expect(cfg.serverUrl).toBe("http://localhost:9898");
    expect(cfg.socketUrl).toBe("ws://localhost:9898/socket");
    expect(cfg.sessionCookieName).toBe("WSESSIONID");
    expect(cfg.dataDir).toBe(join(homedir(), ".wave-channel"));
    expect(cfg.pendingPolicy).toBe("leave-pending");
    expect(cfg.logLevel).toBe("warn");
    expect(cfg.reconnect).toBe(true);
    expect(cfg.connectTimeoutMs).toBe(30000);
  });

  it("derives a secure socket URL from an https server", () => {
    const cfg = new ChannelConfig({ serverUrl: "https://wave.example.com/" });
    expect(cfg.socketUrl).toBe("wss://wave.example.com/socket");
  });

  it("does not append the socket path twice", () => {
    const cfg = new ChannelConfig({ serverUrl: "http://wave.test/socket" });
    expect(cfg.socketUrl).toBe("ws://wave.test/socket");
  });

  it("uses an explicit socket URL when provided", () => {
    const cfg = new ChannelConfig({ socketUrl: "ws://other.test:1234/s" });
    expect(cfg.socketUrl).toBe("ws://other.test:1234/s");
  });

  it("reads values from env vars", () => {
    process.env["WAVE_SERVER_URL"] = "http://env.test:8080";
    process.env["WAVE_SESSION_COOKIE"] = "JSESSIONID";
    process.env["WAVE_HOME"] = "/tmp/wave-env-home";
    process.env["WAVE_PENDING_POLICY"] = "fail-fast";
    process.env["WAVE_LOG_LEVEL"] = "debug";

    const cfg = new ChannelConfig();
    expect(cfg.serverUrl).toBe("http://env.test:8080");
    expect(cfg.socketUrl).toBe("ws://env.test:8080/socket");
    expect(cfg.sessionCookieName).toBe("JSESSIONID");
    expect(cfg.dataDir).toBe("/tmp/wave-env-home");
    expect(cfg.pendingPolicy).toBe("fail-fast");
    expect(cfg.logLevel).toBe("debug");
  });

  it("prefers constructor args over env vars", () => {
    process.env["WAVE_SERVER_URL"] = "http://env.test:8080";
    process.env["WAVE_PENDING_POLICY"] = "fail-fast";

    const cfg = new ChannelConfig({
      serverUrl: "http://arg.test",
      pendingPolicy: "leave-pending",
    });
    expect(cfg.serverUrl).toBe("http://arg.test");
    expect(cfg.pendingPolicy).toBe("leave-pending");
  });

  it("rejects an unknown pending policy", () => {
    expect(() => new ChannelConfig({ pendingPolicy: "retry" })).toThrow(
      `Invalid pending_policy 'retry'. Must be one of: ["fail-fast","leave-pending"]`
    );
  });

  it("rejects an unknown log level from the environment", () => {
    process.env["WAVE_LOG_LEVEL"] = "loud";
    expect(() => new ChannelConfig()).toThrow(InvalidConfigError);
  });

  it("rejects a non-positive connect timeout", () => {
    expect(() => new ChannelConfig({ connectTimeoutMs: 0 })).toThrow(
      "Invalid connectTimeoutMs 0. Must be a positive number."
    );
  });
});
