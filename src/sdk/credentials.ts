/**
 * Session credential lookup for the one-time Authenticate envelope.
 *
 * Lookups are synchronous and read-only from the channel's side; a missing
 * token is not an error, it only skips authentication.
 */

import {
  chmodSync,
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { platform } from "node:os";
import { join } from "node:path";

import { PreconditionError } from "../protocol/index.js";

export interface CredentialStore {
  /** The stored token for `name`, or null. */
  getToken(name: string): string | null;
}

/** In-memory store, for tests and for hosts that already hold the token. */
export class MemoryCredentialStore implements CredentialStore {
  private _tokens: Map<string, string>;

  constructor(tokens: Record<string, string> = {}) {
    this._tokens = new Map(Object.entries(tokens));
  }

  getToken(name: string): string | null {
    return this._tokens.get(name) ?? null;
  }

  setToken(name: string, token: string): void {
    this._tokens.set(name, token);
  }

  removeToken(name: string): boolean {
    return this._tokens.delete(name);
  }
}

const TOKEN_SUFFIX = ".token";
const TOKEN_NAME = /^[A-Za-z0-9_.-]+$/;

/**
 * File-backed session token jar.
 *
 * Each token lives in `{dataDir}/credentials/{name}.token`, readable by
 * the owner only.
 */
export class FileCredentialStore implements CredentialStore {
  private _dir: string;

  constructor(dataDir: string) {
    this._dir = join(dataDir, "credentials");
  }

  /** Directory holding the token files. */
  get path(): string {
    return this._dir;
  }

  /** File a token named `name` is stored in. */
  tokenPath(name: string): string {
    if (!TOKEN_NAME.test(name) || name === "." || name === "..") {
      throw new PreconditionError(`Invalid token name '${name}'`);
    }
    return join(this._dir, `${name}${TOKEN_SUFFIX}`);
  }

  getToken(name: string): string | null {
    const path = this.tokenPath(name);
    if (!existsSync(path)) {
      return null;
    }
    const token = readFileSync(path, "utf-8").trim();
    return token === "" ? null : token;
  }

  /** Write (or replace) the token stored under `name`. */
  setToken(name: string, token: string): void {
    const path = this.tokenPath(name);
    mkdirSync(this._dir, { recursive: true });
    writeFileSync(path, token);
    this._setPermissions(path);
  }

  /** Returns whether a token was removed. */
  removeToken(name: string): boolean {
    const path = this.tokenPath(name);
    if (!existsSync(path)) {
      return false;
    }
    rmSync(path);
    return true;
  }

  /** Names with a stored token, sorted. */
  listNames(): string[] {
    if (!existsSync(this._dir)) {
      return [];
    }
    return readdirSync(this._dir)
      .filter((file) => file.endsWith(TOKEN_SUFFIX))
      .map((file) => file.slice(0, -TOKEN_SUFFIX.length))
      .sort();
  }

  /** Owner read/write only. */
  private _setPermissions(path: string): void {
    if (platform() !== "win32") {
      chmodSync(path, 0o600);
    }
  }
}
