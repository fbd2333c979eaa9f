/**
 * CLI helper utilities shared across commands.
 */

import { readFileSync } from "node:fs";
import { InvalidArgumentError } from "commander";
import { z } from "zod";

import { ChannelError } from "../protocol/index.js";

const JsonObjectSchema = z.record(z.unknown());

/**
 * Print an error message to stderr and exit with code 1.
 */
export function cliError(msg: string): never {
  process.stderr.write(msg + "\n");
  process.exit(1);
}

/** One-line description of a thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Read a file holding a single JSON object.
 *
 * @throws {ChannelError} If the file is not JSON or not an object.
 */
export function readJsonObject(path: string): Record<string, unknown> {
  const text = readFileSync(path, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ChannelError(`${path} is not valid JSON: ${describeError(err)}`);
  }
  const parsed = JsonObjectSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ChannelError(`${path} must contain a JSON object`);
  }
  return parsed.data;
}

/**
 * Commander argument parser for positive integers.
 *
 * @throws {InvalidArgumentError} Via commander, on anything else.
 */
export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return n;
}

/** Accumulate a repeatable option into a list. */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
