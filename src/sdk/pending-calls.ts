/**
 * Table of submitted requests awaiting a SubmitResponse.
 *
 * Entries are keyed by the request's sequence number and removed the
 * moment they are resolved, failed or abandoned, so a handler can run at
 * most once.
 */

import {
  PreconditionError,
  type ChannelError,
  type SubmitResponsePayload,
} from "../protocol/index.js";
import { silentLogger, type Logger } from "./logger.js";

export type SubmitResponseCallback = (response: SubmitResponsePayload) => void;
export type SubmitFailureCallback = (error: ChannelError) => void;

export interface PendingCall {
  readonly onResponse: SubmitResponseCallback;
  readonly onFailure?: SubmitFailureCallback;
  /** Epoch millis when the request was submitted. */
  readonly submittedAt: number;
}

export class PendingCallTable {
  private _calls: Map<number, PendingCall> = new Map();
  private _logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this._logger = logger;
  }

  get size(): number {
    return this._calls.size;
  }

  has(sequenceNumber: number): boolean {
    return this._calls.has(sequenceNumber);
  }

  /** Sequence numbers currently awaiting a response, oldest first. */
  sequenceNumbers(): number[] {
    return [...this._calls.keys()];
  }

  /**
   * @throws {PreconditionError} If the sequence number is already pending.
   */
  register(sequenceNumber: number, call: PendingCall): void {
    if (this._calls.has(sequenceNumber)) {
      throw new PreconditionError(
        `Sequence number ${sequenceNumber} is already pending`
      );
    }
    this._calls.set(sequenceNumber, call);
  }

  /** Remove and return the entry for a sequence number, if any. */
  take(sequenceNumber: number): PendingCall | undefined {
    const call = this._calls.get(sequenceNumber);
    if (call !== undefined) {
      this._calls.delete(sequenceNumber);
    }
    return call;
  }

  /** Drop an entry without invoking it. Returns whether one existed. */
  abandon(sequenceNumber: number): boolean {
    return this._calls.delete(sequenceNumber);
  }

  /**
   * Empty the table, handing `error` to every entry's failure handler.
   *
   * Returns the number of entries removed. Entries without a failure
   * handler are dropped silently. A handler that throws is logged and
   * does not stop the remaining handlers.
   */
  failAll(error: ChannelError): number {
    const calls = [...this._calls.entries()];
    this._calls.clear();
    for (const [sequenceNumber, call] of calls) {
      try {
        call.onFailure?.(error);
      } catch (err) {
        this._logger.error(
          {
            sequenceNumber,
            error: err instanceof Error ? err.message : String(err),
          },
          "failure handler threw"
        );
      }
    }
    return calls.length;
  }
}
