/**
 * Routes decoded inbound envelopes to the update listener or to the
 * pending call they answer.
 */

import {
  MalformedEnvelopeError,
  MessageType,
  decodeEnvelope,
  isEnvelopeOf,
  type DecodedEnvelope,
  type WaveletUpdatePayload,
} from "../protocol/index.js";
import type { Logger, TimingSink } from "./logger.js";
import { timed } from "./logger.js";
import type { PendingCallTable } from "./pending-calls.js";

export type WaveletUpdateListener = (update: WaveletUpdatePayload) => void;

/** How a single inbound frame was handled. */
export type DispatchOutcome =
  | "malformed"
  | "update-delivered"
  | "update-dropped"
  | "response-delivered"
  | "response-dropped"
  | "unrecognized";

export class Dispatcher {
  private _pending: PendingCallTable;
  private _listener: () => WaveletUpdateListener | null;
  private _logger: Logger;
  private _timing: TimingSink;

  constructor(options: {
    pending: PendingCallTable;
    listener: () => WaveletUpdateListener | null;
    logger: Logger;
    timing: TimingSink;
  }) {
    this._pending = options.pending;
    this._listener = options.listener;
    this._logger = options.logger;
    this._timing = options.timing;
  }

  /**
   * Decode one frame and hand it to its target.
   *
   * Malformed frames are logged and dropped; they never throw.
   */
  dispatch(text: string): DispatchOutcome {
    this._logger.debug({ text }, "received JSON message");

    let envelope: DecodedEnvelope;
    try {
      envelope = timed(this._timing, "deserialize message", () =>
        decodeEnvelope(text)
      );
    } catch (err) {
      if (err instanceof MalformedEnvelopeError) {
        this._logger.error({ text, error: err.message }, "invalid JSON message");
        return "malformed";
      }
      throw err;
    }

    if (isEnvelopeOf(envelope, MessageType.WAVELET_UPDATE)) {
      const listener = this._listener();
      if (listener === null) {
        return "update-dropped";
      }
      listener(envelope.message);
      return "update-delivered";
    }

    if (isEnvelopeOf(envelope, MessageType.SUBMIT_RESPONSE)) {
      const call = this._pending.take(envelope.sequenceNumber);
      if (call === undefined) {
        this._logger.debug(
          { sequenceNumber: envelope.sequenceNumber },
          "dropping response with no pending request"
        );
        return "response-dropped";
      }
      call.onResponse(envelope.message);
      return "response-delivered";
    }

    this._logger.debug(
      { messageType: envelope.messageType, sequenceNumber: envelope.sequenceNumber },
      "ignoring unrecognized message type"
    );
    return "unrecognized";
  }
}
