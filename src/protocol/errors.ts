/**
 * Channel exception hierarchy.
 *
 * All channel-specific errors inherit from ChannelError.
 */

/** Base error for all channel errors. */
export class ChannelError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = "ChannelError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Raised when inbound text is not a well-formed envelope. */
export class MalformedEnvelopeError extends ChannelError {
  constructor(message?: string) {
    super(message);
    this.name = "MalformedEnvelopeError";
  }
}

/** Raised on programmer errors: double attach, null payloads, rebinding. */
export class PreconditionError extends ChannelError {
  constructor(message?: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

/** Raised when the transport cannot carry a frame. */
export class TransportError extends ChannelError {
  constructor(message?: string) {
    super(message);
    this.name = "TransportError";
  }
}

/** Delivered to pending calls that are failed when the connection drops. */
export class ConnectionLostError extends ChannelError {
  constructor(message?: string) {
    super(message);
    this.name = "ConnectionLostError";
  }
}

/** Raised when a promise-based submit gets no response in time. */
export class SubmitTimeoutError extends ChannelError {
  readonly sequenceNumber: number;

  constructor(sequenceNumber: number, timeoutMs: number) {
    super(`No response to request ${sequenceNumber} within ${timeoutMs}ms`);
    this.name = "SubmitTimeoutError";
    this.sequenceNumber = sequenceNumber;
  }
}

/** Raised when a configuration value is out of range. */
export class InvalidConfigError extends ChannelError {
  constructor(message?: string) {
    super(message);
    this.name = "InvalidConfigError";
  }
}
