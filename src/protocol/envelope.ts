/**
 * Envelope codec -- sequence-numbered, typed wrapper around one message.
 *
 * Wire format is a JSON object with exactly three fields:
 * `sequenceNumber`, `messageType` and `message`. The payload schema is
 * selected by `messageType`; unknown types decode as UnrecognizedEnvelope so
 * newer servers do not break older clients.
 */

import { z } from "zod";

import { MalformedEnvelopeError, PreconditionError } from "./errors.js";
import { MessageType, isKnownMessageType } from "./types.js";

// -- Payload schemas --------------------------------------------------------

export const AuthenticatePayloadSchema = z
  .object({
    token: z.string(),
  })
  .passthrough();

export const OpenRequestPayloadSchema = z
  .object({
    participantId: z.string().optional(),
    waveId: z.string().optional(),
    waveletIdPrefix: z.array(z.string()).optional(),
  })
  .passthrough();

export const SubmitRequestPayloadSchema = z
  .object({
    waveletName: z.string().optional(),
    delta: z.unknown(),
    channelId: z.string().optional(),
  })
  .passthrough();

export const SubmitResponsePayloadSchema = z
  .object({
    operationsApplied: z.number().int().optional(),
    errorMessage: z.string().optional(),
    hashedVersionAfterApplication: z.unknown(),
  })
  .passthrough();

export const WaveletUpdatePayloadSchema = z
  .object({
    waveletName: z.string().optional(),
    appliedDelta: z.array(z.unknown()).optional(),
    commitNotice: z.unknown(),
    resultingVersion: z.unknown(),
    marker: z.boolean().optional(),
    channelId: z.string().optional(),
  })
  .passthrough();

export type AuthenticatePayload = z.infer<typeof AuthenticatePayloadSchema>;
export type OpenRequestPayload = z.infer<typeof OpenRequestPayloadSchema>;
export type SubmitRequestPayload = z.infer<typeof SubmitRequestPayloadSchema>;
export type SubmitResponsePayload = z.infer<typeof SubmitResponsePayloadSchema>;
export type WaveletUpdatePayload = z.infer<typeof WaveletUpdatePayloadSchema>;

/** Fixed coupling between message type and payload schema. */
export interface PayloadRegistry {
  [MessageType.AUTHENTICATE]: AuthenticatePayload;
  [MessageType.OPEN_REQUEST]: OpenRequestPayload;
  [MessageType.SUBMIT_REQUEST]: SubmitRequestPayload;
  [MessageType.SUBMIT_RESPONSE]: SubmitResponsePayload;
  [MessageType.WAVELET_UPDATE]: WaveletUpdatePayload;
}

const PAYLOAD_SCHEMAS: {
  [K in MessageType]: z.ZodType<PayloadRegistry[K], z.ZodTypeDef, unknown>;
} = {
  [MessageType.AUTHENTICATE]: AuthenticatePayloadSchema,
  [MessageType.OPEN_REQUEST]: OpenRequestPayloadSchema,
  [MessageType.SUBMIT_REQUEST]: SubmitRequestPayloadSchema,
  [MessageType.SUBMIT_RESPONSE]: SubmitResponsePayloadSchema,
  [MessageType.WAVELET_UPDATE]: WaveletUpdatePayloadSchema,
};

const WireEnvelopeSchema = z.object({
  sequenceNumber: z.number().int().nonnegative(),
  messageType: z.string().min(1),
  message: z.record(z.unknown()),
});

// -- Envelope types ---------------------------------------------------------

/** An envelope whose type is in the registry. */
export interface Envelope<T extends MessageType = MessageType> {
  readonly sequenceNumber: number;
  readonly messageType: T;
  readonly message: PayloadRegistry[T];
}

/** An envelope with a type this client does not know. */
export interface UnrecognizedEnvelope {
  readonly sequenceNumber: number;
  readonly messageType: string;
  readonly message: Record<string, unknown>;
}

export type DecodedEnvelope = Envelope | UnrecognizedEnvelope;

/** Narrow a decoded envelope to one message type. */
export function isEnvelopeOf<T extends MessageType>(
  envelope: DecodedEnvelope,
  type: T
): envelope is Envelope<T> {
  return envelope.messageType === type;
}

// -- Codec ------------------------------------------------------------------

/**
 * Build an envelope.
 *
 * @throws {PreconditionError} If the sequence number is not a non-negative
 *   integer or the payload is not an object.
 */
export function createEnvelope<T extends MessageType>(
  sequenceNumber: number,
  messageType: T,
  message: PayloadRegistry[T]
): Envelope<T> {
  if (!Number.isSafeInteger(sequenceNumber) || sequenceNumber < 0) {
    throw new PreconditionError(
      `Sequence number must be a non-negative integer, got ${sequenceNumber}`
    );
  }
  requirePayload(message, messageType);
  return Object.freeze({ sequenceNumber, messageType, message });
}

/** Serialize an envelope to its wire text. */
export function serializeEnvelope(envelope: Envelope): string {
  return JSON.stringify({
    sequenceNumber: envelope.sequenceNumber,
    messageType: envelope.messageType,
    message: envelope.message,
  });
}

/** Create and serialize in one step. */
export function encodeEnvelope<T extends MessageType>(
  sequenceNumber: number,
  messageType: T,
  message: PayloadRegistry[T]
): string {
  return serializeEnvelope(createEnvelope(sequenceNumber, messageType, message));
}

/**
 * Parse wire text into an envelope.
 *
 * Known message types have their payload validated and re-typed;
 * unknown types come back as an UnrecognizedEnvelope.
 *
 * @throws {MalformedEnvelopeError} If the text is not JSON, a field is
 *   missing or mistyped, or a known payload does not match its schema.
 */
export function decodeEnvelope(text: string): DecodedEnvelope {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new MalformedEnvelopeError(
      `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const parsed = WireEnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedEnvelopeError(describeIssues(parsed.error));
  }

  const { sequenceNumber, messageType, message } = parsed.data;
  if (!isKnownMessageType(messageType)) {
    return { sequenceNumber, messageType, message };
  }

  const payload = PAYLOAD_SCHEMAS[messageType].safeParse(message);
  if (!payload.success) {
    throw new MalformedEnvelopeError(
      `Invalid ${messageType} payload: ${describeIssues(payload.error)}`
    );
  }
  return { sequenceNumber, messageType, message: payload.data };
}

/**
 * @throws {PreconditionError} If the value is not a plain object.
 */
export function requirePayload(value: unknown, what: string): void {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new PreconditionError(`${what} payload must be an object`);
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}
