/**
 * Wave socket protocol -- message types, errors and envelope codec.
 *
 * Public API re-exports for the protocol layer.
 */

// Types
export {
  MessageType,
  ConnectionStatus,
  CLEAN_CLOSE_CODES,
  isKnownMessageType,
  classifyClose,
} from "./types.js";

// Errors
export {
  ChannelError,
  MalformedEnvelopeError,
  PreconditionError,
  TransportError,
  ConnectionLostError,
  SubmitTimeoutError,
  InvalidConfigError,
} from "./errors.js";

// Envelope
export {
  type AuthenticatePayload,
  type OpenRequestPayload,
  type SubmitRequestPayload,
  type SubmitResponsePayload,
  type WaveletUpdatePayload,
  type PayloadRegistry,
  type Envelope,
  type UnrecognizedEnvelope,
  type DecodedEnvelope,
  AuthenticatePayloadSchema,
  OpenRequestPayloadSchema,
  SubmitRequestPayloadSchema,
  SubmitResponsePayloadSchema,
  WaveletUpdatePayloadSchema,
  isEnvelopeOf,
  createEnvelope,
  serializeEnvelope,
  encodeEnvelope,
  decodeEnvelope,
  requirePayload,
} from "./envelope.js";
