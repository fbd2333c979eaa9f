/**
 * Core types and constants for the wave socket protocol.
 */

/** Message types carried in the `messageType` field of an envelope. */
export enum MessageType {
  AUTHENTICATE = "Authenticate",
  OPEN_REQUEST = "OpenRequest",
  SUBMIT_REQUEST = "SubmitRequest",
  SUBMIT_RESPONSE = "SubmitResponse",
  WAVELET_UPDATE = "WaveletUpdate",
}

const KNOWN_MESSAGE_TYPES: ReadonlySet<string> = new Set<string>(
  Object.values(MessageType)
);

/** Whether a wire tag names one of the registered message types. */
export function isKnownMessageType(type: string): type is MessageType {
  return KNOWN_MESSAGE_TYPES.has(type);
}

/** Coarse connection status reported to the status sink. */
export enum ConnectionStatus {
  CONNECTED = "connected",
  DISCONNECTED = "disconnected",
  SERVER_ERROR = "server-error",
}

/**
 * Close reason codes that count as a clean shutdown.
 *
 * "200" is the legacy socket layer's OK code, "1000" is WebSocket normal closure.
 */
export const CLEAN_CLOSE_CODES: ReadonlySet<string> = new Set(["200", "1000"]);

/**
 * Map a transport close reason onto a connection status.
 *
 * No reason at all is a plain disconnect; any reason outside
 * CLEAN_CLOSE_CODES is a server error.
 */
export function classifyClose(reasonCode?: string): ConnectionStatus {
  if (reasonCode === undefined || CLEAN_CLOSE_CODES.has(reasonCode)) {
    return ConnectionStatus.DISCONNECTED;
  }
  return ConnectionStatus.SERVER_ERROR;
}
