/**
 * wave-channel -- sequenced message channel for the wave socket protocol.
 *
 * Top-level package exports: WaveChannel, configuration, transports, protocol.
 */

export {
  WaveChannel,
  createChannel,
  ChannelConfig,
  ConnectionState,
  MemoryCredentialStore,
  FileCredentialStore,
  WebSocketTransport,
  TransportBase,
  createTransport,
  createConsoleLogger,
  silentLogger,
} from "./sdk/index.js";
export type {
  StatusSink,
  WaveChannelOptions,
  PendingPolicy,
  CredentialStore,
  Logger,
  TimingSink,
  TransportCallbacks,
  WaveletUpdateListener,
} from "./sdk/index.js";
export * as protocol from "./protocol/index.js";
export {
  MessageType,
  ConnectionStatus,
  ChannelError,
  MalformedEnvelopeError,
  PreconditionError,
  TransportError,
  ConnectionLostError,
  SubmitTimeoutError,
} from "./protocol/index.js";
