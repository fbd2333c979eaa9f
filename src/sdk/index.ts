/**
 * Channel SDK -- the caller-facing API.
 */

export { WaveChannel, createChannel, type StatusSink, type WaveChannelOptions } from "./channel.js";
export { ChannelConfig, type ChannelConfigOptions, type PendingPolicy } from "./config.js";
export { ConnectionState, ConnectionStateMachine } from "./connection-state.js";
export { Dispatcher, type DispatchOutcome, type WaveletUpdateListener } from "./dispatcher.js";
export { OutboundQueue } from "./outbound-queue.js";
export {
  PendingCallTable,
  type PendingCall,
  type SubmitResponseCallback,
  type SubmitFailureCallback,
} from "./pending-calls.js";
export {
  MemoryCredentialStore,
  FileCredentialStore,
  type CredentialStore,
} from "./credentials.js";
export {
  createConsoleLogger,
  silentLogger,
  noopTimingSink,
  timed,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type TimingSink,
} from "./logger.js";
export {
  TransportBase,
  WebSocketTransport,
  createTransport,
  type TransportCallbacks,
  type WebSocketTransportOptions,
} from "./transport/index.js";
