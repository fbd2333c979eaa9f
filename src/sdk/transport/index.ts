/**
 * Channel transport layer.
 */

import type { ChannelConfig } from "../config.js";
import type { Logger } from "../logger.js";
import { TransportBase } from "./base.js";
import { WebSocketTransport, type WebSocketFactory } from "./websocket.js";

export { TransportBase, type TransportCallbacks } from "./base.js";
export {
  WebSocketTransport,
  defaultWebSocketFactory,
  type WebSocketTransportOptions,
  type WebSocketFactory,
  type WebSocketLike,
} from "./websocket.js";

/**
 * Factory to create the transport described by config.
 */
export function createTransport(
  config: ChannelConfig,
  options: {
    logger?: Logger;
    headers?: Record<string, string>;
    socketFactory?: WebSocketFactory;
  } = {}
): TransportBase {
  return new WebSocketTransport(config.socketUrl, {
    reconnect: config.reconnect,
    connectTimeoutMs: config.connectTimeoutMs,
    headers: options.headers,
    logger: options.logger,
    socketFactory: options.socketFactory,
  });
}
