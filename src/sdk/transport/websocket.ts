/**
 * WebSocket transport with exponential backoff and jitter.
 *
 * Keeps one socket to the server. When reconnection is enabled and the
 * socket drops, it retries with exponential backoff plus random jitter to
 * prevent thundering herd, reporting onClose for the drop and onOpen again
 * once a retry succeeds.
 */

import WebSocket from "ws";

import { TransportError } from "../../protocol/index.js";
import { silentLogger, type Logger } from "../logger.js";
import { TransportBase } from "./base.js";

// Reconnection defaults
const BASE_DELAY_MS = 1000; // Initial delay
const MAX_DELAY_MS = 60000; // Maximum delay cap
const JITTER_RANGE_MS = 1000; // Random jitter 0 to JITTER_RANGE_MS
const CONNECT_TIMEOUT_MS = 30000;

// RFC 6455: "no status code was actually present"
const NO_STATUS_RECEIVED = 1005;
const NORMAL_CLOSURE = 1000;

/** The slice of a ws socket the transport drives. */
export interface WebSocketLike {
  readonly readyState: number;
  on(event: "open", listener: () => void): this;
  on(event: "message", listener: (data: WebSocket.RawData) => void): this;
  on(event: "close", listener: (code: number) => void): this;
  on(event: "error", listener: (err: Error) => void): this;
  send(data: string): void;
  close(code?: number): void;
  terminate(): void;
  removeAllListeners(): this;
}

export type WebSocketFactory = (
  url: string,
  headers?: Record<string, string>
) => WebSocketLike;

export const defaultWebSocketFactory: WebSocketFactory = (url, headers) =>
  new WebSocket(url, { headers });

export interface WebSocketTransportOptions {
  reconnect?: boolean;
  connectTimeoutMs?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitterMs?: number;
  headers?: Record<string, string>;
  logger?: Logger;
  socketFactory?: WebSocketFactory;
}

export class WebSocketTransport extends TransportBase {
  private _url: string;
  private _reconnect: boolean;
  private _connectTimeoutMs: number;
  private _baseDelayMs: number;
  private _maxDelayMs: number;
  private _jitterMs: number;
  private _headers: Record<string, string> | undefined;
  private _logger: Logger;
  private _socketFactory: WebSocketFactory;

  private _ws: WebSocketLike | null = null;
  private _running: boolean = false;
  private _attempt: number = 0;
  private _reconnectTimeout: ReturnType<typeof setTimeout> | null = null;
  private _connectTimeout: ReturnType<typeof setTimeout> | null = null;

  constructor(url: string, options: WebSocketTransportOptions = {}) {
    super();
    this._url = url;
    this._reconnect = options.reconnect ?? true;
    this._connectTimeoutMs = options.connectTimeoutMs ?? CONNECT_TIMEOUT_MS;
    this._baseDelayMs = options.baseDelayMs ?? BASE_DELAY_MS;
    this._maxDelayMs = options.maxDelayMs ?? MAX_DELAY_MS;
    this._jitterMs = options.jitterMs ?? JITTER_RANGE_MS;
    this._headers = options.headers;
    this._logger = options.logger ?? silentLogger;
    this._socketFactory = options.socketFactory ?? defaultWebSocketFactory;
  }

  get url(): string {
    return this._url;
  }

  /** Whether a socket is currently open. */
  get isOpen(): boolean {
    return this._ws !== null && this._ws.readyState === WebSocket.OPEN;
  }

  connect(): void {
    this._teardownSocket();
    this._running = true;
    this._attempt = 0;
    this._tryConnect();
  }

  disconnect(): void {
    this._running = false;
    this._teardownSocket();
  }

  send(text: string): void {
    if (!this._ws || this._ws.readyState !== WebSocket.OPEN) {
      throw new TransportError("WebSocket not connected");
    }
    this._ws.send(text);
  }

  private _tryConnect(): void {
    if (!this._running) return;

    const ws = this._socketFactory(this._url, this._headers);
    this._ws = ws;

    this._connectTimeout = setTimeout(() => {
      this._connectTimeout = null;
      this._logger.warn(
        { url: this._url, timeoutMs: this._connectTimeoutMs },
        "WebSocket connection timeout"
      );
      // terminate() makes ws emit close with 1006
      ws.terminate();
    }, this._connectTimeoutMs);

    ws.on("open", () => {
      this._clearConnectTimeout();
      this._attempt = 0; // Reset on successful connection
      this._logger.info({ url: this._url }, "WebSocket open");
      this.callbacks?.onOpen();
    });

    ws.on("message", (data: WebSocket.RawData) => {
      this.callbacks?.onText(rawDataToText(data));
    });

    ws.on("close", (code: number) => {
      this._clearConnectTimeout();
      if (this._ws === ws) {
        this._ws = null;
      }
      this._logger.info({ url: this._url, code }, "WebSocket closed");
      this.callbacks?.onClose(
        code === NO_STATUS_RECEIVED ? undefined : String(code)
      );
      this._scheduleReconnect();
    });

    ws.on("error", (err: Error) => {
      // close follows every error
      this._logger.warn({ url: this._url, error: err.message }, "WebSocket error");
    });
  }

  private _scheduleReconnect(): void {
    if (!this._running || !this._reconnect) return;

    this._attempt += 1;
    const delay = Math.min(
      this._baseDelayMs * Math.pow(2, this._attempt),
      this._maxDelayMs
    );
    const jitter = Math.random() * this._jitterMs;

    this._reconnectTimeout = setTimeout(() => {
      this._reconnectTimeout = null;
      this._tryConnect();
    }, delay + jitter);
  }

  private _clearConnectTimeout(): void {
    if (this._connectTimeout !== null) {
      clearTimeout(this._connectTimeout);
      this._connectTimeout = null;
    }
  }

  private _teardownSocket(): void {
    if (this._reconnectTimeout !== null) {
      clearTimeout(this._reconnectTimeout);
      this._reconnectTimeout = null;
    }
    this._clearConnectTimeout();
    if (this._ws) {
      this._ws.removeAllListeners();
      // ws raises "error" when closed mid-handshake
      this._ws.on("error", (err: Error) => {
        this._logger.debug({ url: this._url, error: err.message }, "WebSocket aborted");
      });
      this._ws.close(NORMAL_CLOSURE);
      this._ws = null;
    }
  }
}

function rawDataToText(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  return Buffer.from(data).toString("utf8");
}
