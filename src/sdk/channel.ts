/**
 * WaveChannel -- the primary client interface.
 *
 * Multiplexes fire-and-forget WaveletUpdate pushes and sequence-correlated
 * SubmitRequest/SubmitResponse pairs over one transport. Envelopes produced
 * while the connection is not open are queued and flushed, in order, on
 * the next open.
 *
 * Transport callbacks are posted to the channel's own inbox and handled
 * one at a time, never interleaved with each other.
 */

import {
  ConnectionLostError,
  ConnectionStatus,
  MessageType,
  PreconditionError,
  SubmitTimeoutError,
  TransportError,
  classifyClose,
  createEnvelope,
  requirePayload,
  serializeEnvelope,
  type ChannelError,
  type Envelope,
  type OpenRequestPayload,
  type SubmitRequestPayload,
  type SubmitResponsePayload,
} from "../protocol/index.js";
import type { ChannelConfig, PendingPolicy } from "./config.js";
import { ConnectionState, ConnectionStateMachine } from "./connection-state.js";
import type { CredentialStore } from "./credentials.js";
import { Dispatcher, type WaveletUpdateListener } from "./dispatcher.js";
import {
  createConsoleLogger,
  noopTimingSink,
  silentLogger,
  timed,
  type Logger,
  type TimingSink,
} from "./logger.js";
import { OutboundQueue } from "./outbound-queue.js";
import {
  PendingCallTable,
  type SubmitFailureCallback,
  type SubmitResponseCallback,
} from "./pending-calls.js";
import {
  createTransport,
  type TransportBase,
  type WebSocketFactory,
} from "./transport/index.js";

const DEFAULT_SESSION_COOKIE = "WSESSIONID";

/** Receives coarse connection-status notifications. */
export type StatusSink = (status: ConnectionStatus) => void;

export interface WaveChannelOptions {
  transport: TransportBase;
  /** Source of the session token sent once per fresh connection. */
  credentials?: CredentialStore | null;
  /** Name the session token is stored under. Defaults to WSESSIONID. */
  sessionCookieName?: string;
  onStatus?: StatusSink;
  pendingPolicy?: PendingPolicy;
  logger?: Logger;
  timing?: TimingSink;
}

interface InboxEvent {
  readonly kind: "open" | "close" | "text";
  readonly run: () => void;
}

export class WaveChannel {
  private _transport: TransportBase;
  private _credentials: CredentialStore | null;
  private _sessionCookieName: string;
  private _statusSink: StatusSink | null;
  private _pendingPolicy: PendingPolicy;
  private _logger: Logger;
  private _timing: TimingSink;

  private _connection = new ConnectionStateMachine();
  private _pending: PendingCallTable;
  private _queue = new OutboundQueue();
  private _dispatcher: Dispatcher;
  private _listener: WaveletUpdateListener | null = null;
  private _sequenceNo: number = 0;

  private _inbox: InboxEvent[] = [];
  private _delivering: boolean = false;

  /**
   * Create a channel over `transport`. No I/O happens here -- call
   * connect() to open.
   */
  constructor(options: WaveChannelOptions) {
    this._transport = options.transport;
    this._credentials = options.credentials ?? null;
    this._sessionCookieName = options.sessionCookieName ?? DEFAULT_SESSION_COOKIE;
    this._statusSink = options.onStatus ?? null;
    this._pendingPolicy = options.pendingPolicy ?? "leave-pending";
    this._logger = options.logger ?? silentLogger;
    this._timing = options.timing ?? noopTimingSink;
    this._pending = new PendingCallTable(this._logger);

    this._dispatcher = new Dispatcher({
      pending: this._pending,
      listener: () => this._listener,
      logger: this._logger,
      timing: this._timing,
    });

    this._transport.bind({
      onOpen: () => this._post({ kind: "open", run: () => this._handleOpen() }),
      onClose: (reasonCode) =>
        this._post({ kind: "close", run: () => this._handleClose(reasonCode) }),
      onText: (text) =>
        this._post({
          kind: "text",
          run: () => {
            this._dispatcher.dispatch(text);
          },
        }),
    });
  }

  // -- Properties ----------------------------------------------------------

  get state(): ConnectionState {
    return this._connection.state;
  }

  /** Whether a connection has opened since construction or the last disconnect. */
  get hasConnected(): boolean {
    return !this._connection.isFirstConnection;
  }

  /** Submitted requests still awaiting a response. */
  get pendingCount(): number {
    return this._pending.size;
  }

  /** Envelopes waiting for the connection to open. */
  get queuedCount(): number {
    return this._queue.size;
  }

  get pendingPolicy(): PendingPolicy {
    return this._pendingPolicy;
  }

  // -- Lifecycle -----------------------------------------------------------

  /**
   * Attach the handler for WaveletUpdate pushes. Updates that arrive
   * before a listener is attached are dropped.
   *
   * @throws {PreconditionError} If a listener is already attached or
   *   `listener` is absent.
   */
  attachListener(listener: WaveletUpdateListener | null | undefined): void {
    if (this._listener !== null) {
      throw new PreconditionError("An update listener is already attached");
    }
    if (listener === null || listener === undefined) {
      throw new PreconditionError("Update listener must not be null");
    }
    this._listener = listener;
  }

  /**
   * Open the connection. Allowed from any state.
   */
  connect(): void {
    this._connection.beginConnect();
    this._logger.info({}, "connecting");
    this._transport.connect();
  }

  /**
   * Fully tear down the connection so the next open counts as a first
   * connection again (and re-authenticates).
   *
   * Requests already sent stay in the pending table unless the channel
   * runs the fail-fast policy.
   */
  disconnect(discardInFlightMessages: boolean = false): void {
    const previous = this._connection.teardown();
    this._transport.disconnect();
    if (discardInFlightMessages) {
      const dropped = this._queue.clear();
      if (dropped > 0) {
        this._logger.info({ dropped }, "discarded queued messages");
      }
    }
    try {
      if (this._pendingPolicy === "fail-fast") {
        this._failPending("Channel disconnected");
      }
    } finally {
      if (previous !== ConnectionState.DISCONNECTED) {
        this._emitStatus(ConnectionStatus.DISCONNECTED);
      }
    }
  }

  // -- Messaging -----------------------------------------------------------

  /**
   * Send a SubmitRequest; `onResponse` runs once with the matching
   * SubmitResponse. Returns the request's sequence number.
   *
   * @throws {PreconditionError} If the payload is not an object or
   *   `onResponse` is not a function.
   */
  submitRequest(
    payload: SubmitRequestPayload,
    onResponse: SubmitResponseCallback,
    onFailure?: SubmitFailureCallback
  ): number {
    requirePayload(payload, MessageType.SUBMIT_REQUEST);
    if (typeof onResponse !== "function") {
      throw new PreconditionError("Response handler must be a function");
    }

    const sequenceNumber = this._nextSequenceNumber();
    this._pending.register(sequenceNumber, {
      onResponse,
      onFailure,
      submittedAt: Date.now(),
    });
    this._send(createEnvelope(sequenceNumber, MessageType.SUBMIT_REQUEST, payload));
    return sequenceNumber;
  }

  /**
   * Promise form of submitRequest.
   *
   * With `timeoutMs`, an unanswered request is abandoned and the promise
   * rejects with SubmitTimeoutError. Under fail-fast it rejects with
   * ConnectionLostError when the connection drops first.
   */
  submit(
    payload: SubmitRequestPayload,
    options: { timeoutMs?: number } = {}
  ): Promise<SubmitResponsePayload> {
    return new Promise<SubmitResponsePayload>((resolve, reject) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | null = null;
      const settle = () => {
        settled = true;
        if (timer !== null) clearTimeout(timer);
      };

      const sequenceNumber = this.submitRequest(
        payload,
        (response) => {
          settle();
          resolve(response);
        },
        (error) => {
          settle();
          reject(error);
        }
      );

      const timeoutMs = options.timeoutMs;
      if (timeoutMs !== undefined && !settled) {
        timer = setTimeout(() => {
          timer = null;
          if (settled) return;
          // The entry may already be gone through abandonRequest.
          this._pending.abandon(sequenceNumber);
          settled = true;
          reject(new SubmitTimeoutError(sequenceNumber, timeoutMs));
        }, timeoutMs);
      }
    });
  }

  /**
   * Send an OpenRequest. Fire-and-forget: updates for the opened wave
   * arrive through the attached listener. Returns the sequence number used.
   */
  openConversation(payload: OpenRequestPayload): number {
    requirePayload(payload, MessageType.OPEN_REQUEST);
    const sequenceNumber = this._nextSequenceNumber();
    this._send(createEnvelope(sequenceNumber, MessageType.OPEN_REQUEST, payload));
    return sequenceNumber;
  }

  /**
   * Unregister a pending request without running its handlers.
   * Returns false if it was not pending.
   */
  abandonRequest(sequenceNumber: number): boolean {
    return this._pending.abandon(sequenceNumber);
  }

  /**
   * Fail every pending request now, regardless of policy.
   * Returns how many were failed.
   */
  failAllPending(error?: ChannelError): number {
    return this._pending.failAll(
      error ?? new ConnectionLostError("Pending requests failed by caller")
    );
  }

  // -- Internals -----------------------------------------------------------

  private _nextSequenceNumber(): number {
    return this._sequenceNo++;
  }

  private _send(envelope: Envelope): void {
    if (this._connection.isConnected && this._transmit(envelope)) {
      return;
    }
    this._queue.enqueue(envelope);
  }

  /** Hand one envelope to the transport; false if the transport refused it. */
  private _transmit(envelope: Envelope): boolean {
    const json = timed(this._timing, "serialize message", () =>
      serializeEnvelope(envelope)
    );
    this._logger.debug({ json }, "sending JSON data");
    try {
      this._transport.send(json);
      return true;
    } catch (err) {
      if (err instanceof TransportError) {
        this._logger.warn(
          { sequenceNumber: envelope.sequenceNumber, error: err.message },
          "transport refused message, queueing"
        );
        return false;
      }
      throw err;
    }
  }

  private _handleOpen(): void {
    this._connection.markOpen();

    // The session token goes over the socket once per fresh connection.
    if (this._connection.isFirstConnection && this._credentials !== null) {
      const token = this._credentials.getToken(this._sessionCookieName);
      if (token !== null) {
        const auth = createEnvelope(
          this._nextSequenceNumber(),
          MessageType.AUTHENTICATE,
          { token }
        );
        // A refused Authenticate still goes out ahead of everything queued.
        if (!this._transmit(auth)) {
          this._queue.requeueFront(auth);
        }
      }
    }
    this._connection.markEstablished();

    // Flush queued messages.
    while (this._connection.isConnected) {
      const next = this._queue.dequeue();
      if (next === undefined) break;
      if (!this._transmit(next)) {
        this._queue.requeueFront(next);
        break;
      }
    }

    this._emitStatus(ConnectionStatus.CONNECTED);
  }

  private _handleClose(reasonCode?: string): void {
    if (!this._connection.markClosed()) {
      this._logger.debug({ reasonCode }, "ignoring close while disconnected");
      return;
    }
    try {
      if (this._pendingPolicy === "fail-fast") {
        this._failPending(`Connection closed (${reasonCode ?? "no status"})`);
      }
    } finally {
      this._emitStatus(classifyClose(reasonCode));
    }
  }

  private _failPending(reason: string): void {
    const failed = this._pending.failAll(new ConnectionLostError(reason));
    if (failed > 0) {
      this._logger.warn({ failed, reason }, "failed pending requests");
    }
  }

  private _emitStatus(status: ConnectionStatus): void {
    this._logger.info({ status }, "connection status");
    this._statusSink?.(status);
  }

  private _post(event: InboxEvent): void {
    this._inbox.push(event);
    if (this._delivering) return;

    this._delivering = true;
    try {
      for (
        let event = this._inbox.shift();
        event !== undefined;
        event = this._inbox.shift()
      ) {
        const kind = event.kind;
        try {
          event.run();
        } catch (err) {
          this._logger.error(
            {
              event: kind,
              error: err instanceof Error ? err.message : String(err),
            },
            "transport event handler failed"
          );
        }
      }
    } finally {
      this._delivering = false;
    }
  }
}

/**
 * Build a channel on the transport, logger and policy described by config.
 *
 * A stored session token is also sent as a cookie on the WebSocket
 * handshake.
 */
export function createChannel(
  config: ChannelConfig,
  options: {
    credentials?: CredentialStore | null;
    onStatus?: StatusSink;
    logger?: Logger;
    timing?: TimingSink;
    socketFactory?: WebSocketFactory;
  } = {}
): WaveChannel {
  const logger = options.logger ?? createConsoleLogger(config.logLevel);
  const credentials = options.credentials ?? null;
  const token = credentials?.getToken(config.sessionCookieName) ?? null;
  const headers =
    token === null ? undefined : { Cookie: `${config.sessionCookieName}=${token}` };

  return new WaveChannel({
    transport: createTransport(config, {
      logger,
      headers,
      socketFactory: options.socketFactory,
    }),
    credentials,
    sessionCookieName: config.sessionCookieName,
    onStatus: options.onStatus,
    pendingPolicy: config.pendingPolicy,
    logger,
    timing: options.timing,
  });
}
