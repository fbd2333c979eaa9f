/**
 * Connection lifecycle: (CONNECTING -> CONNECTED -> DISCONNECTED)*.
 *
 * Also owns the first-connection flag, which gates the one-time
 * Authenticate envelope. Only open and teardown transitions touch it.
 */

export enum ConnectionState {
  DISCONNECTED = "disconnected",
  CONNECTING = "connecting",
  CONNECTED = "connected",
}

export class ConnectionStateMachine {
  private _state: ConnectionState = ConnectionState.DISCONNECTED;
  private _connectedAtLeastOnce: boolean = false;

  get state(): ConnectionState {
    return this._state;
  }

  get isConnected(): boolean {
    return this._state === ConnectionState.CONNECTED;
  }

  /** True until the first open since construction or the last teardown. */
  get isFirstConnection(): boolean {
    return !this._connectedAtLeastOnce;
  }

  /** Caller asked to connect. Allowed from any state. */
  beginConnect(): void {
    this._state = ConnectionState.CONNECTING;
  }

  /** Transport reported open. */
  markOpen(): void {
    this._state = ConnectionState.CONNECTED;
  }

  /** Clear the first-connection flag once open side effects have started. */
  markEstablished(): void {
    this._connectedAtLeastOnce = true;
  }

  /**
   * Transport reported close.
   *
   * Returns false when already DISCONNECTED, meaning the event is stale.
   */
  markClosed(): boolean {
    if (this._state === ConnectionState.DISCONNECTED) {
      return false;
    }
    this._state = ConnectionState.DISCONNECTED;
    return true;
  }

  /**
   * Caller-initiated teardown: DISCONNECTED and "never connected" again.
   *
   * Returns the state held before the teardown.
   */
  teardown(): ConnectionState {
    const previous = this._state;
    this._state = ConnectionState.DISCONNECTED;
    this._connectedAtLeastOnce = false;
    return previous;
  }
}
