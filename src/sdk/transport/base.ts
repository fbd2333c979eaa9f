/**
 * Abstract transport for the channel's single bidirectional text stream.
 *
 * The channel never awaits a transport: connect/disconnect/send hand off
 * and return, and the transport reports back through the bound callbacks.
 * A transport must not deliver a callback re-entrantly from inside
 * another one.
 */

import { PreconditionError } from "../../protocol/index.js";

export interface TransportCallbacks {
  onOpen(): void;
  /** `reasonCode` is absent when the close carried no status. */
  onClose(reasonCode?: string): void;
  onText(text: string): void;
}

export abstract class TransportBase {
  private _callbacks: TransportCallbacks | null = null;

  /**
   * Attach the receiver of transport events. A transport serves one channel.
   *
   * @throws {PreconditionError} If callbacks are already bound.
   */
  bind(callbacks: TransportCallbacks): void {
    if (this._callbacks !== null) {
      throw new PreconditionError("Transport is already bound to a channel");
    }
    this._callbacks = callbacks;
  }

  /** Bound callbacks; events raised before binding are dropped. */
  protected get callbacks(): TransportCallbacks | null {
    return this._callbacks;
  }

  /** Begin opening the connection. */
  abstract connect(): void;

  /** Close the connection. No onClose is reported for this. */
  abstract disconnect(): void;

  /**
   * Hand one frame to the connection.
   *
   * @throws {TransportError} If the connection is not open.
   */
  abstract send(text: string): void;
}
