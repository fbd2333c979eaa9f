/**
 * FIFO buffer for envelopes produced while the connection is not open.
 */

import type { Envelope } from "../protocol/index.js";

export class OutboundQueue {
  private _items: Envelope[] = [];

  get size(): number {
    return this._items.length;
  }

  get isEmpty(): boolean {
    return this._items.length === 0;
  }

  enqueue(envelope: Envelope): void {
    this._items.push(envelope);
  }

  /** Remove and return the oldest envelope. */
  dequeue(): Envelope | undefined {
    return this._items.shift();
  }

  /** Put an envelope back at the head, ahead of everything queued. */
  requeueFront(envelope: Envelope): void {
    this._items.unshift(envelope);
  }

  /** Snapshot of queued envelopes in send order. */
  peekAll(): readonly Envelope[] {
    return [...this._items];
  }

  /** Discard everything. Returns how many envelopes were dropped. */
  clear(): number {
    const dropped = this._items.length;
    this._items = [];
    return dropped;
  }
}
