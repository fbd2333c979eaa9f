/**
 * In-process transport stand-in: records frames the channel sends and lets
 * a test play the server side.
 */

import {
  TransportError,
  decodeEnvelope,
  type DecodedEnvelope,
} from "../../src/protocol/index.js";
import { TransportBase } from "../../src/sdk/transport/base.js";

export class FakeTransport extends TransportBase {
  readonly sent: string[] = [];
  connectCalls = 0;
  disconnectCalls = 0;

  /** Report onOpen from inside connect(). */
  openOnConnect = false;
  /** Report onClose("1000") from inside disconnect(). */
  closeOnDisconnect = false;
  /** Throw TransportError from send(). */
  refuseSends = false;
  /** Runs after every accepted frame. */
  onSend: ((text: string) => void) | null = null;

  connect(): void {
    this.connectCalls += 1;
    if (this.openOnConnect) {
      this.simulateOpen();
    }
  }

  disconnect(): void {
    this.disconnectCalls += 1;
    if (this.closeOnDisconnect) {
      this.simulateClose("1000");
    }
  }

  send(text: string): void {
    if (this.refuseSends) {
      throw new TransportError("socket not open");
    }
    this.sent.push(text);
    this.onSend?.(text);
  }

  simulateOpen(): void {
    this.callbacks?.onOpen();
  }

  simulateClose(reasonCode?: string): void {
    this.callbacks?.onClose(reasonCode);
  }

  simulateText(text: string): void {
    this.callbacks?.onText(text);
  }

  /** Play a server frame built from its parts. */
  deliver(
    sequenceNumber: number,
    messageType: string,
    message: Record<string, unknown>
  ): void {
    this.simulateText(JSON.stringify({ sequenceNumber, messageType, message }));
  }

  sentEnvelopes(): DecodedEnvelope[] {
    return this.sent.map((text) => decodeEnvelope(text));
  }
}
