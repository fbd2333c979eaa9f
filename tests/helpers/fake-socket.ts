/**
 * In-process stand-in for a ws socket, handed out by a socket factory.
 */

import { EventEmitter } from "node:events";
import { vi } from "vitest";
import WebSocket from "ws";

import type { WebSocketLike } from "../../src/sdk/transport/websocket.js";

export class FakeSocket extends EventEmitter implements WebSocketLike {
  readyState: number = WebSocket.CONNECTING;

  send = vi.fn<(data: string) => void>();
  close = vi.fn((_code?: number) => {
    this.readyState = WebSocket.CLOSED;
  });
  terminate = vi.fn(() => {
    this.readyState = WebSocket.CLOSED;
    this.emit("close", 1006);
  });

  open(): void {
    this.readyState = WebSocket.OPEN;
    this.emit("open");
  }

  drop(code: number): void {
    this.readyState = WebSocket.CLOSED;
    this.emit("close", code);
  }
}

/** A socket factory that records every socket it creates. */
export function createFakeSocketFactory() {
  const sockets: FakeSocket[] = [];
  const socketFactory = vi.fn((_url: string, _headers?: Record<string, string>) => {
    const socket = new FakeSocket();
    sockets.push(socket);
    return socket;
  });
  return { sockets, socketFactory };
}
