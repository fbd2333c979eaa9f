/**
 * Tests for ConnectionStateMachine.
 */

import { describe, it, expect } from "vitest";

import {
  ConnectionState,
  ConnectionStateMachine,
} from "../../src/sdk/connection-state.js";

describe("ConnectionStateMachine", () => {
  it("starts disconnected and never connected", () => {
    const sm = new ConnectionStateMachine();
    expect(sm.state).toBe(ConnectionState.DISCONNECTED);
    expect(sm.isConnected).toBe(false);
    expect(sm.isFirstConnection).toBe(true);
  });

  it("cycles CONNECTING -> CONNECTED -> DISCONNECTED", () => {
    const sm = new ConnectionStateMachine();
    sm.beginConnect();
    expect(sm.state).toBe(ConnectionState.CONNECTING);
    sm.markOpen();
    expect(sm.state).toBe(ConnectionState.CONNECTED);
    expect(sm.markClosed()).toBe(true);
    expect(sm.state).toBe(ConnectionState.DISCONNECTED);
  });

  it("reports a close while already disconnected as stale", () => {
    const sm = new ConnectionStateMachine();
    expect(sm.markClosed()).toBe(false);
  });

  it("keeps the first-connection flag cleared across transport closes", () => {
    const sm = new ConnectionStateMachine();
    sm.beginConnect();
    sm.markOpen();
    sm.markEstablished();
    sm.markClosed();
    sm.markOpen();
    expect(sm.isFirstConnection).toBe(false);
  });

  it("teardown resets the first-connection flag and returns the prior state", () => {
    const sm = new ConnectionStateMachine();
    sm.beginConnect();
    sm.markOpen();
    sm.markEstablished();

    expect(sm.teardown()).toBe(ConnectionState.CONNECTED);
    expect(sm.state).toBe(ConnectionState.DISCONNECTED);
    expect(sm.isFirstConnection).toBe(true);
  });
});
