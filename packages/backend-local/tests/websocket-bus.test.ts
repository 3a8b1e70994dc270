import { describe, expect, it, vi } from "vitest";
import type { WebSocket } from "ws";

import { WebSocketBus } from "../src/adapters/WebSocketBus.js";
import type { SessionEvent } from "../src/core.js";

interface FakeSocket {
  readonly socket: WebSocket;
  readonly send: ReturnType<typeof vi.fn>;
  emit(event: string, ...args: unknown[]): void;
}

function createFakeSocket(readyState = 1): FakeSocket {
  const handlers = new Map<string, Array<(...args: unknown[]) => void>>();
  const send = vi.fn();
  const socket = {
    readyState,
    send,
    on: vi.fn((event: string, handler: (...args: unknown[]) => void) => {
      const list = handlers.get(event) ?? [];
      list.push(handler);
      handlers.set(event, list);
      return socket;
    }),
  };

  return {
    socket: socket as unknown as WebSocket,
    send,
    emit(event: string, ...args: unknown[]): void {
      for (const handler of handlers.get(event) ?? []) {
        handler(...args);
      }
    },
  } satisfies FakeSocket;
}

const voteCast: SessionEvent = {
  type: "vote_cast",
  sessionId: "room01",
  at: 1_000,
  participantId: "p-ada",
};

describe("WebSocketBus", () => {
  it("delivers published events to attached sockets as JSON", async () => {
    const bus = new WebSocketBus();
    const clientA = createFakeSocket();
    const clientB = createFakeSocket();

    bus.attach("session:room01", clientA.socket);
    bus.attach("session:room01", clientB.socket);

    await bus.publish("session:room01", voteCast);

    const expected =
      '{"type":"vote_cast","sessionId":"room01","at":1000,"participantId":"p-ada"}';
    expect(clientA.send).toHaveBeenCalledWith(expected);
    expect(clientB.send).toHaveBeenCalledWith(expected);
    expect(bus.clientCount).toBe(2);
  });

  it("keeps channels apart", async () => {
    const bus = new WebSocketBus();
    const client = createFakeSocket();

    bus.attach("session:other", client.socket);
    await bus.publish("session:room01", voteCast);

    expect(client.send).not.toHaveBeenCalled();
  });

  it("also notifies in-process subscribers", async () => {
    const bus = new WebSocketBus();
    const listener = vi.fn();

    const unsubscribe = bus.subscribe("session:room01", listener);
    await bus.publish("session:room01", voteCast);
    unsubscribe();
    await bus.publish("session:room01", voteCast);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(voteCast);
  });

  it("removes closed sockets", async () => {
    const bus = new WebSocketBus();
    const client = createFakeSocket();

    bus.attach("session:room01", client.socket);
    client.emit("close");
    client.emit("close");

    await bus.publish("session:room01", voteCast);

    expect(client.send).not.toHaveBeenCalled();
    expect(bus.clientCount).toBe(0);
  });

  it("skips sockets that are not open", async () => {
    const bus = new WebSocketBus();
    const closing = createFakeSocket(2);

    bus.attach("session:room01", closing.socket);
    await bus.publish("session:room01", voteCast);

    expect(closing.send).not.toHaveBeenCalled();
  });

  it("logs delivery failures and keeps serving other sockets", async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const bus = new WebSocketBus(logger);
    const broken = createFakeSocket();
    const healthy = createFakeSocket();
    broken.send.mockImplementation(() => {
      throw new Error("EPIPE");
    });

    bus.attach("session:room01", broken.socket);
    bus.attach("session:room01", healthy.socket);
    await bus.publish("session:room01", voteCast);

    expect(healthy.send).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith("Failed to deliver event", {
      channel: "session:room01",
      error: expect.any(Error),
    });
  });
});
