/* eslint-disable functional/immutable-data */
import type { WebSocket } from "ws";

import { InMemoryPubSub } from "../core.js";
import type { EventListener, Logger, PubSub, SessionEvent, Unsubscribe } from "../core.js";

const OPEN = 1;

/**
 * Session event bus that also forwards every event on a channel to the
 * WebSocket clients attached to it, serialized as JSON.
 */
export class WebSocketBus implements PubSub<SessionEvent> {
  readonly #topics: InMemoryPubSub<SessionEvent>;
  readonly #logger: Logger | undefined;
  #clients = 0;

  constructor(logger?: Logger) {
    this.#logger = logger;
    this.#topics = new InMemoryPubSub(logger);
  }

  get clientCount(): number {
    return this.#clients;
  }

  async publish(channel: string, event: SessionEvent): Promise<void> {
    await this.#topics.publish(channel, event);
    this.#logger?.debug("Event published", { channel, type: event.type });
  }

  subscribe(channel: string, listener: EventListener<SessionEvent>): Unsubscribe {
    return this.#topics.subscribe(channel, listener);
  }

  unsubscribe(channel: string, listener: EventListener<SessionEvent>): void {
    this.#topics.unsubscribe(channel, listener);
  }

  attach(channel: string, socket: WebSocket): void {
    const forward: EventListener<SessionEvent> = (event) => {
      if (socket.readyState !== OPEN) {
        return;
      }
      try {
        socket.send(JSON.stringify(event));
      } catch (error) {
        this.#logger?.warn("Failed to deliver event", { channel, error });
      }
    };

    const detach = this.#topics.subscribe(channel, forward);
    this.#clients += 1;
    this.#logger?.info("WebSocket client attached", {
      channel,
      size: this.#topics.subscriberCount(channel),
    });

    let closed = false;
    socket.on("close", () => {
      if (closed) {
        return;
      }
      closed = true;
      detach();
      this.#clients -= 1;
      this.#logger?.info("WebSocket client disconnected", {
        channel,
        size: this.#topics.subscriberCount(channel),
      });
    });

    socket.on("error", (error: Error) => {
      this.#logger?.warn("WebSocket client error", { channel, error });
    });
  }
}
