/* eslint-disable functional/immutable-data */
import type { Logger } from "../../domain/ports/Logger.js";
import type { EventListener, PubSub, Unsubscribe } from "../../domain/ports/MessageBus.js";

/**
 * Process-local topic fan-out. Delivery is synchronous and in publish order;
 * a throwing listener is logged and does not stop delivery to the others.
 */
export class InMemoryPubSub<TEvent extends object = object> implements PubSub<TEvent> {
  #channels = new Map<string, Set<EventListener<TEvent>>>();
  readonly #logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.#logger = logger;
  }

  async publish(channel: string, event: TEvent): Promise<void> {
    const listeners = this.#channels.get(channel);
    if (!listeners) {
      return;
    }

    for (const listener of [...listeners]) {
      try {
        listener(event);
      } catch (error) {
        this.#logger?.warn("Event listener failed", { channel, error });
      }
    }
  }

  subscribe(channel: string, listener: EventListener<TEvent>): Unsubscribe {
    let listeners = this.#channels.get(channel);
    if (!listeners) {
      listeners = new Set();
      this.#channels.set(channel, listeners);
    }
    listeners.add(listener);

    return () => this.unsubscribe(channel, listener);
  }

  unsubscribe(channel: string, listener: EventListener<TEvent>): void {
    const listeners = this.#channels.get(channel);
    if (!listeners) {
      return;
    }
    listeners.delete(listener);
    if (listeners.size === 0) {
      this.#channels.delete(channel);
    }
  }

  subscriberCount(channel: string): number {
    return this.#channels.get(channel)?.size ?? 0;
  }
}
