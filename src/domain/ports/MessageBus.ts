export type Unsubscribe = () => void;

export type EventListener<TEvent extends object> = (event: TEvent) => void;

/** Outbound half: fan an event out to whoever listens on a channel. */
export interface MessageBus<TEvent extends object = object> {
  publish(channel: string, event: TEvent): Promise<void>;
}

/**
 * Inbound half. Listeners receive events in emission order while subscribed;
 * nothing is replayed to late subscribers.
 */
export interface EventSource<TEvent extends object = object> {
  subscribe(channel: string, listener: EventListener<TEvent>): Unsubscribe;
  unsubscribe(channel: string, listener: EventListener<TEvent>): void;
}

export type PubSub<TEvent extends object = object> = MessageBus<TEvent> & EventSource<TEvent>;
