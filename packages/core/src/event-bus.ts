/**
 * @module event-bus
 * Type-safe pub/sub emitter for diagnostics.
 *
 * The registry and the loader report through the bus; whoever hosts them
 * decides whether anything is printed.
 *
 * @see {@link @lexicon/types#EventBus} for the interface contract
 * @see {@link @lexicon/types#EventMap} for the event catalogue
 */

import type { EventBus, EventCallback, EventMap } from '@lexicon/types';

type EventName = keyof EventMap;

/** Generic callback type used internally by the event bus. */
type Callback = (payload: unknown) => void;

/** A subscription. `once` listeners are dropped before their first call. */
interface Listener {
  callback: Callback;
  once: boolean;
}

/**
 * Concrete implementation of {@link EventBus}.
 *
 * Listeners are kept per event in subscription order. A callback subscribed
 * twice is called twice; `off` removes its first subscription, while the
 * function returned by `on`/`once` removes exactly the one it created.
 */
export class EventBusImpl implements EventBus {
  private listeners = new Map<EventName, Listener[]>();

  /** @inheritdoc */
  on<K extends EventName>(event: K, callback: EventCallback<K>): () => void {
    return this.subscribe(event, callback as Callback, false);
  }

  /** @inheritdoc */
  once<K extends EventName>(event: K, callback: EventCallback<K>): () => void {
    return this.subscribe(event, callback as Callback, true);
  }

  /** @inheritdoc */
  off<K extends EventName>(event: K, callback: EventCallback<K>): void {
    this.remove(event, callback as Callback);
  }

  /** @inheritdoc */
  emit<K extends EventName>(event: K, payload: EventMap[K]): void {
    const list = this.listeners.get(event);
    if (!list) return;

    // Snapshot: listeners added or removed while emitting take effect next time.
    for (const listener of [...list]) {
      if (listener.once) {
        this.detach(event, listener);
      }
      listener.callback(payload);
    }
  }

  /** @inheritdoc */
  clear(): void {
    this.listeners.clear();
  }

  /** Number of listeners currently subscribed to `event`. */
  listenerCount(event: EventName): number {
    return this.listeners.get(event)?.length ?? 0;
  }

  private subscribe(event: EventName, callback: Callback, once: boolean): () => void {
    const listener: Listener = { callback, once };
    const list = this.listeners.get(event) ?? [];
    list.push(listener);
    this.listeners.set(event, list);
    return () => this.detach(event, listener);
  }

  private remove(event: EventName, callback: Callback): void {
    const listener = this.listeners.get(event)?.find((l) => l.callback === callback);
    if (listener) {
      this.detach(event, listener);
    }
  }

  private detach(event: EventName, listener: Listener): void {
    const list = this.listeners.get(event);
    if (!list) return;

    const index = list.indexOf(listener);
    if (index === -1) return;

    list.splice(index, 1);
    if (list.length === 0) {
      this.listeners.delete(event);
    }
  }
}
