import { toError } from '../errors.js';
import { logger } from '../logger.js';

export type EventMap<T> = { [K in keyof T]: unknown[] };

type Subscription<Args extends unknown[]> = {
  listener: (...args: Args) => void;
  once: boolean;
};

type SubscriptionTable<Events extends EventMap<Events>> = {
  [K in keyof Events]?: Array<Subscription<Events[K]>>;
};

/**
 * Typed publish/subscribe channel. Delivery is deferred to the microtask queue so listener work
 * never runs on the publisher's stack; FIFO microtasks keep emission order.
 */
export class EventChannel<Events extends EventMap<Events>> {
  private readonly subscriptions: SubscriptionTable<Events> = {};

  on<K extends keyof Events>(event: K, listener: (...args: Events[K]) => void): () => void {
    return this.subscribe(event, { listener, once: false });
  }

  once<K extends keyof Events>(event: K, listener: (...args: Events[K]) => void): () => void {
    return this.subscribe(event, { listener, once: true });
  }

  off<K extends keyof Events>(event: K, listener: (...args: Events[K]) => void): void {
    const list = this.subscriptions[event];
    if (!list) return;
    const idx = list.findIndex((s) => s.listener === listener);
    if (idx >= 0) list.splice(idx, 1);
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.subscriptions[event]?.length ?? 0;
  }

  emit<K extends keyof Events>(event: K, ...args: Events[K]): void {
    queueMicrotask(() => this.deliver(event, args));
  }

  removeAllListeners(): void {
    for (const key of Object.keys(this.subscriptions)) {
      Reflect.deleteProperty(this.subscriptions, key);
    }
  }

  private subscribe<K extends keyof Events>(event: K, subscription: Subscription<Events[K]>): () => void {
    const list: Array<Subscription<Events[K]>> = this.subscriptions[event] ?? [];
    list.push(subscription);
    this.subscriptions[event] = list;
    return () => {
      const idx = list.indexOf(subscription);
      if (idx >= 0) list.splice(idx, 1);
    };
  }

  private deliver<K extends keyof Events>(event: K, args: Events[K]): void {
    const list = this.subscriptions[event];
    if (!list || list.length === 0) return;
    for (const subscription of [...list]) {
      if (subscription.once) {
        const idx = list.indexOf(subscription);
        if (idx >= 0) list.splice(idx, 1);
      }
      try {
        subscription.listener(...args);
      } catch (err) {
        logger.error({ event: 'realtime_listener_failed', channel: String(event), message: toError(err).message });
      }
    }
  }
}
