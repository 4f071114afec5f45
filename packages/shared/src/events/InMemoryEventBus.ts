import { logger } from '../logger';

import type { EventHandler, IEventBus, PublishedEvent } from './IEventBus';

const HISTORY_LIMIT = 100;

export class InMemoryEventBus implements IEventBus {
  private readonly handlers = new Map<string, Set<EventHandler<unknown>>>();
  private readonly history: PublishedEvent[] = [];

  async publish<T>(eventName: string, payload: T): Promise<void> {
    this.history.push({ eventName, payload, publishedAt: new Date() });
    if (this.history.length > HISTORY_LIMIT) {
      this.history.shift();
    }

    const handlers = this.handlers.get(eventName);
    if (!handlers || handlers.size === 0) {
      logger.debug({ eventName }, 'No handlers registered for event');
      return;
    }

    await Promise.all(Array.from(handlers, async (handler) => handler(payload)));
  }

  subscribe<T>(eventName: string, handler: EventHandler<T>): () => void {
    const handlers = this.handlers.get(eventName) ?? new Set<EventHandler<unknown>>();
    // Handlers only ever receive the payload published under their own event name.
    const erased = handler as EventHandler<unknown>;
    handlers.add(erased);
    this.handlers.set(eventName, handlers);

    return () => {
      const registered = this.handlers.get(eventName);
      if (!registered) return;
      registered.delete(erased);
      if (registered.size === 0) {
        this.handlers.delete(eventName);
      }
    };
  }

  /** Events in publish order, capped at the last hundred. */
  published(eventName?: string): PublishedEvent[] {
    return eventName
      ? this.history.filter((event) => event.eventName === eventName)
      : [...this.history];
  }

  clearAllSubscribers(): void {
    this.handlers.clear();
    this.history.length = 0;
  }
}
