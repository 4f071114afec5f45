export type EventHandler<T = unknown> = (payload: T) => Promise<void> | void;

export interface PublishedEvent<T = unknown> {
  eventName: string;
  payload: T;
  publishedAt: Date;
}

export interface IEventBus {
  publish<T = unknown>(eventName: string, payload: T): Promise<void>;
  subscribe?<T = unknown>(eventName: string, handler: EventHandler<T>): () => void;
  clearAllSubscribers?(): void;
}
