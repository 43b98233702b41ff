/**
 * In-process pub/sub event bus.
 * Engines emit after a transaction commits; the WebSocket feed rebroadcasts.
 */

export type EventType =
  | 'proposal.created'
  | 'proposal.voted'
  | 'proposal.queued'
  | 'proposal.executed'
  | 'delegation.set'
  | 'governance.parameters.updated'
  | 'oracle.source.set'
  | 'oracle.source.removed'
  | 'oracle.price.aggregated'
  | 'oracle.config.updated';

export type EventCallback = (event: EventType, data: unknown) => void;

export type ListenerErrorHandler = (event: EventType, error: unknown) => void;

export class EventBus {
  private listeners: Map<string, Set<EventCallback>> = new Map();
  private wildcardListeners: Set<EventCallback> = new Set();
  private errorHandler: ListenerErrorHandler | null = null;

  /**
   * Subscribe to a specific event type, or '*' for all events.
   */
  on(event: EventType | '*', callback: EventCallback): () => void {
    if (event === '*') {
      this.wildcardListeners.add(callback);
      return () => {
        this.wildcardListeners.delete(callback);
      };
    }

    const set = this.listeners.get(event) ?? new Set<EventCallback>();
    set.add(callback);
    this.listeners.set(event, set);

    return () => {
      this.listeners.get(event)?.delete(callback);
    };
  }

  /**
   * Where listener exceptions go. They never reach the emitter.
   */
  onListenerError(handler: ListenerErrorHandler | null): void {
    this.errorHandler = handler;
  }

  emit(event: EventType, data: unknown): void {
    const targets = [...(this.listeners.get(event) ?? []), ...this.wildcardListeners];
    for (const cb of targets) {
      try {
        cb(event, data);
      } catch (error) {
        this.errorHandler?.(event, error);
      }
    }
  }

  /**
   * Remove all listeners and the error handler. Useful for tests.
   */
  clear(): void {
    this.listeners.clear();
    this.wildcardListeners.clear();
    this.errorHandler = null;
  }
}

/** Singleton event bus instance for the application. */
export const eventBus = new EventBus();
