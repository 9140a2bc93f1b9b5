/**
 * Simple in-memory pub/sub event bus.
 * Services emit governance events; the WebSocket handler broadcasts them.
 */

export type EventType =
  | 'participant.registered'
  | 'stake.committed'
  | 'proposal.created'
  | 'vote.cast'
  | 'proposal.executed'
  | 'clock.advanced'
  | 'custody.credited';

export type EventCallback = (event: EventType, data: unknown) => void;

class EventBus {
  private listeners: Map<string, Set<EventCallback>> = new Map();
  private wildcardListeners: Set<EventCallback> = new Set();
  private listenerErrors = 0;

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

    let specific = this.listeners.get(event);
    if (!specific) {
      specific = new Set();
      this.listeners.set(event, specific);
    }
    specific.add(callback);

    return () => {
      this.listeners.get(event)?.delete(callback);
    };
  }

  /**
   * Emit an event to all matching subscribers. A throwing listener is
   * counted and does not stop delivery to the others.
   */
  emit(event: EventType, data: unknown): void {
    const targets = [...(this.listeners.get(event) ?? []), ...this.wildcardListeners];
    for (const cb of targets) {
      try {
        cb(event, data);
      } catch {
        this.listenerErrors += 1;
      }
    }
  }

  failedDeliveries(): number {
    return this.listenerErrors;
  }

  /**
   * Remove all listeners. Useful for tests.
   */
  clear(): void {
    this.listeners.clear();
    this.wildcardListeners.clear();
    this.listenerErrors = 0;
  }
}

/** Singleton event bus instance for the application. */
export const eventBus = new EventBus();
