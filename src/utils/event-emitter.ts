/**
 * Type-safe synchronous event emitter
 */

export type EventHandler<T = unknown> = (data: T) => void;

type HandlerMap<TEvents> = {
  [K in keyof TEvents]?: Set<EventHandler<TEvents[K]>>;
};

export class TypedEventEmitter<TEvents extends Record<string, unknown>> {
  private handlers: HandlerMap<TEvents> = {};

  /**
   * Register an event handler
   */
  on<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): this {
    const set = this.handlers[event] ?? new Set<EventHandler<TEvents[K]>>();
    set.add(handler);
    this.handlers[event] = set;
    return this;
  }

  /**
   * Unregister an event handler
   */
  off<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): this {
    const set = this.handlers[event];
    if (set) {
      set.delete(handler);
      if (set.size === 0) {
        delete this.handlers[event];
      }
    }
    return this;
  }

  /**
   * Deliver an event to every handler, in registration order
   */
  emit<K extends keyof TEvents>(event: K, data: TEvents[K]): void {
    const set = this.handlers[event];
    if (!set) return;
    // Copy so handlers may unsubscribe while being called
    for (const handler of [...set]) {
      handler(data);
    }
  }

  listenerCount(event: keyof TEvents): number {
    return this.handlers[event]?.size ?? 0;
  }
}
