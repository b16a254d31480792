/**
 * Minimal typed event emitter. `Events` maps each event name to the tuple of
 * arguments its handlers receive.
 */
export class EventEmitter<Events extends Record<string, unknown[]> = Record<string, unknown[]>> {
  private handlers: { [K in keyof Events]?: Set<(...args: Events[K]) => void> } = {};

  on<K extends keyof Events & string>(event: K, handler: (...args: Events[K]) => void): void {
    let set = this.handlers[event];
    if (!set) {
      set = new Set();
      this.handlers[event] = set;
    }
    set.add(handler);
  }

  off<K extends keyof Events & string>(event: K, handler: (...args: Events[K]) => void): void {
    const set = this.handlers[event];
    if (!set) {
      return;
    }
    set.delete(handler);
    if (set.size === 0) {
      delete this.handlers[event];
    }
  }

  /**
   * Register a handler that removes itself after its first call.
   */
  once<K extends keyof Events & string>(event: K, handler: (...args: Events[K]) => void): void {
    const wrapper = (...args: Events[K]): void => {
      this.off(event, wrapper);
      handler(...args);
    };
    this.on(event, wrapper);
  }

  /**
   * Call every handler for `event`. A handler that throws is logged and the
   * remaining handlers still run.
   */
  emit<K extends keyof Events & string>(event: K, ...args: Events[K]): void {
    const set = this.handlers[event];
    if (!set) {
      return;
    }
    for (const handler of [...set]) {
      try {
        handler(...args);
      } catch (error) {
        console.error(`[EventEmitter] Error in handler for "${event}":`, error);
      }
    }
  }

  listenerCount<K extends keyof Events & string>(event: K): number {
    return this.handlers[event]?.size ?? 0;
  }

  removeAllListeners<K extends keyof Events & string>(event?: K): void {
    if (event === undefined) {
      this.handlers = {};
    } else {
      delete this.handlers[event];
    }
  }
}
