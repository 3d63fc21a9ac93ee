/**
 * Typed event emitter used by the register poller.
 *
 * Listeners run synchronously in registration order; a listener added or
 * removed during `emit` takes effect from the next emit.
 */
export class EventEmitter<
  T extends Record<string, unknown[]> = Record<string, unknown[]>,
> {
  #listeners: { [K in keyof T]?: Array<(...args: T[K]) => void> } = {};

  on<K extends keyof T>(event: K, listener: (...args: T[K]) => void): this {
    const eventListeners = this.#listeners[event] ?? [];
    eventListeners.push(listener);
    this.#listeners[event] = eventListeners;
    return this;
  }

  /** Register a listener removed after its first call. */
  once<K extends keyof T>(event: K, listener: (...args: T[K]) => void): this {
    const wrapper = (...args: T[K]) => {
      this.off(event, wrapper);
      listener(...args);
    };
    return this.on(event, wrapper);
  }

  off<K extends keyof T>(event: K, listener: (...args: T[K]) => void): this {
    const eventListeners = this.#listeners[event];
    const index = eventListeners?.indexOf(listener) ?? -1;
    if (eventListeners && index !== -1) {
      eventListeners.splice(index, 1);
    }
    return this;
  }

  listenerCount(event: keyof T): number {
    return this.#listeners[event]?.length ?? 0;
  }

  /** Drop the listeners of `event`, or of every event. */
  removeAllListeners(event?: keyof T): this {
    if (event === undefined) {
      this.#listeners = {};
    } else {
      delete this.#listeners[event];
    }
    return this;
  }

  /** Returns false when nobody listened. */
  emit<K extends keyof T>(event: K, ...args: T[K]): boolean {
    const eventListeners = this.#listeners[event];
    if (!eventListeners || eventListeners.length === 0) return false;
    for (const listener of [...eventListeners]) {
      listener(...args);
    }
    return true;
  }
}
