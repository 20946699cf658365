import { logger } from '../logger.js';

export type Listener<T> = (value: T) => void;

/** Calls every listener in registration order; a throwing listener does not stop the others. */
export class ListenerSet<T> {
  #listeners = new Set<Listener<T>>();
  #label: string;

  constructor(label: string) {
    this.#label = label;
  }

  get size(): number {
    return this.#listeners.size;
  }

  add(listener: Listener<T>): () => void {
    this.#listeners.add(listener);
    return () => {
      this.#listeners.delete(listener);
    };
  }

  emit(value: T): void {
    for (const listener of [...this.#listeners]) {
      try {
        listener(value);
      } catch (err) {
        logger.warn({
          event: 'voice_listener_failed',
          channel: this.#label,
          message: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  clear(): void {
    this.#listeners.clear();
  }
}

export interface ReadonlyObservable<T> {
  get(): T;
  /** Registers a change listener; it is not called with the current value. */
  subscribe(listener: (value: T, previous: T) => void): () => void;
}

/**
 * A value with change notification. The owner keeps the instance and hands out
 * `asReadonly()` so that it stays the only writer.
 */
export class ObservableValue<T> implements ReadonlyObservable<T> {
  #value: T;
  #equals: (a: T, b: T) => boolean;
  #listeners: ListenerSet<{ value: T; previous: T }>;

  constructor(initial: T, options?: { label?: string; equals?: (a: T, b: T) => boolean }) {
    this.#value = initial;
    this.#equals = options?.equals ?? Object.is;
    this.#listeners = new ListenerSet(options?.label ?? 'observable');
  }

  get(): T {
    return this.#value;
  }

  /** Returns true when the value changed. */
  set(next: T): boolean {
    const previous = this.#value;
    if (this.#equals(previous, next)) return false;
    this.#value = next;
    this.#listeners.emit({ value: next, previous });
    return true;
  }

  subscribe(listener: (value: T, previous: T) => void): () => void {
    return this.#listeners.add(({ value, previous }) => listener(value, previous));
  }

  asReadonly(): ReadonlyObservable<T> {
    return {
      get: () => this.get(),
      subscribe: (listener) => this.subscribe(listener),
    };
  }
}
