import { describe, expect, it, vi } from 'vitest';
import { ListenerSet, ObservableValue } from './observable.js';

describe('ObservableValue', () => {
  it('notifies with the new and previous value only on change', () => {
    const value = new ObservableValue(1);
    const listener = vi.fn();
    value.subscribe(listener);

    expect(value.set(1)).toBe(false);
    expect(value.set(2)).toBe(true);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(2, 1);
  });

  it('uses the custom equality', () => {
    const value = new ObservableValue({ id: 1 }, { equals: (a, b) => a.id === b.id });
    const listener = vi.fn();
    value.subscribe(listener);

    value.set({ id: 1 });
    expect(listener).not.toHaveBeenCalled();
  });

  it('hands out a read-only view that follows the owner', () => {
    const value = new ObservableValue('a');
    const view = value.asReadonly();
    value.set('b');

    expect(view.get()).toBe('b');
    expect('set' in view).toBe(false);
  });

  it('stops notifying after unsubscribe', () => {
    const value = new ObservableValue(0);
    const listener = vi.fn();
    const unsubscribe = value.subscribe(listener);
    unsubscribe();

    value.set(1);
    expect(listener).not.toHaveBeenCalled();
  });
});

describe('ListenerSet', () => {
  it('keeps calling listeners after one throws', () => {
    const listeners = new ListenerSet<number>('test');
    const second = vi.fn();
    listeners.add(() => {
      throw new Error('boom');
    });
    listeners.add(second);

    listeners.emit(3);
    expect(second).toHaveBeenCalledWith(3);
  });
});
