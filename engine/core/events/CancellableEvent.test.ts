/**
 * Cancellable Event Gate Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { CancellableEvent, CancellableRowChange } from './CancellableEvent.js';

describe('CancellableEvent', () => {
  it('should proceed when nobody is subscribed', () => {
    const event = new CancellableEvent<string>();
    expect(event.hasSubscribers).toBe(false);
    expect(event.isSafeToProceed('row', undefined)).toBe(true);
  });

  it('should proceed when no subscriber cancels', () => {
    const event = new CancellableEvent<string>();
    const first = vi.fn();
    const second = vi.fn();
    event.subscribe(first);
    event.subscribe(second);

    expect(event.isSafeToProceed('row', undefined)).toBe(true);
    expect(first).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('should share one change object in registration order', () => {
    const event = new CancellableEvent<string, Record<string, unknown>>();
    const seen: Array<CancellableRowChange<string, Record<string, unknown>>> = [];
    const order: string[] = [];
    event.subscribe((change) => {
      order.push('a');
      seen.push(change);
    });
    event.subscribe((change) => {
      order.push('b');
      seen.push(change);
    });

    event.isSafeToProceed('row', { name: 'x' });

    expect(order).toEqual(['a', 'b']);
    expect(seen[0]).toBe(seen[1]);
    expect(seen[0].item).toBe('row');
    expect(seen[0].values).toEqual({ name: 'x' });
  });

  it('should stop at the first cancelling subscriber', () => {
    const event = new CancellableEvent<string>();
    const later = vi.fn();
    event.subscribe((change) => {
      change.cancel = true;
    });
    event.subscribe(later);

    expect(event.isSafeToProceed('row', undefined)).toBe(false);
    expect(later).not.toHaveBeenCalled();
  });

  it('should let a later subscriber see an earlier one did not cancel', () => {
    const event = new CancellableEvent<number>();
    event.subscribe(() => undefined);
    event.subscribe((change) => {
      change.cancel = change.item > 10;
    });

    expect(event.isSafeToProceed(5, undefined)).toBe(true);
    expect(event.isSafeToProceed(50, undefined)).toBe(false);
  });

  it('should stop calling an unsubscribed handler', () => {
    const event = new CancellableEvent<string>();
    const handler = vi.fn();
    const unsubscribe = event.subscribe(handler);
    unsubscribe();

    event.isSafeToProceed('row', undefined);
    expect(handler).not.toHaveBeenCalled();
    expect(event.hasSubscribers).toBe(false);
  });

  it('should propagate subscriber exceptions', () => {
    const event = new CancellableEvent<string>();
    event.subscribe(() => {
      throw new Error('handler failed');
    });
    expect(() => event.isSafeToProceed('row', undefined)).toThrow('handler failed');
  });
});
