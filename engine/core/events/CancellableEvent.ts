/**
 * Cancellable Event Gate
 *
 * Veto protocol run before a row is inserted, updated or removed.
 * Subscribers run synchronously in registration order and share one
 * CancellableRowChange; the first one that sets `cancel` stops the rest.
 */

/**
 * Row change offered to cancellable subscribers
 */
export class CancellableRowChange<TItem, TValues = undefined> {
  readonly item: TItem;
  /** Staged field values (inserts and updates only) */
  readonly values: TValues;
  /** Set to true to abort the change */
  cancel = false;

  constructor(item: TItem, values: TValues) {
    this.item = item;
    this.values = values;
  }
}

export type CancellableRowChangeHandler<TItem, TValues = undefined> = (
  change: CancellableRowChange<TItem, TValues>
) => void;

export class CancellableEvent<TItem, TValues = undefined> {
  private readonly handlers: CancellableRowChangeHandler<TItem, TValues>[] = [];

  /**
   * Add a subscriber. The same function may be added more than once;
   * each registration runs.
   * @returns Unsubscribe function removing this registration
   */
  subscribe = (handler: CancellableRowChangeHandler<TItem, TValues>): (() => void) => {
    this.handlers.push(handler);
    return () => {
      const index = this.handlers.lastIndexOf(handler);
      if (index >= 0) {
        this.handlers.splice(index, 1);
      }
    };
  };

  get hasSubscribers(): boolean {
    return this.handlers.length > 0;
  }

  /**
   * Run every subscriber until one cancels.
   * Subscriber exceptions propagate to the caller.
   * @returns true if nobody cancelled (or nobody is subscribed)
   */
  isSafeToProceed(item: TItem, values: TValues): boolean {
    if (this.handlers.length === 0) {
      return true;
    }

    const change = new CancellableRowChange<TItem, TValues>(item, values);

    // Snapshot so a subscriber that unsubscribes mid-run does not shift the list
    for (const handler of this.handlers.slice()) {
      handler(change);

      if (change.cancel) {
        return false;
      }
    }

    return true;
  }
}
