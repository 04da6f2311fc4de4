/**
 * Async Event
 *
 * Notification-only event. Handlers may return a promise; they are awaited
 * one at a time in registration order, never in parallel.
 */

export type AsyncEventHandler<TArgs> = (args: TArgs) => void | Promise<void>;

export class AsyncEvent<TArgs> {
  private readonly handlers: AsyncEventHandler<TArgs>[] = [];

  /**
   * @returns Unsubscribe function removing this registration
   */
  subscribe = (handler: AsyncEventHandler<TArgs>): (() => void) => {
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
   * Invoke every handler sequentially.
   * A throwing or rejecting handler rejects the returned promise and
   * later handlers do not run.
   */
  async invoke(args: TArgs): Promise<void> {
    for (const handler of this.handlers.slice()) {
      await handler(args);
    }
  }
}
