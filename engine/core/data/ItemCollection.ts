/**
 * Item Collection
 *
 * Adapter over the host-supplied data source. Arrays (unless frozen) and Sets
 * are mutated in place so the host sees inserts and removals. Any other
 * iterable is copied once into a frozen array: it is read-only, and changes
 * are only reported through events.
 */

export class ItemCollection<TItem> {
  private readonly source: Iterable<TItem>;
  private readonly array: TItem[] | null;
  private readonly set: Set<TItem> | null;

  constructor(source: Iterable<TItem> = []) {
    this.source = Array.isArray(source) || source instanceof Set ? source : Object.freeze(Array.from(source));
    this.array = Array.isArray(source) && !Object.isFrozen(source) ? source : null;
    this.set = source instanceof Set ? source : null;
  }

  /** The object the host supplied, or the frozen copy of a plain iterable */
  get data(): Iterable<TItem> {
    return this.source;
  }

  /** Whether items can be added and removed */
  get canMutate(): boolean {
    return this.array !== null || this.set !== null;
  }

  contains(item: TItem): boolean {
    if (this.set) {
      return this.set.has(item);
    }
    for (const candidate of this.source) {
      if (candidate === item) {
        return true;
      }
    }
    return false;
  }

  /**
   * Append an item
   * @returns false if the source is read-only
   */
  add(item: TItem): boolean {
    if (this.array) {
      this.array.push(item);
      return true;
    }
    if (this.set) {
      this.set.add(item);
      return true;
    }
    return false;
  }

  /**
   * Remove the first occurrence of an item
   * @returns true if an item was removed
   */
  remove(item: TItem): boolean {
    if (this.array) {
      const index = this.array.indexOf(item);
      if (index < 0) {
        return false;
      }
      this.array.splice(index, 1);
      return true;
    }
    if (this.set) {
      return this.set.delete(item);
    }
    return false;
  }
}
