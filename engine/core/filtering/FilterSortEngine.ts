/**
 * Filter/Sort Engine
 *
 * Derives the filtered (and, locally, sorted) row list from the raw source
 * and the columns' filter/sort state. In remote mode the source is returned
 * as-is: the loader that answered the read-data request already filtered,
 * sorted and paged it.
 */

import type { CellValue, DataGridFilterMethod } from '../types/index.js';
import type { DataGridColumn } from '../columns/DataGridColumn.js';
import { createTextPredicate } from './FilterPredicate.js';

export interface ComputeFilteredOptions {
  /** Data is loaded by the host; skip local sorting and filtering */
  remoteMode: boolean;
  /** Method for columns that do not set their own */
  filterMethod: DataGridFilterMethod;
}

/**
 * Compare two cell values for ordering.
 *
 * null/undefined sort first, numbers numerically, dates by time,
 * booleans false before true, strings by locale. Values of different
 * types are compared by their string form.
 */
export function compareValues(a: CellValue, b: CellValue): number {
  const emptyA = a === null || a === undefined;
  const emptyB = b === null || b === undefined;

  if (emptyA && emptyB) return 0;
  if (emptyA) return -1;
  if (emptyB) return 1;

  if (typeof a === 'number' && typeof b === 'number') {
    if (Number.isNaN(a) || Number.isNaN(b)) {
      return Number.isNaN(a) ? (Number.isNaN(b) ? 0 : -1) : 1;
    }
    return a - b;
  }

  if (typeof a === 'bigint' && typeof b === 'bigint') {
    return a === b ? 0 : a < b ? -1 : 1;
  }

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }

  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return a === b ? 0 : a ? 1 : -1;
  }

  return String(a).localeCompare(String(b));
}

/**
 * Materialize the filtered row list.
 */
export function computeFiltered<TItem>(
  source: Iterable<TItem>,
  columns: ReadonlyArray<DataGridColumn<TItem>>,
  sortColumn: DataGridColumn<TItem> | null,
  options: ComputeFilteredOptions
): TItem[] {
  const items = Array.from(source);

  if (options.remoteMode) {
    return items;
  }

  // just one column can be sorted
  if (sortColumn !== null && sortColumn.sortable) {
    const sign = sortColumn.direction === 'descending' ? -1 : 1;
    items.sort((a, b) => sign * compareValues(sortColumn.getValue(a), sortColumn.getValue(b)));
  }

  const filters = columns
    .filter((column) => column.hasActiveFilter())
    .map((column) => ({
      column,
      predicate: createTextPredicate(column.filter.method ?? options.filterMethod, column.filter.searchValue ?? ''),
    }));

  if (filters.length === 0) {
    return items;
  }

  // Row must pass ALL column filters (AND logic)
  return items.filter((item) => filters.every(({ column, predicate }) => predicate.test(column.getValue(item))));
}
