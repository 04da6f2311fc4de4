/**
 * Data Grid - Options
 * Host-supplied configuration, defaults and validation
 */

import type { DataGridEditMode, DataGridFilterMethod } from '../types/index.js';
import type { DataGridColumn, DataGridColumnConfig } from '../columns/DataGridColumn.js';
import { DataGridConfigError } from './errors.js';

export interface DataGridOptions<TItem> {
  /** Source items: an array, a Set, or any iterable (read-only) */
  data?: Iterable<TItem>;
  /** Total item count; used only when data is loaded remotely */
  totalItems?: number;
  /** Commit staged values and collection changes locally (default true) */
  useInternalEditing?: boolean;
  /** Whether users can edit rows (default false) */
  editable?: boolean;
  /** Whether users can sort by column values (default true) */
  sortable?: boolean;
  /** Whether users can filter rows by cell values (default false) */
  filterable?: boolean;
  /** Whether the pager is shown (default false) */
  showPager?: boolean;
  /** Whether column captions are shown (default true) */
  showCaptions?: boolean;
  /** Rows per page (default 5) */
  pageSize?: number;
  /** Initial page (default 1) */
  currentPage?: number;
  /** Maximum visible page links (default 5) */
  maxPaginationLinks?: number;
  /** Default comparison for column filters (default 'contains') */
  filterMethod?: DataGridFilterMethod;
  /** Where rows are edited (default 'form') */
  editMode?: DataGridEditMode;
  /** Creates the instance for a new row */
  itemFactory?: () => TItem;
  /** Rows for which this returns false cannot be selected */
  rowSelectable?: (item: TItem) => boolean;
  /** Rows for which this returns true show their detail row */
  detailRowTrigger?: (item: TItem) => boolean;
  /** Columns to register, in display order */
  columns?: ReadonlyArray<DataGridColumn<TItem> | DataGridColumnConfig<TItem>>;
}

/**
 * Options after defaults are applied. Data, columns and the initial page
 * are held by the controller itself.
 */
export interface ResolvedDataGridOptions<TItem> {
  useInternalEditing: boolean;
  editable: boolean;
  sortable: boolean;
  filterable: boolean;
  showPager: boolean;
  showCaptions: boolean;
  pageSize: number;
  maxPaginationLinks: number;
  filterMethod: DataGridFilterMethod;
  editMode: DataGridEditMode;
  itemFactory: (() => TItem) | null;
  rowSelectable: ((item: TItem) => boolean) | null;
  detailRowTrigger: ((item: TItem) => boolean) | null;
}

export const DEFAULT_PAGE_SIZE = 5;
export const DEFAULT_MAX_PAGINATION_LINKS = 5;

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new DataGridConfigError(`${name} must be a positive integer, got ${value}`);
  }
}

function assertTotalItems(value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw new DataGridConfigError(`totalItems must be a non-negative integer, got ${value}`);
  }
}

/**
 * Merge options over defaults (or over a previous resolution).
 * @throws DataGridConfigError for out-of-range numbers
 */
export function resolveOptions<TItem>(
  options: DataGridOptions<TItem>,
  base?: ResolvedDataGridOptions<TItem>
): ResolvedDataGridOptions<TItem> {
  const resolved: ResolvedDataGridOptions<TItem> = {
    useInternalEditing: options.useInternalEditing ?? base?.useInternalEditing ?? true,
    editable: options.editable ?? base?.editable ?? false,
    sortable: options.sortable ?? base?.sortable ?? true,
    filterable: options.filterable ?? base?.filterable ?? false,
    showPager: options.showPager ?? base?.showPager ?? false,
    showCaptions: options.showCaptions ?? base?.showCaptions ?? true,
    pageSize: options.pageSize ?? base?.pageSize ?? DEFAULT_PAGE_SIZE,
    maxPaginationLinks: options.maxPaginationLinks ?? base?.maxPaginationLinks ?? DEFAULT_MAX_PAGINATION_LINKS,
    filterMethod: options.filterMethod ?? base?.filterMethod ?? 'contains',
    editMode: options.editMode ?? base?.editMode ?? 'form',
    itemFactory: options.itemFactory ?? base?.itemFactory ?? null,
    rowSelectable: options.rowSelectable ?? base?.rowSelectable ?? null,
    detailRowTrigger: options.detailRowTrigger ?? base?.detailRowTrigger ?? null,
  };

  assertPositiveInteger('pageSize', resolved.pageSize);
  assertPositiveInteger('maxPaginationLinks', resolved.maxPaginationLinks);
  assertTotalItems(options.totalItems);
  if (options.currentPage !== undefined) {
    assertPositiveInteger('currentPage', options.currentPage);
  }

  return resolved;
}
