/**
 * Data Grid Engine - Core Module Exports
 *
 * Main entry point for the data grid core.
 */

// Controller
export { DataGridController } from './grid/DataGridController.js';
export type { ViewListener } from './grid/DataGridController.js';
export {
  resolveOptions,
  DEFAULT_PAGE_SIZE,
  DEFAULT_MAX_PAGINATION_LINKS,
} from './grid/DataGridOptions.js';
export type { DataGridOptions, ResolvedDataGridOptions } from './grid/DataGridOptions.js';
export { DataGridConfigError, ColumnNotFoundError, FieldAccessError } from './grid/errors.js';

// Types - export all
export * from './types/index.js';

// Columns
export { DataGridColumn, formatCellValue } from './columns/DataGridColumn.js';
export type { DataGridColumnConfig, ColumnFilterState } from './columns/DataGridColumn.js';
export { ColumnRegistry } from './columns/ColumnRegistry.js';
export { createFieldGetter, createFieldSetter } from './columns/fieldAccessor.js';
export type { FieldGetter, FieldSetter } from './columns/fieldAccessor.js';

// Data Source
export * from './data/index.js';

// Filtering & Sorting
export * from './filtering/index.js';

// Paging
export {
  computeDisplay,
  computeLastPage,
  computeVisiblePages,
  resolvePageName,
} from './paging/Pagination.js';
export type { PageName, PageRange } from './paging/Pagination.js';

// Editing
export * from './editing/index.js';

// Events
export { CancellableEvent, CancellableRowChange } from './events/CancellableEvent.js';
export type { CancellableRowChangeHandler } from './events/CancellableEvent.js';
export { AsyncEvent } from './events/AsyncEvent.js';
export type { AsyncEventHandler } from './events/AsyncEvent.js';
