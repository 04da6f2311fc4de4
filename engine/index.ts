/**
 * Data Grid Engine
 *
 * Data-management core for a table component:
 * - Filtering, single-column sorting and paging over any item collection
 * - Row editing sessions with cancellable insert/update/remove events
 * - Remote loading, where the host answers page requests
 *
 * @example
 * ```typescript
 * import { DataGridController } from './engine/index.js';
 *
 * const grid = new DataGridController<Product>({
 *   data: products,
 *   pageSize: 20,
 *   columns: [{ field: 'name' }, { field: 'price' }],
 * });
 *
 * await grid.changeFilter('name', 'lamp');
 * await grid.sortClick('price');
 *
 * console.log(grid.displayData.length, grid.lastPage);
 * ```
 */

export * from './core/index.js';
