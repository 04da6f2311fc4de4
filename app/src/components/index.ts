/**
 * Data Grid UI Components
 *
 * Export all components from a single entry point.
 */

export { DataGrid } from './DataGrid.js';
export type { DataGridProps } from './DataGrid.js';
