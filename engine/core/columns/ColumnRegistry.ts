/**
 * Column Registry
 * Ordered list of the grid's columns plus the single active sort column
 */

import type { DataGridColumnInfo, DataGridFilterMethod } from '../types/index.js';
import { ColumnNotFoundError, DataGridConfigError } from '../grid/errors.js';
import type { DataGridColumn } from './DataGridColumn.js';

export class ColumnRegistry<TItem> {
  private columns: DataGridColumn<TItem>[] = [];
  private byId: Map<string, DataGridColumn<TItem>> = new Map();
  private command: DataGridColumn<TItem> | null = null;
  private sortBy: DataGridColumn<TItem> | null = null;

  // ===========================================================================
  // Registration
  // ===========================================================================

  /**
   * Register a column. The first command-kind column becomes the
   * grid's command column.
   * @throws DataGridConfigError if a column with the same id is registered
   */
  register(column: DataGridColumn<TItem>): void {
    if (this.byId.has(column.id)) {
      throw new DataGridConfigError(`Column already registered: ${column.id}`);
    }

    this.columns.push(column);
    this.byId.set(column.id, column);

    if (this.command === null && column.isCommand) {
      this.command = column;
    }
  }

  // ===========================================================================
  // Lookup
  // ===========================================================================

  get all(): ReadonlyArray<DataGridColumn<TItem>> {
    return this.columns;
  }

  get commandColumn(): DataGridColumn<TItem> | null {
    return this.command;
  }

  get sortColumn(): DataGridColumn<TItem> | null {
    return this.sortBy;
  }

  /** Non-command columns that accept edits, in registration order */
  get editableColumns(): DataGridColumn<TItem>[] {
    return this.columns.filter((column) => column.isEditable);
  }

  /**
   * @throws ColumnNotFoundError for an unknown id
   */
  get(id: string): DataGridColumn<TItem> {
    const column = this.byId.get(id);
    if (!column) {
      throw new ColumnNotFoundError(id);
    }
    return column;
  }

  // ===========================================================================
  // Sort / Filter State
  // ===========================================================================

  /**
   * Toggle the clicked column's direction and make it the only sorted
   * column. Every other column is reset to ascending.
   */
  toggleSort(column: DataGridColumn<TItem>): void {
    column.direction = column.direction === 'descending' ? 'ascending' : 'descending';
    this.sortBy = column;

    for (const other of this.columns) {
      if (other.id === column.id) {
        continue;
      }
      other.direction = 'ascending';
    }
  }

  /**
   * Reset every column's search text
   */
  clearFilters(): void {
    for (const column of this.columns) {
      column.filter.searchValue = null;
    }
  }

  toInfo(gridFilterMethod: DataGridFilterMethod): DataGridColumnInfo[] {
    return this.columns.map((column) => column.toInfo(gridFilterMethod));
  }
}
