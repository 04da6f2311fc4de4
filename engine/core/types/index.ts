/**
 * Data Grid - Shared Types
 * Enumerations and event argument records used across the grid core
 */

/**
 * Cell values are whatever the column accessor reads from an item.
 */
export type CellValue = unknown;

/**
 * State of the edit session
 */
export type DataGridEditState = 'none' | 'new' | 'edit';

/**
 * Where the editor for a row is shown
 */
export type DataGridEditMode = 'form' | 'popup';

export type SortDirection = 'ascending' | 'descending';

/**
 * Comparison used by column filters (all case-insensitive)
 */
export type DataGridFilterMethod =
  | 'contains'
  | 'startsWith'
  | 'endsWith'
  | 'equals'
  | 'notEquals';

export type DataGridColumnKind = 'ordinary' | 'command';

/**
 * Field name to staged value, collected from editable columns on save
 */
export type EditedCellValues = Record<string, CellValue>;

/**
 * Item committed by an insert or update, with the values that were staged
 */
export interface SavedRowItem<TItem> {
  readonly item: TItem;
  readonly values: EditedCellValues;
}

export interface DataGridPageChangedEventArgs {
  readonly page: number;
  readonly pageSize: number;
}

/**
 * Filter and sort state of one column, as sent to a remote loader
 */
export interface DataGridColumnInfo {
  readonly id: string;
  readonly field: string;
  readonly searchValue: string | null;
  readonly filterMethod: DataGridFilterMethod;
  readonly sortable: boolean;
  readonly direction: SortDirection;
}

/**
 * Request sent to the host when the grid loads its data remotely.
 * The host answers by calling `setData(data, totalItems)` on the grid.
 */
export interface DataGridReadDataEventArgs {
  readonly page: number;
  readonly pageSize: number;
  readonly columns: ReadonlyArray<DataGridColumnInfo>;
  /** Field of the active sort column, or null when unsorted */
  readonly sortField: string | null;
}
