/**
 * Data Grid - Edit Session Manager
 *
 * Holds the item being created or edited and the value staged for each
 * editable column. Transitions: none → new → none, none → edit → none.
 *
 * Sessions are immutable: staging a value replaces the session object, so
 * a reference taken earlier still shows the values it was taken with.
 */

import type { CellValue, DataGridEditState, EditedCellValues } from '../types/index.js';
import type { DataGridColumn } from '../columns/DataGridColumn.js';
import { ColumnNotFoundError } from '../grid/errors.js';

export interface EditSession<TItem> {
  /** 'new' or 'edit'; a closed session is represented by null */
  readonly state: Exclude<DataGridEditState, 'none'>;
  /** Item under edit; for new rows, the freshly created instance */
  readonly item: TItem;
  /** Column id → staged value */
  readonly values: ReadonlyMap<string, CellValue>;
}

export class EditSessionManager<TItem> {
  private session: EditSession<TItem> | null = null;

  // ===========================================================================
  // State Getters
  // ===========================================================================

  get current(): EditSession<TItem> | null {
    return this.session;
  }

  get state(): DataGridEditState {
    return this.session?.state ?? 'none';
  }

  get item(): TItem | null {
    return this.session?.item ?? null;
  }

  isEditing(): boolean {
    return this.session !== null;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Open a session, staging each editable column's current value from
   * the item. Replaces any open session.
   */
  begin(
    state: Exclude<DataGridEditState, 'none'>,
    item: TItem,
    editableColumns: ReadonlyArray<DataGridColumn<TItem>>
  ): EditSession<TItem> {
    const values = new Map<string, CellValue>();
    for (const column of editableColumns) {
      values.set(column.id, column.getValue(item));
    }

    this.session = { state, item, values };
    return this.session;
  }

  clear(): void {
    this.session = null;
  }

  // ===========================================================================
  // Staged Values
  // ===========================================================================

  /**
   * Stage a value for an editable column.
   * @returns false if no session is open
   * @throws ColumnNotFoundError if the column is not staged in this session
   */
  setCellValue(columnId: string, value: CellValue): boolean {
    if (!this.session) {
      return false;
    }
    if (!this.session.values.has(columnId)) {
      throw new ColumnNotFoundError(columnId);
    }

    const values = new Map(this.session.values);
    values.set(columnId, value);
    this.session = { ...this.session, values };
    return true;
  }

  getCellValue(columnId: string): CellValue {
    return this.session?.values.get(columnId);
  }

  /**
   * Field → staged value for the given editable columns
   */
  getEditedValues(editableColumns: ReadonlyArray<DataGridColumn<TItem>>): EditedCellValues {
    const edited: EditedCellValues = {};
    if (!this.session) {
      return edited;
    }

    for (const column of editableColumns) {
      edited[column.field] = this.session.values.get(column.id);
    }
    return edited;
  }

  /**
   * Write every staged value onto the session's item
   */
  applyTo(editableColumns: ReadonlyArray<DataGridColumn<TItem>>): void {
    if (!this.session) {
      return;
    }

    for (const column of editableColumns) {
      column.setValue(this.session.item, this.session.values.get(column.id));
    }
  }
}
