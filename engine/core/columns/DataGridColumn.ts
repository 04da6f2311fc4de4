/**
 * Data Grid Column
 *
 * Column descriptor: identity, display config, capability flags, and the
 * mutable sort/filter state the grid reads when it derives its views.
 * Identity (id, field, kind) never changes after construction.
 */

import type {
  CellValue,
  DataGridColumnInfo,
  DataGridColumnKind,
  DataGridFilterMethod,
  SortDirection,
} from '../types/index.js';
import {
  createFieldGetter,
  createFieldSetter,
  type FieldGetter,
  type FieldSetter,
} from './fieldAccessor.js';

/**
 * Column filter state
 */
export interface ColumnFilterState {
  /** Search text; null or empty means no filter */
  searchValue: string | null;
  /** Overrides the grid's filter method for this column */
  method?: DataGridFilterMethod;
}

export interface DataGridColumnConfig<TItem> {
  /** Stable element id; defaults to the field name */
  id?: string;
  /** Field path on the item ("name", "address.city") */
  field: string;
  /** Header text; defaults to the field name */
  caption?: string;
  kind?: DataGridColumnKind;
  sortable?: boolean;
  editable?: boolean;
  filterable?: boolean;
  /** Initial sort direction (default 'ascending') */
  direction?: SortDirection;
  filterMethod?: DataGridFilterMethod;
  /** Custom accessor; replaces reading by field path */
  getValue?: FieldGetter<TItem>;
  /** Custom accessor; replaces writing by field path */
  setValue?: FieldSetter<TItem>;
  /** Converts editor text into a cell value (default: keep the text) */
  parse?: (text: string) => CellValue;
  /** Formats a cell value for display (default: String, empty for null) */
  format?: (value: CellValue) => string;
}

export function formatCellValue(value: CellValue): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

export class DataGridColumn<TItem> {
  readonly id: string;
  readonly field: string;
  readonly caption: string;
  readonly kind: DataGridColumnKind;
  readonly sortable: boolean;
  readonly editable: boolean;
  readonly filterable: boolean;

  /** Current sort direction; only the active sort column holds 'descending' */
  direction: SortDirection;
  readonly filter: ColumnFilterState;

  private readonly getter: FieldGetter<TItem>;
  private readonly setter: FieldSetter<TItem>;
  private readonly parser: (text: string) => CellValue;
  private readonly formatter: (value: CellValue) => string;

  constructor(config: DataGridColumnConfig<TItem>) {
    this.field = config.field;
    this.id = config.id ?? config.field;
    this.caption = config.caption ?? config.field;
    this.kind = config.kind ?? 'ordinary';
    this.sortable = config.sortable ?? true;
    this.editable = config.editable ?? false;
    this.filterable = config.filterable ?? true;
    this.direction = config.direction ?? 'ascending';
    this.filter = { searchValue: null, method: config.filterMethod };

    this.getter = config.getValue ?? createFieldGetter<TItem>(config.field);
    this.setter = config.setValue ?? createFieldSetter<TItem>(config.field);
    this.parser = config.parse ?? ((text) => text);
    this.formatter = config.format ?? formatCellValue;
  }

  get isCommand(): boolean {
    return this.kind === 'command';
  }

  /** Non-command column that accepts edits */
  get isEditable(): boolean {
    return !this.isCommand && this.editable;
  }

  getValue(item: TItem): CellValue {
    return this.getter(item);
  }

  setValue(item: TItem, value: CellValue): void {
    this.setter(item, value);
  }

  parse(text: string): CellValue {
    return this.parser(text);
  }

  format(value: CellValue): string {
    return this.formatter(value);
  }

  hasActiveFilter(): boolean {
    return !this.isCommand && this.filter.searchValue !== null && this.filter.searchValue !== '';
  }

  /**
   * Snapshot of filter/sort state for a remote loader.
   * A column without its own filter method reports the grid's.
   */
  toInfo(gridFilterMethod: DataGridFilterMethod): DataGridColumnInfo {
    return {
      id: this.id,
      field: this.field,
      searchValue: this.filter.searchValue,
      filterMethod: this.filter.method ?? gridFilterMethod,
      sortable: this.sortable,
      direction: this.direction,
    };
  }
}
