/**
 * DataGrid - Table view over a DataGridController
 *
 * Renders what the controller derives and forwards user input to it.
 *
 * Behaviour:
 * - Caption row with sort buttons (hidden when showCaptions is off)
 * - Filter row with a text box per filterable column (filterable grids only)
 * - Command column with New / Edit / Delete, and Save / Cancel while editing;
 *   New only shows when rows can be appended to the data source
 * - Form mode edits inline in the row; popup mode edits in a dialog
 *   portalled to document.body
 * - Clicking a row selects it; rows that cannot be selected are aria-disabled
 * - Detail rows follow detailRowTrigger
 * - Pager with prev / page links / next (showPager only)
 * - Failed commands show an alert banner until dismissed
 */

import React, { useState, type ReactNode } from 'react';
import { createPortal } from 'react-dom';
import type { DataGridController } from '../../../engine/core/grid/DataGridController.js';
import type { DataGridColumn } from '../../../engine/core/columns/DataGridColumn.js';
import type { CellValue } from '../../../engine/core/types/index.js';
import { useDataGrid, type UseDataGridResult } from '../hooks/useDataGrid.js';

// =============================================================================
// Types
// =============================================================================

export interface DataGridProps<TItem> {
  grid: DataGridController<TItem>;
  /** Stable React key for a row */
  getRowKey: (item: TItem) => React.Key;
  /** Content of a row's detail row, shown when detailRowTrigger allows it */
  renderDetailRow?: (item: TItem) => ReactNode;
  className?: string;
}

// =============================================================================
// Cell Editor
// =============================================================================

/**
 * Text box for one staged value. Keeps the raw text locally so partial
 * input ("12.") survives a parse round-trip.
 */
function CellEditor<TItem>({
  column,
  initialValue,
  onChange,
}: {
  column: DataGridColumn<TItem>;
  initialValue: CellValue;
  onChange: (columnId: string, value: CellValue) => void;
}) {
  const [text, setText] = useState(() => column.format(initialValue));

  return (
    <input
      type="text"
      className="data-grid-editor-input"
      aria-label={column.caption}
      value={text}
      onChange={(e) => {
        setText(e.target.value);
        onChange(column.id, column.parse(e.target.value));
      }}
    />
  );
}

// =============================================================================
// Component
// =============================================================================

export function DataGrid<TItem>({ grid, getRowKey, renderDetailRow, className }: DataGridProps<TItem>) {
  const state = useDataGrid({ grid });
  const { options } = grid;
  const columns = grid.columns.all;
  const sortColumn = grid.columns.sortColumn;
  const isFormEditing = state.editState !== 'none' && grid.editMode === 'form';

  // --- Cells ---
  const renderCommandCell = (item: TItem, editing: boolean) => {
    if (!options.editable) return null;

    if (editing) {
      return (
        <>
          <button type="button" className="data-grid-btn" onClick={state.save}>
            Save
          </button>
          <button type="button" className="data-grid-btn" onClick={state.cancel}>
            Cancel
          </button>
        </>
      );
    }

    return (
      <>
        <button
          type="button"
          className="data-grid-btn"
          disabled={state.editState !== 'none'}
          onClick={(e) => {
            e.stopPropagation();
            state.editRow(item);
          }}
        >
          Edit
        </button>
        <button
          type="button"
          className="data-grid-btn"
          disabled={state.editState !== 'none'}
          onClick={(e) => {
            e.stopPropagation();
            state.deleteRow(item);
          }}
        >
          Delete
        </button>
      </>
    );
  };

  const renderEditorRow = (key: React.Key) => (
    <tr key={key} className="data-grid-row data-grid-row-editing">
      {columns.map((column) => (
        <td key={column.id} className="data-grid-cell">
          {column.isCommand ? (
            renderCommandCell(editItemOrThrow(state), true)
          ) : column.isEditable ? (
            <CellEditor column={column} initialValue={grid.getCellValue(column.id)} onChange={state.setCellValue} />
          ) : (
            column.format(column.getValue(editItemOrThrow(state)))
          )}
        </td>
      ))}
    </tr>
  );

  const renderRow = (item: TItem) => {
    const key = getRowKey(item);
    if (isFormEditing && state.editState === 'edit' && state.editItem === item) {
      return [renderEditorRow(key)];
    }

    const rows = [
      <tr
        key={key}
        className="data-grid-row"
        aria-selected={state.selectedRow === item}
        aria-disabled={grid.isRowSelectable(item) ? undefined : true}
        onClick={() => state.selectRow(item)}
      >
        {columns.map((column) => (
          <td key={column.id} className="data-grid-cell">
            {column.isCommand ? renderCommandCell(item, false) : column.format(column.getValue(item))}
          </td>
        ))}
      </tr>,
    ];

    if (renderDetailRow && grid.isDetailRowVisible(item)) {
      rows.push(
        <tr key={`${String(key)}-detail`} className="data-grid-detail-row">
          <td colSpan={columns.length}>{renderDetailRow(item)}</td>
        </tr>
      );
    }

    return rows;
  };

  // --- Pager ---
  const pageLinks: number[] = [];
  for (let page = state.firstVisiblePage; page <= state.lastVisiblePage; page++) {
    pageLinks.push(page);
  }

  return (
    <div className={`data-grid ${className ?? ''}`.trim()}>
      {state.error && (
        <div className="data-grid-error" role="alert">
          <span>{state.error.message}</span>
          <button type="button" aria-label="Dismiss" onClick={state.dismissError}>
            ×
          </button>
        </div>
      )}

      <table className="data-grid-table">
        <thead>
          {options.showCaptions && (
            <tr>
              {columns.map((column) => {
                const isSorted = sortColumn === column;
                if (column.isCommand) {
                  return (
                    <th key={column.id} className="data-grid-header">
                      {grid.canInsertNewItem && (
                        <button
                          type="button"
                          className="data-grid-btn"
                          disabled={state.editState !== 'none'}
                          onClick={state.newRow}
                        >
                          New
                        </button>
                      )}
                    </th>
                  );
                }
                return (
                  <th
                    key={column.id}
                    className="data-grid-header"
                    aria-sort={isSorted ? column.direction : undefined}
                  >
                    {options.sortable && column.sortable ? (
                      <button type="button" className="data-grid-sort-btn" onClick={() => state.sortClick(column.id)}>
                        {column.caption}
                        {isSorted && (column.direction === 'ascending' ? ' ▲' : ' ▼')}
                      </button>
                    ) : (
                      column.caption
                    )}
                  </th>
                );
              })}
            </tr>
          )}

          {options.filterable && (
            <tr className="data-grid-filter-row">
              {columns.map((column) => (
                <th key={column.id}>
                  {column.isCommand ? (
                    <button type="button" className="data-grid-btn" onClick={state.clearFilters}>
                      Clear
                    </button>
                  ) : (
                    column.filterable && (
                      <input
                        type="search"
                        className="data-grid-filter-input"
                        aria-label={`Filter ${column.caption}`}
                        value={column.filter.searchValue ?? ''}
                        onChange={(e) => state.changeFilter(column.id, e.target.value)}
                      />
                    )
                  )}
                </th>
              ))}
            </tr>
          )}
        </thead>

        <tbody>
          {isFormEditing && state.editState === 'new' && renderEditorRow('new-row')}
          {state.displayData.flatMap(renderRow)}
          {state.displayData.length === 0 && state.editState !== 'new' && (
            <tr className="data-grid-empty-row">
              <td colSpan={Math.max(columns.length, 1)}>No records</td>
            </tr>
          )}
        </tbody>
      </table>

      {state.popupVisible && state.editItem !== null && createPortal(
        <div
          role="dialog"
          aria-modal="true"
          aria-label={state.editState === 'new' ? 'New row' : 'Edit row'}
          className="data-grid-popup"
        >
          <form
            className="data-grid-popup-body"
            onSubmit={(e) => {
              e.preventDefault();
              state.save();
            }}
          >
            {grid.columns.editableColumns.map((column) => (
              <label key={column.id} className="data-grid-popup-field">
                <span>{column.caption}</span>
                <CellEditor column={column} initialValue={grid.getCellValue(column.id)} onChange={state.setCellValue} />
              </label>
            ))}
            <div className="data-grid-popup-actions">
              <button type="button" className="data-grid-btn" onClick={state.cancel}>
                Cancel
              </button>
              <button type="submit" className="data-grid-btn data-grid-btn-primary">
                Save
              </button>
            </div>
          </form>
        </div>,
        document.body
      )}

      {options.showPager && (
        <nav className="data-grid-pager" aria-label="Pagination">
          <button
            type="button"
            className="data-grid-page-btn"
            disabled={state.currentPage === 1}
            onClick={() => state.paginationItemClick('prev')}
          >
            Previous
          </button>
          {pageLinks.map((page) => (
            <button
              key={page}
              type="button"
              className="data-grid-page-btn"
              aria-current={page === state.currentPage ? 'page' : undefined}
              onClick={() => state.paginationItemClick(page)}
            >
              {page}
            </button>
          ))}
          <button
            type="button"
            className="data-grid-page-btn"
            disabled={state.currentPage === state.lastPage}
            onClick={() => state.paginationItemClick('next')}
          >
            Next
          </button>
        </nav>
      )}
    </div>
  );
}

function editItemOrThrow<TItem>(state: UseDataGridResult<TItem>): TItem {
  if (state.editItem === null) {
    throw new Error('Editor row rendered without an open edit session');
  }
  return state.editItem;
}

export default DataGrid;
