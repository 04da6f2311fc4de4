/**
 * useDataGrid - Data grid state hook
 *
 * Bridges React UI and the engine's DataGridController.
 *
 * Features:
 * - React 18 subscription to the controller (useSyncExternalStore)
 * - Derived view state read from the controller on each render
 * - Action wrappers that capture failures of host event handlers
 * - Optional initialisation on mount (issues the first remote request)
 *
 * Design:
 * - Single source of truth: DataGridController (engine)
 * - Local UI state: the last action error, until dismissed
 *
 * Usage:
 * ```tsx
 * const gridState = useDataGrid({ grid });
 *
 * gridState.sortClick('name');
 * gridState.changeFilter('city', 'osl');
 * ```
 */

import { useState, useCallback, useEffect, useSyncExternalStore } from 'react';
import type { DataGridController } from '../../../engine/core/grid/DataGridController.js';
import type { PageName } from '../../../engine/core/paging/Pagination.js';
import type { CellValue, DataGridEditState } from '../../../engine/core/types/index.js';

// =============================================================================
// Types
// =============================================================================

export interface UseDataGridOptions<TItem> {
  /** Engine controller (single source of truth) */
  grid: DataGridController<TItem>;
  /** Call grid.initialize() on mount (default true) */
  initialize?: boolean;
}

export interface UseDataGridResult<TItem> {
  // View state (from engine)
  version: number;
  displayData: ReadonlyArray<TItem>;
  currentPage: number;
  lastPage: number;
  firstVisiblePage: number;
  lastVisiblePage: number;
  editState: DataGridEditState;
  editItem: TItem | null;
  popupVisible: boolean;
  selectedRow: TItem | null;

  // Last failed action
  error: Error | null;
  dismissError(): void;

  // Actions
  sortClick(columnId: string): void;
  changeFilter(columnId: string, value: string | null): void;
  clearFilters(): void;
  paginationItemClick(name: PageName): void;
  newRow(): void;
  editRow(item: TItem): void;
  setCellValue(columnId: string, value: CellValue): void;
  save(): void;
  cancel(): void;
  deleteRow(item: TItem): void;
  selectRow(item: TItem): void;
}

// =============================================================================
// Helper Functions
// =============================================================================

export function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

// =============================================================================
// Hook Implementation
// =============================================================================

/**
 * Data grid state hook
 *
 * Subscribes to controller changes and exposes the controller's commands
 * as fire-and-report callbacks.
 */
export function useDataGrid<TItem>(options: UseDataGridOptions<TItem>): UseDataGridResult<TItem> {
  const { grid, initialize = true } = options;

  // --- React 18 Subscription to DataGridController ---
  const version = useSyncExternalStore(grid.subscribe, grid.getSnapshot);

  const [error, setError] = useState<Error | null>(null);

  const report = useCallback((reason: unknown) => {
    setError(toError(reason));
  }, []);

  // Runs a command; a throw or a rejected promise ends up in `error`
  const run = useCallback(
    (command: () => Promise<unknown> | void) => {
      try {
        const pending = command();
        if (pending instanceof Promise) {
          pending.catch(report);
        }
      } catch (reason) {
        report(reason);
      }
    },
    [report]
  );

  // --- Initialisation ---
  useEffect(() => {
    if (initialize) {
      run(() => grid.initialize());
    }
  }, [grid, initialize, run]);

  const dismissError = useCallback(() => setError(null), []);

  // --- Sorting, Filtering, Paging ---
  const sortClick = useCallback((columnId: string) => run(() => grid.sortClick(columnId)), [grid, run]);

  const changeFilter = useCallback(
    (columnId: string, value: string | null) => run(() => grid.changeFilter(columnId, value)),
    [grid, run]
  );

  const clearFilters = useCallback(() => run(() => grid.clearFilters()), [grid, run]);

  const paginationItemClick = useCallback(
    (name: PageName) => run(() => grid.paginationItemClick(name)),
    [grid, run]
  );

  // --- Editing ---
  const newRow = useCallback(() => run(() => grid.newRow()), [grid, run]);

  const editRow = useCallback((item: TItem) => run(() => grid.editRow(item)), [grid, run]);

  const setCellValue = useCallback(
    (columnId: string, value: CellValue) => run(() => grid.setCellValue(columnId, value)),
    [grid, run]
  );

  const save = useCallback(() => run(() => grid.save()), [grid, run]);

  const cancel = useCallback(() => run(() => grid.cancel()), [grid, run]);

  const deleteRow = useCallback((item: TItem) => run(() => grid.deleteRow(item)), [grid, run]);

  // --- Selection ---
  const selectRow = useCallback((item: TItem) => run(() => grid.selectRow(item)), [grid, run]);

  return {
    version,
    displayData: grid.displayData,
    currentPage: grid.currentPage,
    lastPage: grid.lastPage,
    firstVisiblePage: grid.firstVisiblePage,
    lastVisiblePage: grid.lastVisiblePage,
    editState: grid.editState,
    editItem: grid.editItem,
    popupVisible: grid.popupVisible,
    selectedRow: grid.selectedRow,
    error,
    dismissError,
    sortClick,
    changeFilter,
    clearFilters,
    paginationItemClick,
    newRow,
    editRow,
    setCellValue,
    save,
    cancel,
    deleteRow,
    selectRow,
  };
}
