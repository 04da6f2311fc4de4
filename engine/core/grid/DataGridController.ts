/**
 * Data Grid - Controller
 *
 * Data-management state machine behind a data grid:
 * - Lazily recomputed filtered and display caches, each paired with a dirty flag
 * - Edit session lifecycle (none → new/edit → none)
 * - Cancellable insert/update/remove protocol
 * - Optional remote mode, where a `readData` subscriber loads each page
 *
 * Caches are never recomputed on write. Every mutation marks them dirty and
 * the next read recomputes them once. After each state-mutating operation
 * the controller bumps its version and notifies view listeners, so a UI can
 * bind through React's useSyncExternalStore.
 *
 * @example
 * ```typescript
 * const grid = new DataGridController<Employee>({
 *   data: employees,
 *   pageSize: 10,
 *   itemFactory: () => ({ name: '', salary: 0 }),
 *   columns: [{ field: 'name', editable: true }, { field: 'salary', editable: true }],
 * });
 *
 * grid.rowInserting.subscribe((change) => {
 *   if (change.values.name === '') change.cancel = true;
 * });
 *
 * grid.newRow();
 * grid.setCellValue('name', 'Ada');
 * await grid.save();
 * ```
 */

import type {
  CellValue,
  DataGridEditMode,
  DataGridEditState,
  DataGridPageChangedEventArgs,
  DataGridReadDataEventArgs,
  EditedCellValues,
  SavedRowItem,
} from '../types/index.js';
import { DataGridColumn, type DataGridColumnConfig } from '../columns/DataGridColumn.js';
import { ColumnRegistry } from '../columns/ColumnRegistry.js';
import { ItemCollection } from '../data/ItemCollection.js';
import { computeFiltered } from '../filtering/FilterSortEngine.js';
import {
  computeDisplay,
  computeLastPage,
  computeVisiblePages,
  resolvePageName,
  type PageName,
} from '../paging/Pagination.js';
import { EditSessionManager, type EditSession } from '../editing/EditSessionManager.js';
import { CancellableEvent } from '../events/CancellableEvent.js';
import { AsyncEvent } from '../events/AsyncEvent.js';
import { DataGridConfigError } from './errors.js';
import {
  resolveOptions,
  type DataGridOptions,
  type ResolvedDataGridOptions,
} from './DataGridOptions.js';

export type ViewListener = () => void;

export class DataGridController<TItem> {
  readonly columns = new ColumnRegistry<TItem>();

  // ===========================================================================
  // Events
  // ===========================================================================

  /** Cancellable; runs before a new row is committed */
  readonly rowInserting = new CancellableEvent<TItem, EditedCellValues>();
  /** Cancellable; runs before an edited row is committed */
  readonly rowUpdating = new CancellableEvent<TItem, EditedCellValues>();
  /** Cancellable; runs before a row is removed */
  readonly rowRemoving = new CancellableEvent<TItem>();

  readonly rowInserted = new AsyncEvent<SavedRowItem<TItem>>();
  readonly rowUpdated = new AsyncEvent<SavedRowItem<TItem>>();
  readonly rowRemoved = new AsyncEvent<TItem>();
  readonly selectedRowChanged = new AsyncEvent<TItem>();
  readonly pageChanged = new AsyncEvent<DataGridPageChangedEventArgs>();

  /**
   * Subscribing switches the grid to remote mode: local sorting, filtering
   * and paging stop, and the subscriber answers each request through
   * `setData(data, totalItems)`.
   */
  readonly readData = new AsyncEvent<DataGridReadDataEventArgs>();

  // ===========================================================================
  // State
  // ===========================================================================

  private config: ResolvedDataGridOptions<TItem>;
  private collection: ItemCollection<TItem>;
  private totalItemCount: number | undefined;
  private page: number;

  private readonly editSession = new EditSessionManager<TItem>();
  private popup = false;
  private selected: TItem | null = null;

  /** Data after filters and sort have been applied */
  private filteredData: TItem[] = [];
  /** Filtered data for the current page */
  private viewData: TItem[] = [];
  private dirtyFilter = true;
  private dirtyView = true;

  /** Pending read-data dispatches run one after another */
  private readQueue: Promise<void> = Promise.resolve();

  private version = 0;
  private listeners = new Set<ViewListener>();

  constructor(options: DataGridOptions<TItem> = {}) {
    this.config = resolveOptions(options);
    this.collection = new ItemCollection(options.data ?? []);
    this.totalItemCount = options.totalItems;
    this.page = options.currentPage ?? 1;

    for (const column of options.columns ?? []) {
      this.addColumn(column);
    }
  }

  // ===========================================================================
  // Initialisation
  // ===========================================================================

  /**
   * Link a column with this grid.
   * @throws DataGridConfigError if the column id is already registered
   */
  addColumn(column: DataGridColumn<TItem> | DataGridColumnConfig<TItem>): DataGridColumn<TItem> {
    const instance = column instanceof DataGridColumn ? column : new DataGridColumn<TItem>(column);
    this.columns.register(instance);
    this.notifyListeners();
    return instance;
  }

  /**
   * Call once every column is registered. In remote mode this issues the
   * first read-data request.
   */
  async initialize(): Promise<void> {
    this.invalidate();

    if (this.remoteMode) {
      await this.handleReadData();
      return;
    }

    this.notifyListeners();
  }

  /**
   * Update options after construction.
   * @throws DataGridConfigError for out-of-range numbers
   */
  setOptions(options: Omit<DataGridOptions<TItem>, 'columns'>): void {
    const previous = this.config;
    this.config = resolveOptions(options, previous);

    if (
      previous.pageSize !== this.config.pageSize ||
      previous.filterMethod !== this.config.filterMethod
    ) {
      this.invalidate();
    }
    if (options.data !== undefined) {
      this.collection = new ItemCollection(options.data);
      this.invalidate();
    }
    if (options.totalItems !== undefined) {
      this.totalItemCount = options.totalItems;
      this.invalidate();
    }
    if (options.currentPage !== undefined) {
      this.page = options.currentPage;
      this.dirtyView = true;
    }

    this.notifyListeners();
  }

  // ===========================================================================
  // Data Source
  // ===========================================================================

  /**
   * Replace the data source. In remote mode this is how the host answers
   * a read-data request; pass `totalItems` with it.
   */
  setData(data: Iterable<TItem>, totalItems?: number): void {
    if (totalItems !== undefined && (!Number.isInteger(totalItems) || totalItems < 0)) {
      throw new DataGridConfigError(`totalItems must be a non-negative integer, got ${totalItems}`);
    }

    this.collection = new ItemCollection(data);
    if (totalItems !== undefined) {
      this.totalItemCount = totalItems;
    }

    this.invalidate();
    this.notifyListeners();
  }

  /**
   * Recompute the views after the host changed items in place
   */
  refresh(): void {
    this.invalidate();
    this.notifyListeners();
  }

  get data(): Iterable<TItem> {
    return this.collection.data;
  }

  get totalItems(): number | undefined {
    return this.totalItemCount;
  }

  /** True while a `readData` subscriber loads the data */
  get remoteMode(): boolean {
    return this.readData.hasSubscribers;
  }

  get options(): Readonly<ResolvedDataGridOptions<TItem>> {
    return this.config;
  }

  get pageSize(): number {
    return this.config.pageSize;
  }

  get editMode(): DataGridEditMode {
    return this.config.editMode;
  }

  /** Whether the grid is editable and new rows can be appended to the data source */
  get canInsertNewItem(): boolean {
    return this.config.editable && this.collection.canMutate;
  }

  // ===========================================================================
  // Derived Views
  // ===========================================================================

  /**
   * Data after all of the filters have been applied
   */
  get filteredItems(): ReadonlyArray<TItem> {
    if (this.dirtyFilter) {
      this.filterData();
    }
    return this.filteredData;
  }

  /**
   * Data to show for the current page
   */
  get displayData(): ReadonlyArray<TItem> {
    if (this.dirtyFilter || this.dirtyView) {
      this.viewData = this.filterViewData();
      this.dirtyView = false;
    }
    return this.viewData;
  }

  /**
   * Number of the last page.
   *
   * Reading this also clamps the current page down when it now lies past
   * the last page, so a read can change `currentPage`.
   */
  get lastPage(): number {
    return this.clampPage();
  }

  /**
   * Current page, clamped into [1, lastPage]
   */
  get currentPage(): number {
    this.clampPage();
    return this.page;
  }

  /** First page link shown by the pager */
  get firstVisiblePage(): number {
    return computeVisiblePages(this.currentPage, this.lastPage, this.config.maxPaginationLinks).first;
  }

  /** Last page link shown by the pager */
  get lastVisiblePage(): number {
    return computeVisiblePages(this.currentPage, this.lastPage, this.config.maxPaginationLinks).last;
  }

  private filterData(): void {
    this.filteredData = computeFiltered(this.collection.data, this.columns.all, this.columns.sortColumn, {
      remoteMode: this.remoteMode,
      filterMethod: this.config.filterMethod,
    });
    this.dirtyFilter = false;
  }

  private filterViewData(): TItem[] {
    const filtered = this.filteredItems;
    const page = this.currentPage;

    return computeDisplay(filtered, page, this.config.pageSize, this.remoteMode);
  }

  private clampPage(): number {
    // remote loading must supply totalItems; without it there is one page
    const total = this.remoteMode ? this.totalItemCount ?? 0 : this.filteredItems.length;
    const lastPage = computeLastPage(total, this.config.pageSize);

    if (this.page > lastPage) {
      this.page = lastPage;
      this.dirtyView = true;
    }

    return lastPage;
  }

  private invalidate(): void {
    this.dirtyFilter = true;
    this.dirtyView = true;
  }

  // ===========================================================================
  // Sorting, Filtering and Paging
  // ===========================================================================

  /**
   * Toggle sorting by a column. Only one column is sorted at a time.
   */
  async sortClick(columnId: string): Promise<void> {
    const column = this.columns.get(columnId);
    if (!this.config.sortable || !column.sortable) {
      return;
    }

    this.columns.toggleSort(column);
    this.invalidate();
    this.notifyListeners();

    if (this.remoteMode) {
      await this.handleReadData();
    }
  }

  /**
   * Set a column's search text; null or empty clears its filter.
   */
  async changeFilter(columnId: string, value: string | null): Promise<void> {
    const column = this.columns.get(columnId);
    column.filter.searchValue = value;
    this.invalidate();
    this.notifyListeners();

    if (this.remoteMode) {
      await this.handleReadData();
    }
  }

  async clearFilters(): Promise<void> {
    this.columns.clearFilters();
    this.invalidate();
    this.notifyListeners();

    if (this.remoteMode) {
      await this.handleReadData();
    }
  }

  /**
   * Go to the page named by a pager item: a page number, 'prev' or 'next'.
   */
  async paginationItemClick(name: PageName): Promise<void> {
    // lastPage first: it clamps a stale page before currentPage is read
    const last = this.lastPage;
    this.page = resolvePageName(name, this.currentPage, last);
    this.dirtyView = true;
    this.notifyListeners();

    await this.pageChanged.invoke({ page: this.page, pageSize: this.config.pageSize });

    if (this.remoteMode) {
      await this.handleReadData();
    }
  }

  /**
   * Set the current page without firing pageChanged
   */
  setCurrentPage(page: number): void {
    this.page = Math.max(Math.trunc(page), 1);
    this.dirtyView = true;
    this.notifyListeners();
  }

  private handleReadData(): Promise<void> {
    const dispatch = this.readQueue.then(() => this.readData.invoke(this.createReadDataArgs()));
    // The caller of this dispatch receives its failure; the queue itself
    // only orders requests and must stay usable after one fails.
    this.readQueue = dispatch.then(
      () => undefined,
      () => undefined
    );
    return dispatch;
  }

  private createReadDataArgs(): DataGridReadDataEventArgs {
    return {
      page: this.currentPage,
      pageSize: this.config.pageSize,
      columns: this.columns.toInfo(this.config.filterMethod),
      sortField: this.columns.sortColumn?.field ?? null,
    };
  }

  // ===========================================================================
  // Editing
  // ===========================================================================

  get editState(): DataGridEditState {
    return this.editSession.state;
  }

  /** Item being created or edited, or null */
  get editItem(): TItem | null {
    return this.editSession.item;
  }

  get currentEditSession(): EditSession<TItem> | null {
    return this.editSession.current;
  }

  /** True while the popup editor is shown */
  get popupVisible(): boolean {
    return this.popup;
  }

  /**
   * Start creating a new row from a fresh `itemFactory` instance.
   * @throws DataGridConfigError if no itemFactory is configured
   */
  newRow(): void {
    const factory = this.config.itemFactory;
    if (!factory) {
      throw new DataGridConfigError('Cannot create a new row: no itemFactory configured');
    }

    this.beginEdit('new', factory());
  }

  /**
   * Start editing an existing row
   */
  editRow(item: TItem): void {
    this.beginEdit('edit', item);
  }

  private beginEdit(state: Exclude<DataGridEditState, 'none'>, item: TItem): void {
    if (this.editSession.isEditing()) {
      console.warn(`Data grid: replacing open "${this.editSession.state}" edit session`);
    }

    this.editSession.begin(state, item, this.columns.editableColumns);

    if (this.config.editMode === 'popup') {
      this.popup = true;
    }

    this.notifyListeners();
  }

  /**
   * Stage a value for an editable column of the open session
   * @throws ColumnNotFoundError if the column is not editable in this session
   */
  setCellValue(columnId: string, value: CellValue): void {
    if (this.editSession.setCellValue(columnId, value)) {
      this.notifyListeners();
    }
  }

  getCellValue(columnId: string): CellValue {
    return this.editSession.getCellValue(columnId);
  }

  /**
   * Commit the open session.
   *
   * A cancelling rowInserting/rowUpdating subscriber aborts the save and
   * leaves the session open so the user can retry.
   *
   * @returns true if the row was committed
   */
  async save(): Promise<boolean> {
    const session = this.editSession.current;
    if (!session) {
      return false;
    }

    const editableColumns = this.columns.editableColumns;
    const values = Object.freeze(this.editSession.getEditedValues(editableColumns));
    const isNew = session.state === 'new';
    const gate = isNew ? this.rowInserting : this.rowUpdating;

    if (!gate.isSafeToProceed(session.item, values)) {
      return false;
    }

    // a retry after a failed rowInserted must not append the item twice
    if (
      this.config.useInternalEditing &&
      isNew &&
      this.collection.canMutate &&
      !this.collection.contains(session.item)
    ) {
      this.collection.add(session.item);
    }

    // new items must always receive their values; edited items only when
    // the grid owns persistence
    if (this.config.useInternalEditing || isNew) {
      this.editSession.applyTo(editableColumns);
      this.invalidate();
    }

    const saved: SavedRowItem<TItem> = { item: session.item, values };
    if (isNew) {
      await this.rowInserted.invoke(saved);
    } else {
      await this.rowUpdated.invoke(saved);
    }

    this.closeEditSession();
    return true;
  }

  /**
   * Discard the open session without touching the data source
   */
  cancel(): void {
    this.closeEditSession();
  }

  /**
   * Remove a row. A cancelling rowRemoving subscriber makes this a no-op.
   *
   * When the grid owns persistence and the source is mutable the item is
   * removed from it; rowRemoved fires either way.
   *
   * @returns false if a subscriber cancelled
   */
  async deleteRow(item: TItem): Promise<boolean> {
    if (!this.rowRemoving.isSafeToProceed(item, undefined)) {
      return false;
    }

    if (this.config.useInternalEditing && this.collection.canMutate && this.collection.contains(item)) {
      this.collection.remove(item);
    }

    this.invalidate();
    this.notifyListeners();

    await this.rowRemoved.invoke(item);
    return true;
  }

  private closeEditSession(): void {
    this.editSession.clear();

    if (this.config.editMode === 'popup') {
      this.popup = false;
    }

    this.notifyListeners();
  }

  // ===========================================================================
  // Selection
  // ===========================================================================

  get selectedRow(): TItem | null {
    return this.selected;
  }

  /**
   * Select a single row. Ignored while an edit session is open or when
   * `rowSelectable` rejects the item.
   */
  async selectRow(item: TItem): Promise<void> {
    if (this.editSession.isEditing()) {
      return;
    }
    if (this.config.rowSelectable && !this.config.rowSelectable(item)) {
      return;
    }

    this.selected = item;
    this.notifyListeners();

    await this.selectedRowChanged.invoke(item);
  }

  isRowSelectable(item: TItem): boolean {
    return !this.editSession.isEditing() && (this.config.rowSelectable?.(item) ?? true);
  }

  isDetailRowVisible(item: TItem): boolean {
    return this.config.detailRowTrigger?.(item) ?? false;
  }

  // ===========================================================================
  // React 18 Subscription
  // ===========================================================================

  /**
   * Subscribe to view changes.
   * Compatible with React 18's useSyncExternalStore.
   * @returns Unsubscribe function
   */
  subscribe = (listener: ViewListener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  /**
   * Version number, incremented after every state change
   */
  getSnapshot = (): number => {
    return this.version;
  };

  private notifyListeners(): void {
    this.version++;
    for (const listener of this.listeners) {
      try {
        listener();
      } catch (error) {
        console.error('View listener error:', error);
      }
    }
  }
}
