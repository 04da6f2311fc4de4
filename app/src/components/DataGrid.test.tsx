// @vitest-environment jsdom
/**
 * DataGrid Component Tests
 *
 * Test coverage:
 * - Captions, rows and the empty state
 * - Sort buttons and filter inputs
 * - Pager navigation
 * - Inline and popup editing, delete
 * - Row selection and detail rows
 * - Error banner
 */

import { describe, it, expect } from 'vitest';
import { render, screen, fireEvent, act, within } from '@testing-library/react';
import { DataGrid } from './DataGrid.js';
import { DataGridController } from '../../../engine/core/grid/DataGridController.js';
import type { DataGridOptions } from '../../../engine/core/grid/DataGridOptions.js';

// =============================================================================
// Fixtures
// =============================================================================

interface Product {
  sku: string;
  name: string;
  price: number;
}

const PRODUCT_NAMES = ['Lamp', 'Desk', 'Chair', 'Shelf', 'Rug', 'Vase', 'Clock'];

function makeProducts(): Product[] {
  return PRODUCT_NAMES.map((name, i) => ({ sku: `P-${i + 1}`, name, price: 10 * (i + 1) }));
}

function createGrid(options: DataGridOptions<Product> = {}): DataGridController<Product> {
  return new DataGridController<Product>({
    data: makeProducts(),
    columns: [
      { field: 'sku' },
      { field: 'name', editable: true },
      { field: 'price', editable: true, parse: (text) => Number(text) },
    ],
    ...options,
  });
}

function createEditableGrid(options: DataGridOptions<Product> = {}): DataGridController<Product> {
  const grid = createGrid({
    editable: true,
    itemFactory: () => ({ sku: 'P-new', name: '', price: 0 }),
    ...options,
  });
  grid.addColumn({ id: 'commands', field: '', kind: 'command' });
  return grid;
}

function bodyRowText(): string[] {
  const [, body] = screen.getAllByRole('rowgroup');
  return within(body)
    .getAllByRole('row')
    .map((row) => row.textContent ?? '');
}

// =============================================================================
// Rendering Tests
// =============================================================================

describe('DataGrid - Rendering', () => {
  it('should render captions and the first page', () => {
    render(<DataGrid grid={createGrid()} getRowKey={(p) => p.sku} />);

    expect(screen.getAllByRole('columnheader').map((th) => th.textContent)).toEqual(['sku', 'name', 'price']);
    expect(bodyRowText()).toEqual(['P-1Lamp10', 'P-2Desk20', 'P-3Chair30', 'P-4Shelf40', 'P-5Rug50']);
  });

  it('should hide captions when showCaptions is off', () => {
    render(<DataGrid grid={createGrid({ showCaptions: false })} getRowKey={(p) => p.sku} />);
    expect(screen.queryAllByRole('columnheader')).toHaveLength(0);
  });

  it('should show an empty state', () => {
    render(<DataGrid grid={createGrid({ data: [] })} getRowKey={(p) => p.sku} />);
    expect(bodyRowText()).toEqual(['No records']);
  });
});

// =============================================================================
// Sorting, Filtering and Paging Tests
// =============================================================================

describe('DataGrid - Sorting and Filtering', () => {
  it('should sort when a caption is clicked', () => {
    render(<DataGrid grid={createGrid()} getRowKey={(p) => p.sku} />);

    fireEvent.click(screen.getByRole('button', { name: 'name' }));

    expect(bodyRowText()[0]).toBe('P-6Vase60');
    expect(screen.getByRole('button', { name: 'name ▼' })).toBeDefined();
    expect(screen.getAllByRole('columnheader')[1].getAttribute('aria-sort')).toBe('descending');
  });

  it('should render plain captions when sorting is off', () => {
    render(<DataGrid grid={createGrid({ sortable: false })} getRowKey={(p) => p.sku} />);
    expect(screen.queryByRole('button', { name: 'name' })).toBeNull();
  });

  it('should filter as the user types', () => {
    render(<DataGrid grid={createGrid({ filterable: true })} getRowKey={(p) => p.sku} />);

    fireEvent.change(screen.getByRole('searchbox', { name: 'Filter name' }), { target: { value: 'sh' } });

    expect(bodyRowText()).toEqual(['P-4Shelf40']);
  });

  it('should clear filters from the command column', () => {
    const grid = createEditableGrid({ filterable: true });
    render(<DataGrid grid={grid} getRowKey={(p) => p.sku} />);

    fireEvent.change(screen.getByRole('searchbox', { name: 'Filter name' }), { target: { value: 'sh' } });
    fireEvent.click(screen.getByRole('button', { name: 'Clear' }));

    expect(bodyRowText()).toHaveLength(5);
    expect(screen.getByRole('searchbox', { name: 'Filter name' })).toHaveProperty('value', '');
  });
});

describe('DataGrid - Pager', () => {
  it('should move between pages', () => {
    render(<DataGrid grid={createGrid({ showPager: true })} getRowKey={(p) => p.sku} />);

    expect(screen.getByRole('button', { name: 'Previous' }).hasAttribute('disabled')).toBe(true);
    expect(screen.getByRole('button', { name: '1' }).getAttribute('aria-current')).toBe('page');

    fireEvent.click(screen.getByRole('button', { name: 'Next' }));

    expect(bodyRowText()).toEqual(['P-6Vase60', 'P-7Clock70']);
    expect(screen.getByRole('button', { name: '2' }).getAttribute('aria-current')).toBe('page');
    expect(screen.getByRole('button', { name: 'Next' }).hasAttribute('disabled')).toBe(true);
  });

  it('should not render a pager by default', () => {
    render(<DataGrid grid={createGrid()} getRowKey={(p) => p.sku} />);
    expect(screen.queryByRole('navigation', { name: 'Pagination' })).toBeNull();
  });
});

// =============================================================================
// Editing Tests
// =============================================================================

describe('DataGrid - Editing', () => {
  it('should insert a row through the inline editor', async () => {
    const data = makeProducts();
    const grid = createEditableGrid({ data });
    render(<DataGrid grid={grid} getRowKey={(p) => p.sku} />);

    fireEvent.click(screen.getByRole('button', { name: 'New' }));
    fireEvent.change(screen.getByRole('textbox', { name: 'name' }), { target: { value: 'Stool' } });
    fireEvent.change(screen.getByRole('textbox', { name: 'price' }), { target: { value: '25' } });

    await act(async () => {
      fireEvent.click(screen.getByRole('button', { name: 'Save' }));
    });

    expect(data).toHaveLength(8);
    expect(data[7]).toEqual({ sku: 'P-new', name: 'Stool', price: 25 });
    expect(screen.queryByRole('textbox')).toBeNull();
  });

  it('should discard inline edits on cancel', () => {
    const data = makeProducts();
    render(<DataGrid grid={createEditableGrid({ data })} getRowKey={(p) => p.sku} />);

    fireEvent.click(screen.getAllByRole('button', { name: 'Edit' })[0]);
    const input = screen.getByRole('textbox', { name: 'name' });
    expect(input).toHaveProperty('value', 'Lamp');

    fireEvent.change(input, { target: { value: 'Torch' } });
    fireEvent.click(screen.getByRole('button', { name: 'Cancel' }));

    expect(data[0].name).toBe('Lamp');
    expect(bodyRowText()[0]).toBe('P-1Lamp10EditDelete');
  });

  it('should edit in a dialog in popup mode', async () => {
    const data = makeProducts();
    render(<DataGrid grid={createEditableGrid({ data, editMode: 'popup' })} getRowKey={(p) => p.sku} />);

    fireEvent.click(screen.getAllByRole('button', { name: 'Edit' })[1]);
    const dialog = screen.getByRole('dialog', { name: 'Edit row' });
    fireEvent.change(within(dialog).getByRole('textbox', { name: 'price' }), { target: { value: '22' } });

    await act(async () => {
      fireEvent.click(within(dialog).getByRole('button', { name: 'Save' }));
    });

    expect(data[1].price).toBe(22);
    expect(screen.queryByRole('dialog')).toBeNull();
  });

  it('should delete a row', async () => {
    const data = makeProducts();
    render(<DataGrid grid={createEditableGrid({ data })} getRowKey={(p) => p.sku} />);

    await act(async () => {
      fireEvent.click(screen.getAllByRole('button', { name: 'Delete' })[0]);
    });

    expect(data).toHaveLength(6);
    expect(bodyRowText().map((text) => text.slice(0, 3))).toEqual(['P-2', 'P-3', 'P-4', 'P-5', 'P-6']);
  });

  it('should hide New over a read-only source', () => {
    render(<DataGrid grid={createEditableGrid({ data: Object.freeze(makeProducts()) })} getRowKey={(p) => p.sku} />);

    expect(screen.queryByRole('button', { name: 'New' })).toBeNull();
    expect(screen.getAllByRole('button', { name: 'Edit' })).toHaveLength(5);
  });

  it('should show a failed command in the error banner', () => {
    const grid = createGrid({ editable: true });
    grid.addColumn({ id: 'commands', field: '', kind: 'command' });
    render(<DataGrid grid={grid} getRowKey={(p) => p.sku} />);

    fireEvent.click(screen.getByRole('button', { name: 'New' }));

    const alert = screen.getByRole('alert');
    expect(within(alert).getByText('Cannot create a new row: no itemFactory configured')).toBeDefined();

    fireEvent.click(within(alert).getByRole('button', { name: 'Dismiss' }));
    expect(screen.queryByRole('alert')).toBeNull();
  });
});

// =============================================================================
// Selection and Detail Row Tests
// =============================================================================

describe('DataGrid - Selection', () => {
  it('should select a clicked row', () => {
    render(<DataGrid grid={createGrid()} getRowKey={(p) => p.sku} />);

    const [, body] = screen.getAllByRole('rowgroup');
    const rows = within(body).getAllByRole('row');
    fireEvent.click(rows[2]);

    expect(rows[2].getAttribute('aria-selected')).toBe('true');
    expect(rows[0].getAttribute('aria-selected')).toBe('false');
  });

  it('should mark rows rejected by rowSelectable as disabled', () => {
    render(<DataGrid grid={createGrid({ rowSelectable: (p) => p.price > 20 })} getRowKey={(p) => p.sku} />);

    const [, body] = screen.getAllByRole('rowgroup');
    const rows = within(body).getAllByRole('row');
    fireEvent.click(rows[0]);

    expect(rows[0].getAttribute('aria-disabled')).toBe('true');
    expect(rows[0].getAttribute('aria-selected')).toBe('false');
    expect(rows[2].hasAttribute('aria-disabled')).toBe(false);
  });

  it('should render detail rows chosen by the trigger', () => {
    const grid = createGrid({ detailRowTrigger: (p) => p.price > 40 });
    render(
      <DataGrid grid={grid} getRowKey={(p) => p.sku} renderDetailRow={(p) => <p>Details for {p.name}</p>} />
    );

    expect(screen.getByText('Details for Rug')).toBeDefined();
    expect(screen.queryByText('Details for Shelf')).toBeNull();
  });
});
