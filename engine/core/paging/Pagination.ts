/**
 * Pagination View
 * Page window slicing, page count, and the range of visible page links
 */

export interface PageRange {
  first: number;
  last: number;
}

/**
 * Names accepted by a pager item: a page number, 'prev' or 'next'
 */
export type PageName = number | string;

/**
 * Slice the filtered rows to the current page.
 * In remote mode the loader already returned exactly one page.
 * Clamping the page is the caller's job.
 */
export function computeDisplay<TItem>(
  filtered: ReadonlyArray<TItem>,
  currentPage: number,
  pageSize: number,
  remoteMode: boolean
): TItem[] {
  if (remoteMode) {
    return filtered.slice();
  }

  const start = (currentPage - 1) * pageSize;
  return filtered.slice(start, start + pageSize);
}

/**
 * Number of the last page; never less than 1.
 */
export function computeLastPage(totalItems: number, pageSize: number): number {
  return Math.max(Math.ceil(totalItems / pageSize), 1);
}

/**
 * Window of page links centered on the current page.
 */
export function computeVisiblePages(currentPage: number, lastPage: number, maxLinks: number): PageRange {
  const first = Math.max(currentPage - Math.floor(maxLinks / 2), 1);
  const last = Math.min(first + maxLinks - 1, lastPage);
  return { first, last };
}

/**
 * Resolve a pager item to a page in [1, lastPage].
 * Unknown names leave the page unchanged.
 */
export function resolvePageName(name: PageName, currentPage: number, lastPage: number): number {
  if (typeof name === 'number') {
    return Number.isInteger(name) ? clamp(name, lastPage) : currentPage;
  }

  if (name === 'prev') {
    return Math.max(currentPage - 1, 1);
  }
  if (name === 'next') {
    return Math.min(currentPage + 1, lastPage);
  }

  const pageNumber = Number.parseInt(name, 10);
  if (Number.isNaN(pageNumber) || String(pageNumber) !== name.trim()) {
    return currentPage;
  }
  return clamp(pageNumber, lastPage);
}

function clamp(page: number, lastPage: number): number {
  return Math.min(Math.max(page, 1), lastPage);
}
