/**
 * Filter Predicate Implementations
 * Case-insensitive text predicates used by column filters
 */

import type { FilterPredicate, CellValue, PredicateType } from './types.js';
import type { DataGridFilterMethod } from '../types/index.js';

// ===========================================================================
// Helper Functions
// ===========================================================================

/**
 * Convert a cell value to the string a filter compares against.
 * null and undefined become the empty string.
 */
export function toPlainText(value: CellValue): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

function fold(text: string): string {
  return text.toLowerCase();
}

// ===========================================================================
// Text Predicates
// ===========================================================================

/**
 * Text contains predicate
 */
export class TextContainsPredicate implements FilterPredicate {
  readonly type: PredicateType = 'text.contains';
  readonly description: string;
  private readonly searchText: string;

  constructor(searchText: string) {
    this.searchText = fold(searchText);
    this.description = `Contains "${searchText}"`;
  }

  test(value: CellValue): boolean {
    return fold(toPlainText(value)).includes(this.searchText);
  }
}

/**
 * Text begins with predicate
 */
export class TextBeginsWithPredicate implements FilterPredicate {
  readonly type: PredicateType = 'text.beginsWith';
  readonly description: string;
  private readonly prefix: string;

  constructor(prefix: string) {
    this.prefix = fold(prefix);
    this.description = `Begins with "${prefix}"`;
  }

  test(value: CellValue): boolean {
    return fold(toPlainText(value)).startsWith(this.prefix);
  }
}

/**
 * Text ends with predicate
 */
export class TextEndsWithPredicate implements FilterPredicate {
  readonly type: PredicateType = 'text.endsWith';
  readonly description: string;
  private readonly suffix: string;

  constructor(suffix: string) {
    this.suffix = fold(suffix);
    this.description = `Ends with "${suffix}"`;
  }

  test(value: CellValue): boolean {
    return fold(toPlainText(value)).endsWith(this.suffix);
  }
}

/**
 * Text equals predicate
 */
export class TextEqualsPredicate implements FilterPredicate {
  readonly type: PredicateType = 'text.equals';
  readonly description: string;
  private readonly targetText: string;

  constructor(targetText: string) {
    this.targetText = fold(targetText);
    this.description = `Equals "${targetText}"`;
  }

  test(value: CellValue): boolean {
    return fold(toPlainText(value)) === this.targetText;
  }
}

/**
 * Text not equals predicate
 */
export class TextNotEqualsPredicate implements FilterPredicate {
  readonly type: PredicateType = 'text.notEquals';
  readonly description: string;
  private readonly targetText: string;

  constructor(targetText: string) {
    this.targetText = fold(targetText);
    this.description = `Not equals "${targetText}"`;
  }

  test(value: CellValue): boolean {
    return fold(toPlainText(value)) !== this.targetText;
  }
}

// ===========================================================================
// Factory
// ===========================================================================

/**
 * Create the predicate for a filter method and search text
 */
export function createTextPredicate(method: DataGridFilterMethod, searchText: string): FilterPredicate {
  switch (method) {
    case 'startsWith':
      return new TextBeginsWithPredicate(searchText);
    case 'endsWith':
      return new TextEndsWithPredicate(searchText);
    case 'equals':
      return new TextEqualsPredicate(searchText);
    case 'notEquals':
      return new TextNotEqualsPredicate(searchText);
    case 'contains':
    default:
      return new TextContainsPredicate(searchText);
  }
}
