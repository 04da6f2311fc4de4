/**
 * Filter System Types
 * Type definitions for the column filter subsystem
 */

import type { CellValue } from '../types/index.js';

export type { CellValue };

/**
 * Predicate types supported by column filters
 */
export type PredicateType =
  | 'text.contains'
  | 'text.beginsWith'
  | 'text.endsWith'
  | 'text.equals'
  | 'text.notEquals';

/**
 * Base interface for all filter predicates
 */
export interface FilterPredicate {
  /**
   * Predicate type identifier
   */
  readonly type: PredicateType;

  /**
   * Human-readable description for UI display
   */
  readonly description: string;

  /**
   * Test if a cell value matches this predicate
   */
  test(value: CellValue): boolean;
}

