/**
 * Filtering Subsystem
 * Export all filtering-related types and functions
 */

export type { PredicateType, FilterPredicate } from './types.js';
export * from './FilterPredicate.js';
export * from './FilterSortEngine.js';
