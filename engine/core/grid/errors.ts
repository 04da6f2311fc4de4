/**
 * Data Grid - Errors
 *
 * Thrown for configuration and programming mistakes only. Vetoed row changes
 * are reported through boolean results, not exceptions.
 */

// =============================================================================
// Custom Error Classes
// =============================================================================

/**
 * Error thrown when options or column registrations are invalid.
 */
export class DataGridConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DataGridConfigError';
  }
}

/**
 * Error thrown when an operation names a column the registry does not hold.
 */
export class ColumnNotFoundError extends Error {
  columnId: string;

  constructor(columnId: string) {
    super(`Column not found: ${columnId}`);
    this.name = 'ColumnNotFoundError';
    this.columnId = columnId;
  }
}

/**
 * Error thrown when a field path cannot be written on an item.
 */
export class FieldAccessError extends Error {
  field: string;

  constructor(field: string, reason: string) {
    super(`Cannot write field "${field}": ${reason}`);
    this.name = 'FieldAccessError';
    this.field = field;
  }
}
