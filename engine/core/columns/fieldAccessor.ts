/**
 * Field Accessors
 * Read and write item fields by dotted path ("address.city")
 */

import type { CellValue } from '../types/index.js';
import { FieldAccessError } from '../grid/errors.js';

export type FieldGetter<TItem> = (item: TItem) => CellValue;
export type FieldSetter<TItem> = (item: TItem, value: CellValue) => void;

function splitPath(field: string): string[] {
  return field.split('.').filter((part) => part.length > 0);
}

function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

/**
 * Create a getter for a field path.
 * A null or missing segment anywhere on the path reads as undefined.
 */
export function createFieldGetter<TItem>(field: string): FieldGetter<TItem> {
  const parts = splitPath(field);

  return (item: TItem): CellValue => {
    let current: unknown = item;
    for (const part of parts) {
      if (!isObjectLike(current)) {
        return undefined;
      }
      current = Reflect.get(current, part);
    }
    return current;
  };
}

/**
 * Create a setter for a field path.
 * @throws FieldAccessError if a parent object on the path is null or missing
 */
export function createFieldSetter<TItem>(field: string): FieldSetter<TItem> {
  const parts = splitPath(field);

  return (item: TItem, value: CellValue): void => {
    if (parts.length === 0) {
      throw new FieldAccessError(field, 'empty field path');
    }

    let target: unknown = item;
    for (let i = 0; i < parts.length - 1; i++) {
      if (!isObjectLike(target)) {
        throw new FieldAccessError(field, `"${parts.slice(0, i).join('.') || 'item'}" is not an object`);
      }
      target = Reflect.get(target, parts[i]);
    }

    if (!isObjectLike(target)) {
      throw new FieldAccessError(field, `"${parts.slice(0, -1).join('.') || 'item'}" is not an object`);
    }

    Reflect.set(target, parts[parts.length - 1], value);
  };
}
