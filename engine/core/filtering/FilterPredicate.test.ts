/**
 * Filter Predicate Tests
 * Case-insensitive text predicates used by column filters
 */

import { describe, it, expect } from 'vitest';
import {
  TextContainsPredicate,
  TextBeginsWithPredicate,
  TextEndsWithPredicate,
  TextEqualsPredicate,
  TextNotEqualsPredicate,
  createTextPredicate,
  toPlainText,
} from './FilterPredicate.js';
import type { DataGridFilterMethod } from '../types/index.js';

// ===========================================================================
// Value Conversion
// ===========================================================================

describe('toPlainText', () => {
  it('should convert null and undefined to empty string', () => {
    expect(toPlainText(null)).toBe('');
    expect(toPlainText(undefined)).toBe('');
  });

  it('should stringify numbers and booleans', () => {
    expect(toPlainText(42)).toBe('42');
    expect(toPlainText(1.5)).toBe('1.5');
    expect(toPlainText(true)).toBe('true');
  });

  it('should use ISO form for dates', () => {
    expect(toPlainText(new Date(Date.UTC(2024, 0, 2)))).toBe('2024-01-02T00:00:00.000Z');
  });
});

// ===========================================================================
// Text Predicates
// ===========================================================================

describe('TextContainsPredicate', () => {
  it('should match substrings case-insensitively', () => {
    const predicate = new TextContainsPredicate('AB');
    expect(predicate.test('xxabxx')).toBe(true);
    expect(predicate.test('ABC')).toBe(true);
    expect(predicate.test('a-b')).toBe(false);
  });

  it('should match numbers by their text', () => {
    expect(new TextContainsPredicate('23').test(1234)).toBe(true);
  });

  it('should describe itself', () => {
    expect(new TextContainsPredicate('Ab').description).toBe('Contains "Ab"');
  });
});

describe('TextBeginsWithPredicate', () => {
  it('should match "abcdef" but not "xxabxx" for "ab"', () => {
    const predicate = new TextBeginsWithPredicate('ab');
    expect(predicate.test('abcdef')).toBe(true);
    expect(predicate.test('xxabxx')).toBe(false);
  });

  it('should ignore case', () => {
    expect(new TextBeginsWithPredicate('AB').test('abcdef')).toBe(true);
  });
});

describe('TextEndsWithPredicate', () => {
  it('should match suffixes case-insensitively', () => {
    const predicate = new TextEndsWithPredicate('EF');
    expect(predicate.test('abcdef')).toBe(true);
    expect(predicate.test('abcdefg')).toBe(false);
  });
});

describe('TextEqualsPredicate', () => {
  it('should match whole values case-insensitively', () => {
    const predicate = new TextEqualsPredicate('Smith');
    expect(predicate.test('SMITH')).toBe(true);
    expect(predicate.test('Smithson')).toBe(false);
  });

  it('should treat null as empty string', () => {
    expect(new TextEqualsPredicate('').test(null)).toBe(true);
  });
});

describe('TextNotEqualsPredicate', () => {
  it('should reject equal values regardless of case', () => {
    const predicate = new TextNotEqualsPredicate('open');
    expect(predicate.test('OPEN')).toBe(false);
    expect(predicate.test('closed')).toBe(true);
  });
});

// ===========================================================================
// Factory
// ===========================================================================

describe('createTextPredicate', () => {
  it('should create the predicate for each method', () => {
    expect(createTextPredicate('contains', 'a').type).toBe('text.contains');
    expect(createTextPredicate('startsWith', 'a').type).toBe('text.beginsWith');
    expect(createTextPredicate('endsWith', 'a').type).toBe('text.endsWith');
    expect(createTextPredicate('equals', 'a').type).toBe('text.equals');
    expect(createTextPredicate('notEquals', 'a').type).toBe('text.notEquals');
  });

  it('should match everything except the empty value for empty contains/starts/ends text', () => {
    const methods: DataGridFilterMethod[] = ['contains', 'startsWith', 'endsWith'];
    for (const method of methods) {
      const predicate = createTextPredicate(method, '');
      expect(predicate.test('anything')).toBe(true);
      expect(predicate.test(null)).toBe(true);
    }
  });
});
