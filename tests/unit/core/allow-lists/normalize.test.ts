import { describe, it, expect } from 'vitest';
import { normalizeScalar, normalizeListEntry } from '../../../../src/core/allow-lists/normalize.js';

describe('normalizeScalar', () => {
  it('should trim and lower-case strings', () => {
    expect(normalizeScalar('  PROD ')).toBe('prod');
  });

  it('should fold booleans and their spellings together', () => {
    expect(normalizeScalar(true)).toBe('true');
    expect(normalizeScalar('True')).toBe('true');
    expect(normalizeScalar('TRUE')).toBe('true');
    expect(normalizeScalar(false)).toBe('false');
  });

  it('should render numbers in decimal form', () => {
    expect(normalizeScalar(42)).toBe('42');
    expect(normalizeScalar(0.5)).toBe('0.5');
  });

  it('should render null and undefined as the text null', () => {
    expect(normalizeScalar(null)).toBe('null');
    expect(normalizeScalar(undefined)).toBe('null');
    expect(normalizeScalar(' Null ')).toBe('null');
  });

  it('should render timestamps as their date text', () => {
    expect(normalizeScalar(new Date(Date.UTC(2024, 0, 1)))).toBe('2024-01-01');
    expect(normalizeScalar(new Date(Date.UTC(2024, 0, 1, 8, 5, 0)))).toBe('2024-01-01 08:05:00');
  });

  it('should be idempotent', () => {
    for (const value of [' Staging ', true, 7, null, 'MiXeD Case']) {
      const once = normalizeScalar(value);
      expect(normalizeScalar(once)).toBe(once);
    }
  });
});

describe('normalizeListEntry', () => {
  it('should trim but keep case', () => {
    expect(normalizeListEntry('  Security ')).toBe('Security');
  });

  it('should reject blank strings and non-strings', () => {
    expect(normalizeListEntry('   ')).toBeNull();
    expect(normalizeListEntry(3)).toBeNull();
    expect(normalizeListEntry(null)).toBeNull();
    expect(normalizeListEntry(['a'])).toBeNull();
  });
});
