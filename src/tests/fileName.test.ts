import { describe, expect, it } from 'vitest';
import { csvFileName, safeBaseName } from '../lib/fileName';
import { createElementIdGenerator, defaultElementIdGenerator } from '../lib/elementId';

describe('csvFileName', () => {
  it('defaults to download.csv', () => {
    expect(csvFileName()).toBe('download.csv');
  });

  it('keeps safe names as they are', () => {
    expect(csvFileName('ward report 2024')).toBe('ward report 2024.csv');
  });

  it('strips path separators', () => {
    expect(csvFileName('../evil')).toBe('..evil.csv');
    expect(csvFileName('a/b\\c:d')).toBe('abcd.csv');
  });

  it('falls back when nothing safe is left', () => {
    expect(safeBaseName('..')).toBe('download');
    expect(csvFileName('   ')).toBe('download.csv');
    expect(csvFileName('')).toBe('download.csv');
  });
});

describe('createElementIdGenerator', () => {
  it('never repeats an id', () => {
    const next = createElementIdGenerator('t');
    const first = next();
    const second = next();
    expect(first).toMatch(/^t-[a-z0-9]+-1$/);
    expect(second).toMatch(/^t-[a-z0-9]+-2$/);
    expect(first).not.toBe(second);
  });

  it('gives separate generators separate counters', () => {
    const a = createElementIdGenerator('t');
    const b = createElementIdGenerator('t');
    expect(a()).toMatch(/-1$/);
    expect(b()).toMatch(/-1$/);
  });

  it('uses the table prefix by default', () => {
    expect(defaultElementIdGenerator()).toMatch(/^filterable-table-/);
  });
});
