import { afterEach, describe, expect, it, vi } from 'vitest';
import { downloadDataCsv, getTable, registerTable, setFilter } from '../lib/tableRegistry';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('tableRegistry', () => {
  it('routes calls to the table with the given id', () => {
    const handle = { setFilter: vi.fn(), downloadDataCsv: vi.fn() };
    const unregister = registerTable('t-1', handle);

    expect(setFilter('t-1', 'ward', 'North')).toBe(true);
    expect(downloadDataCsv('t-1', 'wards.csv')).toBe(true);
    expect(handle.setFilter).toHaveBeenCalledWith('ward', 'North');
    expect(handle.downloadDataCsv).toHaveBeenCalledWith('wards.csv');

    unregister();
    expect(getTable('t-1')).toBeUndefined();
  });

  it('keeps tables with different ids apart', () => {
    const a = { setFilter: vi.fn(), downloadDataCsv: vi.fn() };
    const b = { setFilter: vi.fn(), downloadDataCsv: vi.fn() };
    const offA = registerTable('t-a', a);
    const offB = registerTable('t-b', b);

    setFilter('t-b', 'ward', undefined);
    expect(a.setFilter).not.toHaveBeenCalled();
    expect(b.setFilter).toHaveBeenCalledWith('ward', undefined);

    offA();
    offB();
  });

  it('does not drop a newer registration when an old one unregisters', () => {
    const old = { setFilter: vi.fn(), downloadDataCsv: vi.fn() };
    const current = { setFilter: vi.fn(), downloadDataCsv: vi.fn() };
    const offOld = registerTable('t-2', old);
    const offCurrent = registerTable('t-2', current);

    offOld();
    expect(getTable('t-2')).toBe(current);
    offCurrent();
  });

  it('warns about unknown ids', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(setFilter('missing', 'ward', 'North')).toBe(false);
    expect(downloadDataCsv('missing', 'x.csv')).toBe(false);
    expect(warn).toHaveBeenNthCalledWith(1, 'setFilter: no table rendered with id "missing"');
    expect(warn).toHaveBeenNthCalledWith(2, 'downloadDataCsv: no table rendered with id "missing"');
  });
});
