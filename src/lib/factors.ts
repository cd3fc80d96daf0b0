import type { CellValue, ColumnSpec, FactorColumnSpec, Row, Table } from './types';
import { isFactorColumn } from './types';

export const MISSING_LEVEL = '';

function label(value: CellValue): string | null {
  if (value === null) return null;
  return String(value);
}

/** Distinct labels that occur in `values`, in declared level order. */
export function presentLevels(levels: readonly string[], values: readonly CellValue[]): string[] {
  const seen = new Set<string>();
  for (const v of values) {
    const l = label(v);
    if (l !== null) seen.add(l);
  }
  return levels.filter((l, i) => seen.has(l) && levels.indexOf(l) === i);
}

/**
 * Missing factor values become the explicit `''` level so they can be
 * filtered on. The level is appended only when a missing value is present.
 */
export function normalizeFactorColumns(table: Table): Table {
  const factors = table.columns.filter(isFactorColumn);
  if (factors.length === 0) return { columns: table.columns, rows: table.rows.map((r) => ({ ...r })) };

  const missingIn = new Set<string>();
  const rows: Row[] = table.rows.map((r) => {
    const out: Row = { ...r };
    for (const c of factors) {
      const v = out[c.key];
      if (v === null || v === undefined) {
        out[c.key] = MISSING_LEVEL;
        missingIn.add(c.key);
      } else {
        out[c.key] = String(v);
      }
    }
    return out;
  });

  const columns: ColumnSpec[] = table.columns.map((c) => {
    if (!isFactorColumn(c) || !missingIn.has(c.key) || c.levels.includes(MISSING_LEVEL)) return c;
    return { ...c, levels: [...c.levels, MISSING_LEVEL] };
  });

  return { columns, rows };
}

/**
 * Turns the listed columns into factors; levels are their distinct labels,
 * sorted numerically for number columns and alphabetically otherwise.
 */
export function asFactorColumns(table: Table, keys: readonly string[]): Table {
  const wanted = new Set(keys);
  const columns = table.columns.map((c): ColumnSpec => {
    if (!wanted.has(c.key) || isFactorColumn(c)) return c;
    const present = table.rows.map((r) => r[c.key] ?? null).filter((v): v is string | number | boolean => v !== null);
    // numbers order by value, so 2 comes before 10
    const sorted =
      c.kind === 'number'
        ? Array.from(new Set(present.map(Number))).sort((a, b) => a - b).map(String)
        : Array.from(new Set(present.map(String))).sort((a, b) => a.localeCompare(b));
    const spec: FactorColumnSpec = {
      key: c.key,
      label: c.label,
      kind: 'factor',
      levels: sorted,
    };
    return spec;
  });
  return { columns, rows: table.rows };
}
