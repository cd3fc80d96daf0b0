import Papa from 'papaparse';
import type { CellValue, ColumnKind, ColumnSpec, Row, Table } from './types';
import { asFactorColumns } from './factors';

export function toCsv(columns: readonly ColumnSpec[], rows: readonly Row[]): string {
  const fields = columns.map((c) => c.key);
  return Papa.unparse({
    fields,
    data: rows.map((r) => fields.map((k) => r[k] ?? null)),
  });
}

export function downloadCsv(fileName: string, csv: string): void {
  const blob = new Blob([csv], { type: 'text/csv;charset=utf-8' });
  const url = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url;
  a.download = fileName;
  a.click();
  URL.revokeObjectURL(url);
}

export function coerceCell(raw: string): CellValue {
  const s = raw.trim();
  if (s === '') return null;

  const lower = s.toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;

  // plain decimals only; codes like 007 or 1e3 stay text
  if (/^-?(0|[1-9]\d*)(\.\d+)?$/.test(s)) return Number(s);

  return raw;
}

export function inferColumnKind(values: CellValue[]): Exclude<ColumnKind, 'factor'> {
  // pick the first non-null
  const v = values.find((x) => x !== null);
  if (v === undefined) return 'string';
  if (typeof v === 'boolean') return 'boolean';
  if (typeof v === 'number') return 'number';
  return 'string';
}

export type ParseCsvOptions = {
  factorColumns?: string[];
};

export function parseCsvTable(text: string, options: ParseCsvOptions = {}): Table {
  const parsed = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: true,
  });
  if (parsed.errors.length) {
    // keep going but surface the first few
    // eslint-disable-next-line no-console
    console.warn('CSV parse warnings:', parsed.errors.slice(0, 3));
  }

  const headers = (parsed.meta.fields ?? []).filter(Boolean);
  const rows: Row[] = parsed.data.map((r) => {
    const out: Row = {};
    for (const h of headers) {
      out[h] = coerceCell(r[h] ?? '');
    }
    return out;
  });

  const columns: ColumnSpec[] = headers.map((h) => ({
    key: h,
    kind: inferColumnKind(rows.slice(0, 80).map((r) => r[h] ?? null)), // sample for inference
  }));

  return asFactorColumns({ columns, rows }, options.factorColumns ?? []);
}
