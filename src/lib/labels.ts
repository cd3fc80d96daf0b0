import type { ColumnSpec } from './types';

const ACRONYMS = new Set(['id', 'csv', 'url']);

function titleCaseWords(s: string) {
  return s
    .split(' ')
    .filter(Boolean)
    .map((w) => (ACRONYMS.has(w.toLowerCase()) ? w.toUpperCase() : w[0].toUpperCase() + w.slice(1)))
    .join(' ');
}

/** "medication_fixed" -> "Medication Fixed", "unique_id" -> "Unique ID". */
export function prettyColumnLabel(raw: string): string {
  const s = raw.replace(/[_.]+/g, ' ').replace(/([a-z])([A-Z])/g, '$1 $2');
  return titleCaseWords(s) || raw;
}

export function columnLabel(spec: ColumnSpec): string {
  return spec.label ?? prettyColumnLabel(spec.key);
}
