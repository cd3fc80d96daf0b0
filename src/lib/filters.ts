import type { FilterFn } from '@tanstack/react-table';
import type { CellValue, Row } from './types';
import { presentLevels } from './factors';

export type FilterOption = {
  label: string;
  value: string;
};

export const ALL_OPTION_LABEL = 'All';

// Labels are prefixed so that no category, not even one named "All" or
// "__ALL__", can be mistaken for the option that clears the filter.
export const ALL_OPTION_VALUE = '__ALL__';
const LEVEL_PREFIX = 'level:';

export function encodeOptionValue(level: string): string {
  return `${LEVEL_PREFIX}${level}`;
}

/** `undefined` means "no filter". */
export function decodeOptionValue(value: string): string | undefined {
  if (!value.startsWith(LEVEL_PREFIX)) return undefined;
  return value.slice(LEVEL_PREFIX.length);
}

export function factorFilterOptions(levels: readonly string[], values: readonly CellValue[]): FilterOption[] {
  return [
    { label: ALL_OPTION_LABEL, value: ALL_OPTION_VALUE },
    ...presentLevels(levels, values).map((l) => ({ label: l, value: encodeOptionValue(l) })),
  ];
}

// The table drops empty-string filter values, but '' is the level that
// missing values are filed under; the selected level travels wrapped.
export type ExactFilter = { equals: string };

export function exactFilter(level: string | undefined): ExactFilter | undefined {
  return level === undefined ? undefined : { equals: level };
}

function isExactFilter(v: unknown): v is ExactFilter {
  return typeof v === 'object' && v !== null && 'equals' in v && typeof v.equals === 'string';
}

/** The option a drop-down shows for the column's current filter value. */
export function selectedOptionValue(filterValue: unknown): string {
  return isExactFilter(filterValue) ? encodeOptionValue(filterValue.equals) : ALL_OPTION_VALUE;
}

export function exactMatches(value: CellValue, filter: ExactFilter | undefined): boolean {
  if (filter === undefined) return true;
  return value === filter.equals;
}

export function includesText(value: CellValue, q: string): boolean {
  if (!q) return true;
  if (value === null) return false;
  return String(value).toLowerCase().includes(q.toLowerCase());
}

export const exactMatchFilterFn: FilterFn<Row> = (row, columnId, filterValue) =>
  exactMatches(row.original[columnId] ?? null, isExactFilter(filterValue) ? filterValue : undefined);
exactMatchFilterFn.autoRemove = (v) => v === undefined;

export const textFilterFn: FilterFn<Row> = (row, columnId, filterValue) =>
  includesText(row.original[columnId] ?? null, String(filterValue ?? ''));
textFilterFn.autoRemove = (v) => v === undefined || String(v).trim() === '';
