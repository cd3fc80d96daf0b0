import React from 'react';
import { DataTable, type TableRenderOptions } from '../components/DataTable';
import { DownloadCsvButton } from '../components/DownloadCsvButton';
import { type ColumnFilterConfig, createColumnFilterConfig } from './columnFilter';
import { type ElementIdGenerator, defaultElementIdGenerator } from './elementId';
import { normalizeFactorColumns } from './factors';
import { DEFAULT_DOWNLOAD_FILE_NAME, csvFileName } from './fileName';
import { type Table, isFactorColumn } from './types';

export type BuildFilterableTableOptions = {
  /** Base name of the exported file; sanitized, `.csv` is appended. */
  downloadFileName?: string;
  /** Passed to `useReactTable` as given. */
  renderOptions?: TableRenderOptions;
  generateElementId?: ElementIdGenerator;
  filterStyle?: React.CSSProperties;
};

export type FilterableTableResult = Readonly<{
  elementId: string;
  csvFileName: string;
  table: Table;
  filters: Readonly<Record<string, ColumnFilterConfig>>;
  element: React.ReactElement;
  browsable: true;
}>;

/**
 * Wraps `input` in an interactive table with an exact-match drop-down filter
 * on every factor column and a button that downloads the rows currently shown.
 *
 * @example
 * const { element } = buildFilterableTable(
 *   asFactorColumns(medicalData, ['medications']),
 *   { downloadFileName: 'medications' }
 * );
 */
export function buildFilterableTable(
  input: Table,
  {
    downloadFileName = DEFAULT_DOWNLOAD_FILE_NAME,
    renderOptions = {},
    generateElementId = defaultElementIdGenerator,
    filterStyle,
  }: BuildFilterableTableOptions = {}
): FilterableTableResult {
  const table = normalizeFactorColumns(input);
  const fileName = csvFileName(downloadFileName);
  const elementId = generateElementId();

  const filters: Record<string, ColumnFilterConfig> = {};
  for (const column of table.columns) {
    if (!isFactorColumn(column)) continue;
    filters[column.key] = createColumnFilterConfig(elementId, column, filterStyle);
  }

  const element = (
    <div className="filterableTable">
      <DataTable elementId={elementId} table={table} filters={filters} renderOptions={renderOptions} />
      <DownloadCsvButton elementId={elementId} fileName={fileName} />
    </div>
  );

  return Object.freeze({
    elementId,
    csvFileName: fileName,
    table,
    filters: Object.freeze(filters),
    element,
    browsable: true as const,
  });
}
