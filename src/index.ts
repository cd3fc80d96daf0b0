export type { CellValue, ColumnKind, ColumnSpec, FactorColumnSpec, PlainColumnSpec, Primitive, Row, Table } from './lib/types';
export { isFactorColumn } from './lib/types';
export { isIntegerValue, isIntegerVector } from './lib/integer';
export { MISSING_LEVEL, asFactorColumns, normalizeFactorColumns, presentLevels } from './lib/factors';
export { DEFAULT_DOWNLOAD_FILE_NAME, csvFileName, safeBaseName } from './lib/fileName';
export { type ElementIdGenerator, ELEMENT_ID_PREFIX, createElementIdGenerator } from './lib/elementId';
export {
  type FilterOption,
  ALL_OPTION_LABEL,
  ALL_OPTION_VALUE,
  decodeOptionValue,
  encodeOptionValue,
  type ExactFilter,
  exactFilter,
  exactMatchFilterFn,
  exactMatches,
  factorFilterOptions,
  includesText,
  selectedOptionValue,
} from './lib/filters';
export { type TableHandle, downloadDataCsv, registerTable, setFilter } from './lib/tableRegistry';
export { coerceCell, downloadCsv, parseCsvTable, toCsv, type ParseCsvOptions } from './lib/csv';
export { type ColumnFilterConfig, type FilterInputRenderer, createColumnFilterConfig, createDropdownFilterRenderer } from './lib/columnFilter';
export {
  type BuildFilterableTableOptions,
  type FilterableTableResult,
  buildFilterableTable,
} from './lib/buildFilterableTable';
export { DataTable, type TableRenderOptions } from './components/DataTable';
export { DEFAULT_FILTER_STYLE, DropdownFilter } from './components/DropdownFilter';
export { DownloadCsvButton } from './components/DownloadCsvButton';
