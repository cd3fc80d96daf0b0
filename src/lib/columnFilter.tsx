import React from 'react';
import type { FilterFn } from '@tanstack/react-table';
import { DropdownFilter } from '../components/DropdownFilter';
import type { ExactFilter, FilterOption } from './filters';
import { exactFilter, exactMatchFilterFn, factorFilterOptions, selectedOptionValue } from './filters';
import type { CellValue, FactorColumnSpec, Row } from './types';

export type FilterInputRenderer = (
  values: readonly CellValue[],
  name: string,
  filterValue?: unknown
) => React.ReactElement;

export type ColumnFilterConfig = {
  columnId: string;
  elementId: string;
  levels: readonly string[];
  options: (values: readonly CellValue[]) => FilterOption[];
  filterFn: FilterFn<Row>;
  toFilterValue: (level: string | undefined) => ExactFilter | undefined;
  renderFilter: FilterInputRenderer;
};

/** Renders a drop-down filter for a column of the table registered as `elementId`. */
export function createDropdownFilterRenderer(
  elementId: string,
  levels: readonly string[],
  style?: React.CSSProperties
): FilterInputRenderer {
  return (values, name, filterValue) => (
    <DropdownFilter
      elementId={elementId}
      columnId={name}
      name={name}
      options={factorFilterOptions(levels, values)}
      value={selectedOptionValue(filterValue)}
      style={style}
    />
  );
}

export function createColumnFilterConfig(
  elementId: string,
  column: FactorColumnSpec,
  style?: React.CSSProperties
): ColumnFilterConfig {
  return {
    columnId: column.key,
    elementId,
    levels: column.levels,
    options: (values) => factorFilterOptions(column.levels, values),
    filterFn: exactMatchFilterFn,
    toFilterValue: exactFilter,
    renderFilter: createDropdownFilterRenderer(elementId, column.levels, style),
  };
}
