import React from 'react';
import type { FilterOption } from '../lib/filters';
import { ALL_OPTION_VALUE, decodeOptionValue } from '../lib/filters';
import { setFilter } from '../lib/tableRegistry';

export const DEFAULT_FILTER_STYLE: React.CSSProperties = { width: '100%', height: '100%' };

/**
 * Select input filter with an "All" default option. Choosing "All" clears
 * the column filter of the table registered under `elementId`.
 */
export function DropdownFilter({
  elementId,
  columnId,
  name,
  options,
  value = ALL_OPTION_VALUE,
  style = DEFAULT_FILTER_STYLE,
}: {
  elementId: string;
  columnId: string;
  name: string;
  options: FilterOption[];
  value?: string;
  style?: React.CSSProperties;
}) {
  return (
    <select
      className="select"
      value={value}
      aria-label={`Filter ${name}`}
      style={style}
      onChange={(e) => {
        setFilter(elementId, columnId, decodeOptionValue(e.target.value));
      }}
    >
      {options.map((o) => (
        <option key={o.value} value={o.value}>
          {o.label}
        </option>
      ))}
    </select>
  );
}
