import React from 'react';
import {
  type ColumnDef,
  type SortingFn,
  type TableOptions,
  flexRender,
  getCoreRowModel,
  getFilteredRowModel,
  getSortedRowModel,
  useReactTable,
} from '@tanstack/react-table';
import type { CellValue, ColumnSpec, Row, Table } from '../lib/types';
import type { ColumnFilterConfig } from '../lib/columnFilter';
import { textFilterFn } from '../lib/filters';
import { columnLabel } from '../lib/labels';
import { downloadCsv, toCsv } from '../lib/csv';
import { registerTable } from '../lib/tableRegistry';

/** Anything `useReactTable` accepts except what the table wires itself. */
export type TableRenderOptions = Omit<
  Partial<TableOptions<Row>>,
  'data' | 'columns' | 'getCoreRowModel' | 'getFilteredRowModel' | 'enableFilters' | 'enableColumnFilters'
>;

const kindSorters: Record<'boolean' | 'number' | 'string', SortingFn<Row>> = {
  boolean: (a, b, id) => {
    const av = a.original[id];
    const bv = b.original[id];
    const an = av === null ? 2 : av === false ? 0 : 1; // false < true < null
    const bn = bv === null ? 2 : bv === false ? 0 : 1;
    return an - bn;
  },
  number: (a, b, id) => {
    const av = a.original[id];
    const bv = b.original[id];
    const an = typeof av === 'number' ? av : av === null ? Number.POSITIVE_INFINITY : Number(av);
    const bn = typeof bv === 'number' ? bv : bv === null ? Number.POSITIVE_INFINITY : Number(bv);
    if (Number.isNaN(an) && Number.isNaN(bn)) return 0;
    if (Number.isNaN(an)) return 1;
    if (Number.isNaN(bn)) return -1;
    return an - bn;
  },
  string: (a, b, id) => {
    const as = String(a.original[id] ?? '');
    const bs = String(b.original[id] ?? '');
    return as.localeCompare(bs);
  },
};

function levelSorter(levels: readonly string[]): SortingFn<Row> {
  const rank = new Map<string, number>();
  levels.forEach((l, i) => {
    if (!rank.has(l)) rank.set(l, i);
  });
  const position = (v: unknown) => rank.get(String(v ?? '')) ?? levels.length;
  return (a, b, id) => position(a.original[id]) - position(b.original[id]);
}

function renderCellValue(value: unknown): React.ReactNode {
  if (value === null || value === undefined) return <span className="tdMuted">—</span>;
  if (typeof value === 'boolean') return value ? 'Yes' : 'No';
  if (typeof value === 'number') return value.toLocaleString();
  return String(value);
}

export function DataTable({
  elementId,
  table,
  filters,
  renderOptions,
}: {
  elementId: string;
  table: Table;
  filters: Record<string, ColumnFilterConfig>;
  renderOptions?: TableRenderOptions;
}) {
  const columnDefs = React.useMemo<ColumnDef<Row>[]>(() => {
    const buildLeaf = (c: ColumnSpec): ColumnDef<Row> => {
      const filter = filters[c.key];
      return {
        id: c.key,
        accessorFn: (r) => r[c.key] ?? null,
        header: columnLabel(c),
        cell: (ctx) => renderCellValue(ctx.getValue()),
        enableColumnFilter: true,
        filterFn: filter ? filter.filterFn : textFilterFn,
        sortingFn: c.kind === 'factor' ? levelSorter(c.levels) : kindSorters[c.kind],
      };
    };
    return table.columns.map(buildLeaf);
  }, [table.columns, filters]);

  const instance = useReactTable<Row>({
    getSortedRowModel: getSortedRowModel(),
    ...renderOptions,
    data: table.rows,
    columns: columnDefs,
    enableFilters: true,
    enableColumnFilters: true,
    getCoreRowModel: getCoreRowModel(),
    getFilteredRowModel: getFilteredRowModel(),
  });

  React.useEffect(
    () =>
      registerTable(elementId, {
        setFilter: (columnId, value) => {
          const column = instance.getColumn(columnId);
          if (!column) {
            // eslint-disable-next-line no-console
            console.warn(`setFilter: table "${elementId}" has no column "${columnId}"`);
            return;
          }
          const filter = filters[columnId];
          column.setFilterValue(filter ? filter.toFilterValue(value) : value);
        },
        downloadDataCsv: (fileName) => {
          const visible = instance.getPrePaginationRowModel().rows.map((r) => r.original);
          downloadCsv(fileName, toCsv(table.columns, visible));
        },
      }),
    [elementId, instance, table.columns, filters]
  );

  const rowModel = instance.getRowModel();

  const valuesByColumn = React.useMemo(() => {
    const m = new Map<string, CellValue[]>();
    for (const c of table.columns) m.set(c.key, table.rows.map((r) => r[c.key] ?? null));
    return m;
  }, [table]);

  return (
    <div className="panel tableWrap" id={elementId}>
      <div className="tableToolbar">
        <div className="pill">
          Showing <b>{rowModel.rows.length}</b> / {table.rows.length}
        </div>
      </div>

      <table className="table">
        <thead>
          {instance.getHeaderGroups().map((hg) => (
            <tr key={hg.id}>
              {hg.headers.map((h) => (
                <th key={h.id} className="th" colSpan={h.colSpan}>
                  {h.isPlaceholder ? null : (
                    <div className="thLabel" onClick={h.column.getToggleSortingHandler()} title="Click to sort">
                      {flexRender(h.column.columnDef.header, h.getContext())}
                      {h.column.getIsSorted() === 'asc' ? ' ▲' : h.column.getIsSorted() === 'desc' ? ' ▼' : ''}
                    </div>
                  )}
                </th>
              ))}
            </tr>
          ))}
          <tr className="filterRow">
            {instance.getAllLeafColumns().map((column) => {
              const filter = filters[column.id];
              if (filter) {
                return (
                  <th key={column.id} className="th">
                    {filter.renderFilter(valuesByColumn.get(column.id) ?? [], column.id, column.getFilterValue())}
                  </th>
                );
              }
              const value = column.getFilterValue();
              return (
                <th key={column.id} className="th">
                  <input
                    className="input"
                    aria-label={`Filter ${column.id}`}
                    value={typeof value === 'string' ? value : ''}
                    onChange={(e) => column.setFilterValue(e.target.value)}
                  />
                </th>
              );
            })}
          </tr>
        </thead>
        <tbody>
          {rowModel.rows.map((row) => (
            <tr key={row.id}>
              {row.getVisibleCells().map((cell) => (
                <td key={cell.id} className="td">
                  {flexRender(cell.column.columnDef.cell, cell.getContext())}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
