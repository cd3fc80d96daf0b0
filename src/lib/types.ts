export type Primitive = string | number | boolean | null;

export type CellValue = Primitive; // no nested or list cells

export type Row = Record<string, CellValue>;

export type ColumnKind = 'factor' | 'string' | 'number' | 'boolean';

type ColumnBase = {
  key: string;
  label?: string;
};

export type FactorColumnSpec = ColumnBase & {
  kind: 'factor';
  // declared category order; filter options and sorting follow it
  levels: string[];
};

export type PlainColumnSpec = ColumnBase & {
  kind: Exclude<ColumnKind, 'factor'>;
};

export type ColumnSpec = FactorColumnSpec | PlainColumnSpec;

export type Table = {
  columns: ColumnSpec[];
  rows: Row[];
};

export function isFactorColumn(spec: ColumnSpec): spec is FactorColumnSpec {
  return spec.kind === 'factor';
}
