export type TableHandle = {
  setFilter: (columnId: string, value: string | undefined) => void;
  downloadDataCsv: (fileName: string) => void;
};

const tables = new Map<string, TableHandle>();

export function registerTable(elementId: string, handle: TableHandle): () => void {
  tables.set(elementId, handle);
  return () => {
    if (tables.get(elementId) === handle) tables.delete(elementId);
  };
}

export function getTable(elementId: string): TableHandle | undefined {
  return tables.get(elementId);
}

function lookup(elementId: string, action: string): TableHandle | undefined {
  const handle = tables.get(elementId);
  if (!handle) {
    // eslint-disable-next-line no-console
    console.warn(`${action}: no table rendered with id "${elementId}"`);
  }
  return handle;
}

/** Sets or, with `undefined`, clears the filter of one column. */
export function setFilter(elementId: string, columnId: string, value: string | undefined): boolean {
  const handle = lookup(elementId, 'setFilter');
  if (!handle) return false;
  handle.setFilter(columnId, value);
  return true;
}

/** Exports the rows the table currently shows. */
export function downloadDataCsv(elementId: string, fileName: string): boolean {
  const handle = lookup(elementId, 'downloadDataCsv');
  if (!handle) return false;
  handle.downloadDataCsv(fileName);
  return true;
}
