// src/model/DataSheet.ts

export type CellValue = string | number | boolean | Date | null;

export type RowLabel = string | number;

export interface DroppedColumn {
  name: string;
  values: Map<RowLabel, CellValue>;
}

export interface DroppedRow {
  label: RowLabel;
  values: { [columnName: string]: CellValue };
}

export interface DropLedger {
  columns: DroppedColumn[];
  rows: DroppedRow[];
}

export interface DataSheet {
  name: string;
  columnNames: string[];
  index: RowLabel[];
  indexName?: string;
  data: CellValue[][];
  dropped: DropLedger;
}

export type SheetsData = { [sheetName: string]: DataSheet };

export function createDataSheet(name: string, columnNames: string[], data: CellValue[][]): DataSheet {
  return {
    name,
    columnNames,
    index: data.map((_, i) => i),
    data,
    dropped: { columns: [], rows: [] },
  };
}

/**
 * Suffixes repeated column names so every name is distinct: `a, a, b` becomes `a, a.1, b`.
 */
export function uniqueColumnNames(names: string[]): string[] {
  const taken = new Set<string>();
  const counts = new Map<string, number>();
  return names.map(name => {
    let count = counts.get(name) ?? 0;
    let candidate = name;
    while (taken.has(candidate)) {
      count++;
      candidate = `${name}.${count}`;
    }
    counts.set(name, count);
    taken.add(candidate);
    return candidate;
  });
}
