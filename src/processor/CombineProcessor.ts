import { createDataSheet } from '../model/DataSheet';
import type { CellValue, DataSheet } from '../model/DataSheet';
import type { MergeHow } from '../model/CombineAction';
import { OperationError } from '../model/OperationError';
import { CellProcessor } from './CellProcessor';
import { DataSheetProcessor } from './DataSheetProcessor';

export class CombineProcessor {
  /**
   * Stacks sheets vertically. Columns are the union of all columns in order of first appearance;
   * cells a sheet does not have are left missing. Row labels are renumbered.
   */
  static concatSheets(name: string, sheets: DataSheet[]): DataSheet {
    if (sheets.length === 0) {
      throw new OperationError('concat', name, 'No sheets to concatenate');
    }
    if (sheets.length === 1) {
      return CombineProcessor.renumbered(DataSheetProcessor.cloneDataSheet(sheets[0], name));
    }

    const allColumns: string[] = [];
    for (const sheet of sheets) {
      sheet.columnNames.forEach(col => {
        if (!allColumns.includes(col)) {
          allColumns.push(col);
        }
      });
    }

    const data: CellValue[][] = [];
    for (const sheet of sheets) {
      const colIndexMap = new Map(sheet.columnNames.map((col, idx) => [col, idx] as const));
      for (const row of sheet.data) {
        data.push(
          allColumns.map(col => {
            const idx = colIndexMap.get(col);
            return idx !== undefined ? row[idx] : null;
          })
        );
      }
    }
    return createDataSheet(name, allColumns, data);
  }

  /**
   * Joins sheets left to right on a shared key column.
   */
  static mergeSheets(name: string, sheets: DataSheet[], on: string, how: MergeHow = 'inner'): DataSheet {
    if (sheets.length === 0) {
      throw new OperationError('merge', name, 'No sheets to merge');
    }
    for (const sheet of sheets) {
      if (!sheet.columnNames.includes(on)) {
        throw new OperationError('merge', name, `Merge key "${on}" not found in sheet "${sheet.name}"`);
      }
    }
    let result = CombineProcessor.renumbered(DataSheetProcessor.cloneDataSheet(sheets[0], name));
    result.dropped = { columns: [], rows: [] };
    for (const right of sheets.slice(1)) {
      result = CombineProcessor.mergePair(name, result, right, on, how);
    }
    return result;
  }

  /**
   * Joins two sheets the way a relational join does: each left row is repeated once per matching
   * right row, in right-hand order. Overlapping non-key columns get "_x" and "_y" suffixes.
   */
  private static mergePair(name: string, left: DataSheet, right: DataSheet, on: string, how: MergeHow): DataSheet {
    const leftKeyIdx = left.columnNames.indexOf(on);
    const rightKeyIdx = right.columnNames.indexOf(on);

    const rightValueIdx = right.columnNames.map((_, i) => i).filter(i => i !== rightKeyIdx);
    const overlap = new Set(
      left.columnNames.filter(col => col !== on && right.columnNames.includes(col))
    );
    const leftColumns = left.columnNames.map(col => (overlap.has(col) ? `${col}_x` : col));
    const rightColumns = rightValueIdx.map(i => {
      const col = right.columnNames[i];
      return overlap.has(col) ? `${col}_y` : col;
    });

    // Build map for fast lookup by key value
    const rightMap = new Map<string, CellValue[][]>();
    for (const row of right.data) {
      const key = row[rightKeyIdx];
      if (key === null) continue;
      const id = CellProcessor.cellKey(key);
      const matches = rightMap.get(id);
      if (matches) {
        matches.push(row);
      } else {
        rightMap.set(id, [row]);
      }
    }

    const mergedData: CellValue[][] = [];
    for (const leftRow of left.data) {
      const key = leftRow[leftKeyIdx];
      const matches = key === null ? undefined : rightMap.get(CellProcessor.cellKey(key));
      if (matches) {
        for (const rightRow of matches) {
          mergedData.push([...leftRow, ...rightValueIdx.map(i => rightRow[i])]);
        }
      } else if (how === 'left') {
        mergedData.push([...leftRow, ...rightValueIdx.map(() => null)]);
      }
    }

    return createDataSheet(name, [...leftColumns, ...rightColumns], mergedData);
  }

  private static renumbered(sheet: DataSheet): DataSheet {
    sheet.index = sheet.data.map((_, i) => i);
    sheet.indexName = undefined;
    return sheet;
  }
}
