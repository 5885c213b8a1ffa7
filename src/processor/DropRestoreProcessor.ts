import type { CellValue, DataSheet, RowLabel } from '../model/DataSheet';
import { OperationError } from '../model/OperationError';
import { CellProcessor } from './CellProcessor';

/**
 * Dropping and restoring columns and rows. Dropped values are kept in the sheet's ledger
 * until they are restored, so several drops can be undone independently.
 */
export class DropRestoreProcessor {
  static availableColumns(sheet: DataSheet): string[] {
    return [...sheet.columnNames];
  }

  static droppedColumns(sheet: DataSheet): string[] {
    return sheet.dropped.columns.map(column => column.name);
  }

  static availableRows(sheet: DataSheet): RowLabel[] {
    return [...new Set(sheet.index)];
  }

  static droppedRows(sheet: DataSheet): RowLabel[] {
    return sheet.dropped.rows.map(row => row.label);
  }

  static dropColumns(sheet: DataSheet, columns: string[]): void {
    const missing = columns.filter(column => !sheet.columnNames.includes(column));
    if (missing.length > 0) {
      throw new OperationError('dropColumns', sheet.name, `Column drop error: ${missing.map(c => `"${c}"`).join(', ')} not found in sheet "${sheet.name}"`);
    }
    const unique = [...new Set(columns)];
    const positions = unique.map(column => sheet.columnNames.indexOf(column));

    for (const [n, column] of unique.entries()) {
      const position = positions[n];
      const values = new Map<RowLabel, CellValue>();
      sheet.data.forEach((row, i) => values.set(sheet.index[i], row[position]));
      sheet.dropped.columns = sheet.dropped.columns.filter(entry => entry.name !== column);
      sheet.dropped.columns.push({ name: column, values });
    }

    const keep = sheet.columnNames.map((_, i) => i).filter(i => !positions.includes(i));
    sheet.columnNames = keep.map(i => sheet.columnNames[i]);
    sheet.data = sheet.data.map(row => keep.map(i => row[i]));
  }

  static restoreColumns(sheet: DataSheet, columns: string[]): void {
    const dropped = DropRestoreProcessor.droppedColumns(sheet);
    const missing = columns.filter(column => !dropped.includes(column));
    if (missing.length > 0) {
      throw new OperationError('restoreColumns', sheet.name, `Column restore error: ${missing.map(c => `"${c}"`).join(', ')} were not dropped from sheet "${sheet.name}"`);
    }
    const clashing = columns.filter(column => sheet.columnNames.includes(column));
    if (clashing.length > 0) {
      throw new OperationError('restoreColumns', sheet.name, `Column restore error: ${clashing.map(c => `"${c}"`).join(', ')} already exist in sheet "${sheet.name}"`);
    }
    if (new Set(sheet.index).size !== sheet.index.length) {
      throw new OperationError('restoreColumns', sheet.name, `Column restore error: index of sheet "${sheet.name}" has duplicate labels`);
    }

    const unique = [...new Set(columns)];
    for (const column of unique) {
      const entry = sheet.dropped.columns.find(candidate => candidate.name === column);
      if (!entry) continue;
      sheet.columnNames.push(column);
      sheet.data.forEach((row, i) => {
        const value = entry.values.get(sheet.index[i]);
        row.push(value === undefined ? null : value);
      });
    }
    sheet.dropped.columns = sheet.dropped.columns.filter(entry => !unique.includes(entry.name));
  }

  static dropRows(sheet: DataSheet, labels: RowLabel[]): void {
    const present = new Set(sheet.index);
    const missing = labels.filter(label => !present.has(label));
    if (missing.length > 0) {
      throw new OperationError('dropRows', sheet.name, `Row drop error: ${missing.map(CellProcessor.formatLabel).join(', ')} not found in sheet "${sheet.name}"`);
    }
    const toDrop = new Set(labels);
    const keep: number[] = [];
    sheet.data.forEach((row, i) => {
      const label = sheet.index[i];
      if (!toDrop.has(label)) {
        keep.push(i);
        return;
      }
      const values: { [columnName: string]: CellValue } = {};
      sheet.columnNames.forEach((name, c) => {
        values[name] = row[c];
      });
      sheet.dropped.rows.push({ label, values });
    });
    sheet.data = keep.map(i => sheet.data[i]);
    sheet.index = keep.map(i => sheet.index[i]);
  }

  /**
   * Puts dropped rows back, aligned by column name, and re-sorts the sheet by row label.
   */
  static restoreRows(sheet: DataSheet, labels: RowLabel[]): void {
    const dropped = new Set(DropRestoreProcessor.droppedRows(sheet));
    const missing = labels.filter(label => !dropped.has(label));
    if (missing.length > 0) {
      throw new OperationError('restoreRows', sheet.name, `Row restore error: ${missing.map(CellProcessor.formatLabel).join(', ')} were not dropped from sheet "${sheet.name}"`);
    }
    const toRestore = new Set(labels);
    const restored = sheet.dropped.rows.filter(row => toRestore.has(row.label));
    sheet.dropped.rows = sheet.dropped.rows.filter(row => !toRestore.has(row.label));

    for (const row of restored) {
      sheet.index.push(row.label);
      sheet.data.push(sheet.columnNames.map(name => (Object.hasOwn(row.values, name) ? row.values[name] : null)));
    }

    const order = sheet.index.map((_, i) => i);
    order.sort((a, b) => CellProcessor.compareLabels(sheet.index[a], sheet.index[b]));
    sheet.data = order.map(i => sheet.data[i]);
    sheet.index = order.map(i => sheet.index[i]);
  }
}
