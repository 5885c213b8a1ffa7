import type { CellValue, DataSheet, RowLabel } from '../model/DataSheet';
import type { AggregationType, ConversionType, FilterOperator } from '../model/Operation';
import type { SheetField } from '../model/SheetConf';
import { OperationError } from '../model/OperationError';
import { CellProcessor } from './CellProcessor';
import { FormulaProcessor } from './FormulaProcessor';
import type { CompiledExpression } from './FormulaProcessor';
import { StatisticsProcessor } from './StatisticsProcessor';

export class DataSheetProcessor {
  static columnIndex(sheet: DataSheet, column: string, operation: string): number {
    const index = sheet.columnNames.indexOf(column);
    if (index === -1) {
      throw new OperationError(operation, sheet.name, `Column "${column}" not found in sheet "${sheet.name}"`);
    }
    return index;
  }

  /**
   * Removes rows that repeat an earlier row, comparing every column and ignoring row labels.
   * @returns The number of rows removed.
   */
  static dropDuplicates(sheet: DataSheet): number {
    const seen = new Set<string>();
    const keep: number[] = [];
    sheet.data.forEach((row, i) => {
      const key = CellProcessor.rowKey(row);
      if (!seen.has(key)) {
        seen.add(key);
        keep.push(i);
      }
    });
    const removed = sheet.data.length - keep.length;
    DataSheetProcessor.keepRows(sheet, keep);
    return removed;
  }

  static convertColumnType(sheet: DataSheet, column: string, to: ConversionType): void {
    const columnIndex = DataSheetProcessor.columnIndex(sheet, column, 'convertType');
    const converted = sheet.data.map((row, i) => {
      try {
        return CellProcessor.convertCell(row[columnIndex], to);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        throw new OperationError(
          'convertType',
          sheet.name,
          `Error converting column "${column}" to ${to} at row ${CellProcessor.formatLabel(sheet.index[i])}: ${message}`
        );
      }
    });
    sheet.data.forEach((row, i) => {
      row[columnIndex] = converted[i];
    });
  }

  /**
   * Applies the column types declared for a sheet in the configuration file.
   */
  static applyFieldTypes(sheet: DataSheet, fields: SheetField[]): void {
    for (const field of fields) {
      DataSheetProcessor.convertColumnType(sheet, field.name, field.type);
    }
  }

  /**
   * Stable sort on one column. Missing values always go last.
   */
  static sortByColumn(sheet: DataSheet, column: string, ascending = true): void {
    const columnIndex = DataSheetProcessor.columnIndex(sheet, column, 'sort');
    const order = sheet.data.map((_, i) => i);
    order.sort((a, b) => {
      const left = sheet.data[a][columnIndex];
      const right = sheet.data[b][columnIndex];
      if (left === null || right === null) {
        return (left === null ? 1 : 0) - (right === null ? 1 : 0);
      }
      const result = CellProcessor.compareValues(left, right);
      return ascending ? result : -result;
    });
    DataSheetProcessor.keepRows(sheet, order);
  }

  /**
   * Groups rows by the distinct non-missing values of a column and aggregates the other columns.
   * The result is a new sheet indexed by the group key, in ascending key order.
   */
  static groupBy(sheet: DataSheet, column: string, agg: AggregationType, outputName?: string): DataSheet {
    const keyIndex = DataSheetProcessor.columnIndex(sheet, column, 'groupBy');
    const groups = new Map<string, { key: Exclude<CellValue, null>; rows: CellValue[][] }>();
    for (const row of sheet.data) {
      const key = row[keyIndex];
      if (key === null) continue;
      const id = CellProcessor.cellKey(key);
      const group = groups.get(id);
      if (group) {
        group.rows.push(row);
      } else {
        groups.set(id, { key, rows: [row] });
      }
    }
    const sortedGroups = [...groups.values()].sort((a, b) => CellProcessor.compareValues(a.key, b.key));

    const valueIndexes = sheet.columnNames
      .map((_, i) => i)
      .filter(i => i !== keyIndex)
      .filter(i => DataSheetProcessor.isAggregatable(StatisticsProcessor.columnValues(sheet, i), agg));

    const data = sortedGroups.map(group =>
      valueIndexes.map(i => DataSheetProcessor.aggregate(group.rows.map(row => row[i]), agg))
    );
    const labels: RowLabel[] = sortedGroups.map(group =>
      typeof group.key === 'string' || typeof group.key === 'number' ? group.key : CellProcessor.formatCell(group.key)
    );

    return {
      name: outputName || `${sheet.name}_grouped`,
      columnNames: valueIndexes.map(i => sheet.columnNames[i]),
      index: labels,
      indexName: column,
      data,
      dropped: { columns: [], rows: [] },
    };
  }

  private static isAggregatable(values: CellValue[], agg: AggregationType): boolean {
    const type = StatisticsProcessor.inferColumnType(values);
    switch (agg) {
      case 'count':
        return true;
      case 'sum':
      case 'mean':
        return type === 'number' || type === 'empty';
      case 'min':
      case 'max':
        return type !== 'mixed';
    }
  }

  private static aggregate(values: CellValue[], agg: AggregationType): CellValue {
    const present = values.filter((value): value is Exclude<CellValue, null> => value !== null);
    switch (agg) {
      case 'count':
        return present.length;
      case 'sum':
        return StatisticsProcessor.numericValues(present).reduce((a, x) => a + x, 0);
      case 'mean':
        return StatisticsProcessor.mean(StatisticsProcessor.numericValues(present));
      case 'min':
      case 'max': {
        if (present.length === 0) return null;
        const sign = agg === 'min' ? 1 : -1;
        return present.reduce((best, value) => (sign * CellProcessor.compareValues(value, best) < 0 ? value : best));
      }
    }
  }

  static setIndex(sheet: DataSheet, column: string): void {
    const columnIndex = DataSheetProcessor.columnIndex(sheet, column, 'setIndex');
    const labels: RowLabel[] = [];
    sheet.data.forEach((row, i) => {
      const value = row[columnIndex];
      if (value === null) {
        throw new OperationError('setIndex', sheet.name, `Column "${column}" has a missing value at row ${i} and cannot be used as index`);
      }
      labels.push(typeof value === 'string' || typeof value === 'number' ? value : CellProcessor.formatCell(value));
    });
    sheet.index = labels;
    sheet.indexName = column;
    sheet.columnNames.splice(columnIndex, 1);
    sheet.data.forEach(row => row.splice(columnIndex, 1));
  }

  static resetIndex(sheet: DataSheet): void {
    const name = sheet.indexName ?? 'index';
    if (sheet.columnNames.includes(name)) {
      throw new OperationError('resetIndex', sheet.name, `Cannot insert "${name}", it already exists in sheet "${sheet.name}"`);
    }
    sheet.columnNames.unshift(name);
    sheet.data.forEach((row, i) => row.unshift(sheet.index[i]));
    sheet.index = sheet.data.map((_, i) => i);
    sheet.indexName = undefined;
  }

  /**
   * @returns The number of rows removed.
   */
  static dropMissing(sheet: DataSheet): number {
    const keep = sheet.data.map((row, i) => (row.includes(null) ? -1 : i)).filter(i => i !== -1);
    const removed = sheet.data.length - keep.length;
    DataSheetProcessor.keepRows(sheet, keep);
    return removed;
  }

  /**
   * Replaces missing values with the given text, stored as a number or boolean when it reads as one.
   * @returns The number of cells filled.
   */
  static fillMissing(sheet: DataSheet, value: string, columns?: string[]): number {
    const indexes = columns && columns.length > 0
      ? columns.map(column => DataSheetProcessor.columnIndex(sheet, column, 'fillMissing'))
      : sheet.columnNames.map((_, i) => i);
    const fillValue = CellProcessor.parseLiteral(value);
    let filled = 0;
    for (const row of sheet.data) {
      for (const i of indexes) {
        if (row[i] === null) {
          row[i] = fillValue;
          filled++;
        }
      }
    }
    return filled;
  }

  static renameColumn(sheet: DataSheet, from: string, to: string): void {
    const columnIndex = DataSheetProcessor.columnIndex(sheet, from, 'rename');
    if (from === to) {
      return;
    }
    if (to.trim() === '') {
      throw new OperationError('rename', sheet.name, `New name for column "${from}" cannot be empty`);
    }
    if (sheet.columnNames.includes(to)) {
      throw new OperationError('rename', sheet.name, `Column "${to}" already exists in sheet "${sheet.name}"`);
    }
    sheet.columnNames[columnIndex] = to;
  }

  /**
   * Keeps the rows whose value in a column matches the operator.
   * @returns The number of rows removed.
   */
  static filterRows(sheet: DataSheet, column: string, value: string, operator: FilterOperator = 'contains'): number {
    const columnIndex = DataSheetProcessor.columnIndex(sheet, column, 'filter');
    const target = CellProcessor.toNumber(value);
    const keep = sheet.data
      .map((row, i) => (DataSheetProcessor.matches(row[columnIndex], value, target, operator) ? i : -1))
      .filter(i => i !== -1);
    const removed = sheet.data.length - keep.length;
    DataSheetProcessor.keepRows(sheet, keep);
    return removed;
  }

  private static matches(cell: CellValue, value: string, target: number | null, operator: FilterOperator): boolean {
    const text = CellProcessor.formatCell(cell);
    switch (operator) {
      case 'contains':
        return text.includes(value);
      case 'eq':
        return text === value;
      case 'ne':
        return text !== value;
      case 'isNull':
        return cell === null;
      case 'isNotNull':
        return cell !== null;
      default: {
        const num = CellProcessor.toNumber(cell);
        if (num === null || target === null) return false;
        if (operator === 'gt') return num > target;
        if (operator === 'gte') return num >= target;
        if (operator === 'lt') return num < target;
        return num <= target;
      }
    }
  }

  /**
   * Evaluates "Target = expression" on every row and stores the result in the target column.
   */
  static applyFormula(sheet: DataSheet, formula: string): string {
    const { target, compiled } = DataSheetProcessor.compileFormula(sheet, formula);

    const missing = compiled.columns.filter(column => !sheet.columnNames.includes(column));
    if (missing.length > 0) {
      throw new OperationError('formula', sheet.name, `Error applying formula "${formula}": unknown column(s) ${missing.join(', ')}`);
    }

    const results = sheet.data.map((row, i) => {
      const values = new Map<string, CellValue>();
      sheet.columnNames.forEach((name, c) => values.set(name, row[c]));
      try {
        return FormulaProcessor.evaluate(compiled.ast, values);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        throw new OperationError(
          'formula',
          sheet.name,
          `Error applying formula "${formula}" at row ${CellProcessor.formatLabel(sheet.index[i])}: ${message}`
        );
      }
    });

    const existing = sheet.columnNames.indexOf(target);
    if (existing === -1) {
      sheet.columnNames.push(target);
      sheet.data.forEach((row, i) => row.push(results[i]));
    } else {
      sheet.data.forEach((row, i) => {
        row[existing] = results[i];
      });
    }
    return target;
  }

  private static compileFormula(sheet: DataSheet, formula: string): { target: string; compiled: CompiledExpression } {
    try {
      const parsed = FormulaProcessor.parseFormula(formula);
      return { target: parsed.target, compiled: FormulaProcessor.compileExpression(parsed.expression) };
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new OperationError('formula', sheet.name, `Error applying formula "${formula}": ${message}`);
    }
  }

  static head(sheet: DataSheet, rows = 5): DataSheet {
    const count = Math.max(0, rows);
    return {
      ...DataSheetProcessor.cloneDataSheet(sheet),
      index: sheet.index.slice(0, count),
      data: sheet.data.slice(0, count).map(row => [...row]),
    };
  }

  /**
   * Creates a deep clone of a DataSheet, including its record of dropped rows and columns.
   * @param dataSheet The DataSheet to clone.
   * @param newName Optional new name for the cloned DataSheet.
   */
  static cloneDataSheet(dataSheet: DataSheet, newName?: string): DataSheet {
    return {
      name: newName || dataSheet.name,
      columnNames: [...dataSheet.columnNames],
      index: [...dataSheet.index],
      indexName: dataSheet.indexName,
      data: dataSheet.data.map(row => [...row]),
      dropped: {
        columns: dataSheet.dropped.columns.map(column => ({ name: column.name, values: new Map(column.values) })),
        rows: dataSheet.dropped.rows.map(row => ({ label: row.label, values: { ...row.values } })),
      },
    };
  }

  /** Keeps the rows at the given positions, in the given order. */
  static keepRows(sheet: DataSheet, positions: number[]): void {
    sheet.data = positions.map(i => sheet.data[i]);
    sheet.index = positions.map(i => sheet.index[i]);
  }
}
