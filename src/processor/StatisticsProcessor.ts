import { createDataSheet } from '../model/DataSheet';
import type { CellValue, DataSheet } from '../model/DataSheet';
import { CellProcessor } from './CellProcessor';

export type ColumnType = 'number' | 'boolean' | 'datetime' | 'string' | 'mixed' | 'empty';

export interface CorrelationMatrix {
  columns: string[];
  matrix: (number | null)[][];
}

const NUMERIC_STAT_NAMES = ['count', 'mean', 'std', 'min', '25%', '50%', '75%', 'max'];
const OBJECT_STAT_NAMES = ['count', 'unique', 'top', 'freq'];

export class StatisticsProcessor {
  static inferColumnType(values: CellValue[]): ColumnType {
    const kinds = new Set<string>();
    for (const value of values) {
      if (value !== null) {
        kinds.add(CellProcessor.kindOf(value));
      }
    }
    if (kinds.size === 0) return 'empty';
    if (kinds.size > 1) return 'mixed';
    const [kind] = [...kinds];
    return kind === 'datetime' || kind === 'number' || kind === 'boolean' ? kind : 'string';
  }

  static columnValues(sheet: DataSheet, columnIndex: number): CellValue[] {
    return sheet.data.map(row => row[columnIndex]);
  }

  static columnTypes(sheet: DataSheet): ColumnType[] {
    return sheet.columnNames.map((_, i) => StatisticsProcessor.inferColumnType(StatisticsProcessor.columnValues(sheet, i)));
  }

  /** Numeric values of a column, skipping anything that is not a finite number. */
  static numericValues(values: CellValue[]): number[] {
    const nums: number[] = [];
    for (const value of values) {
      if (typeof value === 'number' && Number.isFinite(value)) {
        nums.push(value);
      }
    }
    return nums;
  }

  static quantile(sorted: number[], q: number): number | null {
    if (sorted.length === 0) return null;
    const pos = (sorted.length - 1) * q;
    const base = Math.floor(pos);
    const rest = pos - base;
    if (base + 1 < sorted.length) {
      return sorted[base] + rest * (sorted[base + 1] - sorted[base]);
    }
    return sorted[base];
  }

  static mean(nums: number[]): number | null {
    if (nums.length === 0) return null;
    return nums.reduce((a, x) => a + x, 0) / nums.length;
  }

  /** Sample standard deviation (n - 1). */
  static stdev(nums: number[]): number | null {
    const mean = StatisticsProcessor.mean(nums);
    if (mean === null || nums.length < 2) return null;
    const variance = nums.reduce((a, x) => a + (x - mean) ** 2, 0) / (nums.length - 1);
    return Math.sqrt(variance);
  }

  static numericSummary(nums: number[]): (number | null)[] {
    const sorted = [...nums].sort((a, b) => a - b);
    return [
      nums.length,
      StatisticsProcessor.mean(nums),
      StatisticsProcessor.stdev(nums),
      sorted.length ? sorted[0] : null,
      StatisticsProcessor.quantile(sorted, 0.25),
      StatisticsProcessor.quantile(sorted, 0.5),
      StatisticsProcessor.quantile(sorted, 0.75),
      sorted.length ? sorted[sorted.length - 1] : null,
    ];
  }

  /**
   * Descriptive statistics of a sheet. Numeric columns get count, mean, std, min, quartiles and max;
   * when there are none, every other column gets count, unique, top and freq.
   */
  static describe(sheet: DataSheet): DataSheet {
    const types = StatisticsProcessor.columnTypes(sheet);
    const numericIndexes = types
      .map((type, i) => ({ type, i }))
      .filter(({ type }) => type === 'number')
      .map(({ i }) => i);

    if (numericIndexes.length > 0) {
      const summaries = numericIndexes.map(i =>
        StatisticsProcessor.numericSummary(StatisticsProcessor.numericValues(StatisticsProcessor.columnValues(sheet, i)))
      );
      const data: CellValue[][] = NUMERIC_STAT_NAMES.map((_, row) => summaries.map(summary => summary[row]));
      return StatisticsProcessor.statisticsSheet(sheet, numericIndexes.map(i => sheet.columnNames[i]), NUMERIC_STAT_NAMES, data);
    }

    const objectIndexes = types
      .map((type, i) => ({ type, i }))
      .filter(({ type }) => type !== 'empty')
      .map(({ i }) => i);
    if (objectIndexes.length === 0) {
      throw new Error(`No columns to describe in sheet "${sheet.name}"`);
    }

    const summaries = objectIndexes.map(i => StatisticsProcessor.objectSummary(StatisticsProcessor.columnValues(sheet, i)));
    const data: CellValue[][] = OBJECT_STAT_NAMES.map((_, row) => summaries.map(summary => summary[row]));
    return StatisticsProcessor.statisticsSheet(sheet, objectIndexes.map(i => sheet.columnNames[i]), OBJECT_STAT_NAMES, data);
  }

  private static objectSummary(values: CellValue[]): CellValue[] {
    const counts = new Map<string, { value: CellValue; count: number }>();
    let count = 0;
    for (const value of values) {
      if (value === null) continue;
      count++;
      const key = CellProcessor.cellKey(value);
      const entry = counts.get(key);
      if (entry) {
        entry.count++;
      } else {
        counts.set(key, { value, count: 1 });
      }
    }
    let top: { value: CellValue; count: number } | undefined;
    for (const entry of counts.values()) {
      if (!top || entry.count > top.count) {
        top = entry;
      }
    }
    return [count, counts.size, top ? top.value : null, top ? top.count : null];
  }

  private static statisticsSheet(sheet: DataSheet, columns: string[], statNames: string[], data: CellValue[][]): DataSheet {
    const stats = createDataSheet(`${sheet.name}_statistics`, columns, data);
    stats.index = [...statNames];
    return stats;
  }

  static pearson(pairs: [number, number][]): number | null {
    const n = pairs.length;
    if (n < 2) return null;
    const mx = pairs.reduce((a, [x]) => a + x, 0) / n;
    const my = pairs.reduce((a, [, y]) => a + y, 0) / n;
    let num = 0;
    let dx2 = 0;
    let dy2 = 0;
    for (const [x, y] of pairs) {
      const dx = x - mx;
      const dy = y - my;
      num += dx * dy;
      dx2 += dx * dx;
      dy2 += dy * dy;
    }
    const den = Math.sqrt(dx2 * dy2);
    return den ? num / den : null;
  }

  /** Pearson correlation of every pair of numeric columns, over rows where both are present. */
  static correlationMatrix(sheet: DataSheet): CorrelationMatrix {
    const types = StatisticsProcessor.columnTypes(sheet);
    const indexes = types.map((type, i) => ({ type, i })).filter(({ type }) => type === 'number').map(({ i }) => i);
    const matrix = indexes.map((a, ai) =>
      indexes.map((b, bi) => {
        if (ai === bi) return 1;
        const pairs: [number, number][] = [];
        for (const row of sheet.data) {
          const x = row[a];
          const y = row[b];
          if (typeof x === 'number' && typeof y === 'number' && Number.isFinite(x) && Number.isFinite(y)) {
            pairs.push([x, y]);
          }
        }
        return StatisticsProcessor.pearson(pairs);
      })
    );
    return { columns: indexes.map(i => sheet.columnNames[i]), matrix };
  }
}
