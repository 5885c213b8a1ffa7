import type { CellValue, RowLabel } from '../model/DataSheet';
import type { ConversionType } from '../model/Operation';

const NUMERIC_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER_RE = /^[+-]?\d+$/;
const NA_TOKENS = new Set(['', 'NA', 'N/A', 'n/a', '#N/A', 'NaN', 'nan', 'null', 'NULL', 'None', '<NA>']);

// Ordering used when a column holds values of different kinds
const KIND_RANK = { boolean: 0, number: 1, datetime: 2, string: 3 } as const;

export type CellKind = keyof typeof KIND_RANK;

export class CellProcessor {
  /**
   * Parses a literal without missing-value detection: numbers, then booleans, then the raw text.
   * Integers too large to hold exactly stay as text.
   */
  static parseLiteral(text: string): Exclude<CellValue, null | Date> {
    const trimmed = text.trim();
    if (NUMERIC_RE.test(trimmed)) {
      const num = Number(trimmed);
      // integers past 2^53 would lose digits
      if (INTEGER_RE.test(trimmed) && !Number.isSafeInteger(num)) {
        return text;
      }
      return num;
    }
    const lower = trimmed.toLowerCase();
    if (lower === 'true') return true;
    if (lower === 'false') return false;
    return text;
  }

  static isMissingText(text: string): boolean {
    return NA_TOKENS.has(text.trim());
  }

  /**
   * Converts a text cell read from a file into a typed value.
   * Missing-value markers ("", "NA", "NaN", "null"...) become null.
   */
  static coerceText(text: string): CellValue {
    if (CellProcessor.isMissingText(text)) {
      return null;
    }
    return CellProcessor.parseLiteral(text);
  }

  static kindOf(value: Exclude<CellValue, null>): CellKind {
    if (value instanceof Date) return 'datetime';
    if (typeof value === 'number') return 'number';
    if (typeof value === 'boolean') return 'boolean';
    return 'string';
  }

  static formatDate(date: Date): string {
    const iso = date.toISOString();
    return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso;
  }

  /**
   * String form of a cell, as shown in previews and used by text filters.
   */
  static formatCell(value: CellValue): string {
    if (value === null) return 'NaN';
    if (value instanceof Date) return CellProcessor.formatDate(value);
    if (typeof value === 'boolean') return value ? 'True' : 'False';
    return String(value);
  }

  static formatLabel(label: RowLabel): string {
    return String(label);
  }

  /**
   * Identity key: equal keys mean equal values of the same kind.
   */
  static cellKey(value: CellValue): string {
    if (value === null) return 'null';
    if (value instanceof Date) return `d:${value.getTime()}`;
    if (typeof value === 'number') return `n:${value}`;
    if (typeof value === 'boolean') return `b:${value}`;
    return `s:${value}`;
  }

  static rowKey(row: CellValue[]): string {
    return JSON.stringify(row.map(CellProcessor.cellKey));
  }

  /**
   * Total order on non-null values. Values of different kinds are ordered by kind.
   */
  static compareValues(a: Exclude<CellValue, null>, b: Exclude<CellValue, null>): number {
    const kindA = CellProcessor.kindOf(a);
    const kindB = CellProcessor.kindOf(b);
    if (kindA !== kindB) {
      return KIND_RANK[kindA] - KIND_RANK[kindB];
    }
    if (typeof a === 'string' && typeof b === 'string') {
      return a < b ? -1 : a > b ? 1 : 0;
    }
    const left = CellProcessor.sortNumber(a);
    const right = CellProcessor.sortNumber(b);
    return left < right ? -1 : left > right ? 1 : 0;
  }

  private static sortNumber(value: Exclude<CellValue, null | string>): number {
    if (value instanceof Date) return value.getTime();
    if (typeof value === 'boolean') return value ? 1 : 0;
    return value;
  }

  static compareLabels(a: RowLabel, b: RowLabel): number {
    return CellProcessor.compareValues(a, b);
  }

  static toNumber(value: CellValue): number | null {
    if (value === null) return null;
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'boolean') return value ? 1 : 0;
    if (value instanceof Date) return value.getTime();
    const trimmed = value.trim();
    return NUMERIC_RE.test(trimmed) ? Number(trimmed) : null;
  }

  /**
   * Converts a single cell to the requested type. Throws when the value cannot be represented.
   */
  static convertCell(value: CellValue, to: ConversionType): CellValue {
    switch (to) {
      case 'int':
        return CellProcessor.toInt(value);
      case 'float':
        return CellProcessor.toFloat(value);
      case 'string':
        if (value === null) return null;
        if (value instanceof Date) return value.toISOString();
        return CellProcessor.formatCell(value);
      case 'datetime':
        return CellProcessor.toDatetime(value);
    }
  }

  private static toInt(value: CellValue): number {
    if (value === null) {
      throw new Error('Cannot convert missing value to int');
    }
    if (typeof value === 'boolean') return value ? 1 : 0;
    if (value instanceof Date) return value.getTime();
    if (typeof value === 'number') {
      if (!Number.isFinite(value)) {
        throw new Error(`Cannot convert non-finite value ${value} to int`);
      }
      return Math.trunc(value);
    }
    const trimmed = value.trim();
    if (!INTEGER_RE.test(trimmed)) {
      throw new Error(`Invalid literal for int: "${value}"`);
    }
    return Number(trimmed);
  }

  private static toFloat(value: CellValue): number | null {
    if (value === null) return null;
    if (typeof value === 'string') {
      const trimmed = value.trim();
      if (!NUMERIC_RE.test(trimmed)) {
        throw new Error(`Could not convert string to float: "${value}"`);
      }
      return Number(trimmed);
    }
    return CellProcessor.toNumber(value);
  }

  private static toDatetime(value: CellValue): Date | null {
    if (value === null) return null;
    if (value instanceof Date) return value;
    if (typeof value === 'number') {
      const date = new Date(value);
      if (Number.isNaN(date.getTime())) {
        throw new Error(`Value ${value} is out of the datetime range`);
      }
      return date;
    }
    if (typeof value === 'boolean') {
      throw new Error(`Cannot convert boolean ${CellProcessor.formatCell(value)} to datetime`);
    }
    const time = Date.parse(value.trim());
    if (Number.isNaN(time)) {
      throw new Error(`Unknown datetime string format: "${value}"`);
    }
    return new Date(time);
  }
}
