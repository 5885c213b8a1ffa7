import { describe, expect, it } from 'vitest';
import type { CellValue } from '../model/DataSheet';
import { CellProcessor } from '../processor/CellProcessor';

describe('CellProcessor', () => {
  describe('coerceText', () => {
    it('turns missing-value markers into null', () => {
      for (const marker of ['', '  ', 'NA', 'N/A', 'NaN', 'null', 'None', '#N/A']) {
        expect(CellProcessor.coerceText(marker)).toBeNull();
      }
    });

    it('reads numbers and booleans and keeps other text as is', () => {
      expect(CellProcessor.coerceText(' 42 ')).toBe(42);
      expect(CellProcessor.coerceText('-3.5')).toBe(-3.5);
      expect(CellProcessor.coerceText('3.5e2')).toBe(350);
      expect(CellProcessor.coerceText('TRUE')).toBe(true);
      expect(CellProcessor.coerceText('false')).toBe(false);
      expect(CellProcessor.coerceText(' Oslo ')).toBe(' Oslo ');
      expect(CellProcessor.coerceText('12abc')).toBe('12abc');
    });

    it('keeps integers too large for a number as text', () => {
      expect(CellProcessor.coerceText('9007199254740993')).toBe('9007199254740993');
      expect(CellProcessor.coerceText('-9007199254740991')).toBe(-9007199254740991);
      expect(CellProcessor.parseLiteral('12345678901234567890')).toBe('12345678901234567890');
    });
  });

  describe('formatCell', () => {
    it('formats missing values, booleans and dates', () => {
      expect(CellProcessor.formatCell(null)).toBe('NaN');
      expect(CellProcessor.formatCell(true)).toBe('True');
      expect(CellProcessor.formatCell(false)).toBe('False');
      expect(CellProcessor.formatCell(2.5)).toBe('2.5');
      expect(CellProcessor.formatCell(new Date(Date.UTC(2024, 0, 5)))).toBe('2024-01-05');
      expect(CellProcessor.formatCell(new Date(Date.UTC(2024, 0, 5, 10, 30)))).toBe('2024-01-05T10:30:00.000Z');
    });
  });

  it('keeps values of different kinds apart in cell keys', () => {
    expect(CellProcessor.cellKey(1)).not.toBe(CellProcessor.cellKey('1'));
    expect(CellProcessor.cellKey(true)).not.toBe(CellProcessor.cellKey(1));
    expect(CellProcessor.rowKey(['a', 1])).toBe(CellProcessor.rowKey(['a', 1]));
  });

  it('orders mixed values by kind, then by value', () => {
    const values: Exclude<CellValue, null>[] = ['b', 2, true, 'a', 1];
    expect([...values].sort(CellProcessor.compareValues)).toEqual([true, 1, 2, 'a', 'b']);
  });

  describe('convertCell', () => {
    it('converts to int', () => {
      expect(CellProcessor.convertCell('12', 'int')).toBe(12);
      expect(CellProcessor.convertCell(12.9, 'int')).toBe(12);
      expect(CellProcessor.convertCell(true, 'int')).toBe(1);
      expect(() => CellProcessor.convertCell('12.5', 'int')).toThrow('Invalid literal for int: "12.5"');
      expect(() => CellProcessor.convertCell(null, 'int')).toThrow('Cannot convert missing value to int');
    });

    it('converts to float', () => {
      expect(CellProcessor.convertCell('1.25', 'float')).toBe(1.25);
      expect(CellProcessor.convertCell(null, 'float')).toBeNull();
      expect(CellProcessor.convertCell(false, 'float')).toBe(0);
      expect(() => CellProcessor.convertCell('x', 'float')).toThrow('Could not convert string to float: "x"');
    });

    it('converts to string and keeps missing values', () => {
      expect(CellProcessor.convertCell(5, 'string')).toBe('5');
      expect(CellProcessor.convertCell(true, 'string')).toBe('True');
      expect(CellProcessor.convertCell(null, 'string')).toBeNull();
    });

    it('converts to datetime', () => {
      const date = CellProcessor.convertCell('2024-03-01', 'datetime');
      expect(date).toBeInstanceOf(Date);
      expect(date instanceof Date ? date.getTime() : undefined).toBe(Date.UTC(2024, 2, 1));
      expect(CellProcessor.convertCell(null, 'datetime')).toBeNull();
      expect(() => CellProcessor.convertCell('not a date', 'datetime')).toThrow('Unknown datetime string format: "not a date"');
      expect(() => CellProcessor.convertCell(true, 'datetime')).toThrow('Cannot convert boolean True to datetime');
    });
  });
});
