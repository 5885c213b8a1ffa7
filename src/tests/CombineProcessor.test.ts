import { describe, expect, it } from 'vitest';
import { createDataSheet } from '../model/DataSheet';
import { CombineProcessor } from '../processor/CombineProcessor';

describe('CombineProcessor', () => {
  const january = createDataSheet('jan', ['id', 'sales'], [
    [1, 100],
    [2, 150],
  ]);
  const february = createDataSheet('feb', ['id', 'sales', 'region'], [[3, 90, 'N']]);

  it('concatenates sheets over the union of their columns', () => {
    const combined = CombineProcessor.concatSheets('all', [january, february]);
    expect(combined.name).toBe('all');
    expect(combined.columnNames).toEqual(['id', 'sales', 'region']);
    expect(combined.data).toEqual([
      [1, 100, null],
      [2, 150, null],
      [3, 90, 'N'],
    ]);
    expect(combined.index).toEqual([0, 1, 2]);
  });

  it('copies a single sheet', () => {
    const combined = CombineProcessor.concatSheets('copy', [january]);
    combined.data[0][1] = 0;
    expect(combined.name).toBe('copy');
    expect(january.data[0][1]).toBe(100);
  });

  it('needs at least one sheet', () => {
    expect(() => CombineProcessor.concatSheets('none', [])).toThrow('No sheets to concatenate');
  });

  describe('mergeSheets', () => {
    const orders = createDataSheet('orders', ['id', 'qty'], [
      [1, 5],
      [2, 3],
      [3, 1],
      [null, 9],
    ]);
    const prices = createDataSheet('prices', ['id', 'price', 'qty'], [
      [1, 9.5, 0],
      [1, 8, 0],
      [3, 2, 7],
    ]);

    it('keeps matching rows with an inner join', () => {
      const merged = CombineProcessor.mergeSheets('joined', [orders, prices], 'id');
      expect(merged.columnNames).toEqual(['id', 'qty_x', 'price', 'qty_y']);
      expect(merged.data).toEqual([
        [1, 5, 9.5, 0],
        [1, 5, 8, 0],
        [3, 1, 2, 7],
      ]);
      expect(merged.index).toEqual([0, 1, 2]);
    });

    it('keeps every left row with a left join', () => {
      const merged = CombineProcessor.mergeSheets('joined', [orders, prices], 'id', 'left');
      expect(merged.data).toEqual([
        [1, 5, 9.5, 0],
        [1, 5, 8, 0],
        [2, 3, null, null],
        [3, 1, 2, 7],
        [null, 9, null, null],
      ]);
    });

    it('requires the key in every sheet', () => {
      expect(() => CombineProcessor.mergeSheets('joined', [orders, prices], 'sku')).toThrow(
        'Merge key "sku" not found in sheet "orders"'
      );
    });
  });
});
