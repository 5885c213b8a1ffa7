import { afterEach, describe, expect, it, vi } from 'vitest';
import { createDataSheet } from '../model/DataSheet';
import type { DataSheet } from '../model/DataSheet';
import { PreviewGenerator } from '../generator/PreviewGenerator';

const buildSheet = (): DataSheet =>
  createDataSheet('people', ['name', 'age'], [
    ['Ann', 31],
    ['Bob', null],
  ]);

describe('PreviewGenerator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('formats a sheet as a fixed-width table', () => {
    expect(PreviewGenerator.formatTable(buildSheet())).toBe('   name  age\n0  Ann   31\n1  Bob   NaN');
  });

  it('shows the index name in the header', () => {
    const sheet = createDataSheet('scores', ['score'], [[9], [12]]);
    sheet.index = ['ann', 'bob'];
    sheet.indexName = 'who';
    expect(PreviewGenerator.formatTable(sheet)).toBe('who  score\nann  9\nbob  12');
  });

  it('lists the type of each column', () => {
    expect(PreviewGenerator.formatColumnTypes(buildSheet())).toBe('name  string\nage   number');
  });

  it('logs a preview of the first rows', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    PreviewGenerator.previewSheet(buildSheet(), 1);
    expect(log.mock.calls.map(call => call[0])).toEqual([
      'Data Preview for people',
      '   name  age\n0  Ann   31',
      'name  string\nage   number',
      '[2 rows x 2 columns]',
    ]);
  });
});
