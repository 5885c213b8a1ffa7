import type { DataSheet } from '../model/DataSheet';
import { CellProcessor } from '../processor/CellProcessor';
import { DataSheetProcessor } from '../processor/DataSheetProcessor';
import { StatisticsProcessor } from '../processor/StatisticsProcessor';

const COLUMN_SEPARATOR = '  ';

export class PreviewGenerator {
  /**
   * Renders a sheet as a fixed-width text table, row labels first.
   */
  static formatTable(sheet: DataSheet): string {
    const columns: string[][] = [
      [sheet.indexName ?? '', ...sheet.index.map(CellProcessor.formatLabel)],
      ...sheet.columnNames.map((name, c) => [name, ...sheet.data.map(row => CellProcessor.formatCell(row[c]))]),
    ];
    const widths = columns.map(column => column.reduce((width, cell) => Math.max(width, cell.length), 0));
    const lineCount = sheet.data.length + 1;

    const lines: string[] = [];
    for (let line = 0; line < lineCount; line++) {
      lines.push(columns.map((column, c) => column[line].padEnd(widths[c])).join(COLUMN_SEPARATOR).trimEnd());
    }
    return lines.join('\n');
  }

  static formatColumnTypes(sheet: DataSheet): string {
    const types = StatisticsProcessor.columnTypes(sheet);
    const width = Math.max(0, ...sheet.columnNames.map(name => name.length));
    return sheet.columnNames.map((name, i) => `${name.padEnd(width)}  ${types[i]}`).join('\n');
  }

  static previewSheet(sheet: DataSheet, rows = 5): void {
    console.log(`Data Preview for ${sheet.name}`);
    console.log(PreviewGenerator.formatTable(DataSheetProcessor.head(sheet, rows)));
    if (sheet.columnNames.length > 0) {
      console.log(PreviewGenerator.formatColumnTypes(sheet));
    }
    console.log(`[${sheet.data.length} rows x ${sheet.columnNames.length} columns]`);
  }
}
