import * as XLSX from 'xlsx';
import * as fs from 'fs';
import * as path from 'path';
import type { CellValue, DataSheet, SheetsData } from '../model/DataSheet';
import { CellProcessor } from '../processor/CellProcessor';
import { StatisticsProcessor } from '../processor/StatisticsProcessor';

const MAX_SHEET_NAME_LENGTH = 31;
const EXCEL_EPOCH = Date.UTC(1899, 11, 30);
const MS_PER_DAY = 24 * 60 * 60 * 1000;
const DATE_FORMAT = 'yyyy-mm-dd';
const DATETIME_FORMAT = 'yyyy-mm-dd hh:mm:ss';
export const REPORT_DATA_SHEET = 'Cleaned Data';
export const REPORT_STATISTICS_SHEET = 'Statistics';

export interface ReportOptions {
  includeIndex?: boolean;
  includeStatistics?: boolean;
}

export class ExcelGenerator {
  /**
   * Converts a map of DataSheet objects into an Excel file with one worksheet each and saves it.
   * @param sheetsData A map where the key is the worksheet name and the value is the DataSheet object.
   * @param filePath The path where the Excel file will be saved.
   * @param includeIndex Whether to write the row labels as the first column.
   * @returns The resolved path of the written file.
   */
  static async generateExcelFile(sheetsData: SheetsData, filePath: string, includeIndex = false): Promise<string> {
    const workbook = XLSX.utils.book_new();
    for (const [sheetName, dataSheet] of Object.entries(sheetsData)) {
      ExcelGenerator.appendSheet(workbook, sheetName, dataSheet, includeIndex);
    }
    return ExcelGenerator.writeWorkbook(workbook, filePath);
  }

  /**
   * Writes the cleaned data, and optionally its descriptive statistics, as a report workbook.
   */
  static async generateReport(dataSheet: DataSheet, filePath: string, options: ReportOptions = {}): Promise<string> {
    const workbook = XLSX.utils.book_new();
    ExcelGenerator.appendSheet(workbook, REPORT_DATA_SHEET, dataSheet, options.includeIndex ?? false);
    if (options.includeStatistics) {
      ExcelGenerator.appendSheet(workbook, REPORT_STATISTICS_SHEET, StatisticsProcessor.describe(dataSheet), true);
    }
    return ExcelGenerator.writeWorkbook(workbook, filePath);
  }

  static worksheetRows(dataSheet: DataSheet, includeIndex: boolean): CellValue[][] {
    if (!includeIndex) {
      return [dataSheet.columnNames, ...dataSheet.data];
    }
    return [
      [dataSheet.indexName ?? '', ...dataSheet.columnNames],
      ...dataSheet.data.map((row, i) => [dataSheet.index[i], ...row]),
    ];
  }

  /**
   * Excel serial of a date, counted in UTC days from 1899-12-30.
   */
  static dateSerial(date: Date): number {
    return (date.getTime() - EXCEL_EPOCH) / MS_PER_DAY;
  }

  static worksheetName(name: string, taken: string[]): string {
    const base = (name.replace(/[\[\]:*?/\\]/g, '_') || 'Sheet').slice(0, MAX_SHEET_NAME_LENGTH);
    let candidate = base;
    let suffix = 2;
    while (taken.includes(candidate)) {
      const tail = `_${suffix++}`;
      candidate = base.slice(0, MAX_SHEET_NAME_LENGTH - tail.length) + tail;
    }
    return candidate;
  }

  private static appendSheet(workbook: XLSX.WorkBook, name: string, dataSheet: DataSheet, includeIndex: boolean): void {
    const rows = ExcelGenerator.worksheetRows(dataSheet, includeIndex);
    const worksheet = XLSX.utils.aoa_to_sheet(
      rows.map(row => row.map(cell => (cell instanceof Date ? ExcelGenerator.dateSerial(cell) : cell)))
    );
    rows.forEach((row, r) =>
      row.forEach((cell, c) => {
        if (!(cell instanceof Date)) return;
        const target: XLSX.CellObject | undefined = worksheet[XLSX.utils.encode_cell({ r, c })];
        if (target) {
          target.z = CellProcessor.formatDate(cell).length === 10 ? DATE_FORMAT : DATETIME_FORMAT;
        }
      })
    );
    XLSX.utils.book_append_sheet(workbook, worksheet, ExcelGenerator.worksheetName(name, workbook.SheetNames));
  }

  private static async writeWorkbook(workbook: XLSX.WorkBook, filePath: string): Promise<string> {
    try {
      const resolvedPath = path.resolve(filePath);
      await fs.promises.mkdir(path.dirname(resolvedPath), { recursive: true });
      const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
      await fs.promises.writeFile(resolvedPath, buffer);
      console.log(`Excel file successfully generated at: ${resolvedPath}`);
      return resolvedPath;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      console.error('Error generating Excel file:', message);
      throw error;
    }
  }
}
