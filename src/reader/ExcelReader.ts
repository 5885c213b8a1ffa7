import * as XLSX from 'xlsx';
import * as fs from 'fs';
import * as path from 'path';
import { createDataSheet, uniqueColumnNames } from '../model/DataSheet';
import type { CellValue, SheetsData } from '../model/DataSheet';
import { CellProcessor } from '../processor/CellProcessor';

interface DateCode {
  y: number;
  m: number;
  d: number;
  H: number;
  M: number;
  S: number;
}

export class ExcelReader {
  /**
   * Reads every worksheet of an .xls or .xlsx file. Worksheets without a header row and at least
   * one data row are skipped.
   */
  static async readExcelFile(filePath: string): Promise<SheetsData> {
    try {
      const buffer = await fs.promises.readFile(path.resolve(filePath));
      const workbook = XLSX.read(buffer, { type: 'buffer', cellNF: true });
      return ExcelReader.readWorkbook(workbook);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Error reading Excel file "${filePath}": ${message}`);
    }
  }

  static readWorkbook(workbook: XLSX.WorkBook): SheetsData {
    const sheetsData: SheetsData = {};
    const date1904 = workbook.Workbook?.WBProps?.date1904 === true;

    for (const sheetName of workbook.SheetNames) {
      const rows = ExcelReader.worksheetRows(workbook.Sheets[sheetName], date1904);

      if (rows.length < 2) {
        console.warn(`Sheet "${sheetName}" is empty or has less than two rows and will be skipped.`);
        continue;
      }

      const [rawHeaders, ...data] = rows;
      const columnNames = uniqueColumnNames(
        rawHeaders.map((header, i) => (header === null || header === '' ? `Unnamed: ${i}` : CellProcessor.formatCell(header)))
      );

      sheetsData[sheetName] = createDataSheet(sheetName, columnNames, data);
    }

    return sheetsData;
  }

  /**
   * Cell values row by row over the worksheet range. Rows without any stored value are left out.
   */
  private static worksheetRows(worksheet: XLSX.WorkSheet, date1904: boolean): CellValue[][] {
    const ref = worksheet['!ref'];
    if (typeof ref !== 'string') {
      return [];
    }
    const range = XLSX.utils.decode_range(ref);
    const rows: CellValue[][] = [];
    for (let r = range.s.r; r <= range.e.r; r++) {
      const row: CellValue[] = [];
      let blank = true;
      for (let c = range.s.c; c <= range.e.c; c++) {
        const cell: XLSX.CellObject | undefined = worksheet[XLSX.utils.encode_cell({ r, c })];
        if (cell !== undefined && cell.v !== undefined && cell.v !== null) {
          blank = false;
        }
        row.push(ExcelReader.cellValue(cell, date1904));
      }
      if (!blank) {
        rows.push(row);
      }
    }
    return rows;
  }

  private static cellValue(cell: XLSX.CellObject | undefined, date1904: boolean): CellValue {
    if (cell === undefined || cell.t === 'z' || cell.t === 'e') {
      return null;
    }
    if (cell.t === 'n' && typeof cell.v === 'number' && typeof cell.z === 'string') {
      const isDate: boolean = XLSX.SSF.is_date(cell.z);
      if (isDate) {
        return ExcelReader.dateFromSerial(cell.v, date1904);
      }
    }
    return ExcelReader.normalizeCell(cell.v);
  }

  /**
   * Date serials carry no zone: the calendar fields are read as UTC.
   */
  static dateFromSerial(serial: number, date1904 = false): Date | null {
    const code: DateCode | null = XLSX.SSF.parse_date_code(serial, { date1904 });
    if (!code) {
      return null;
    }
    return new Date(Date.UTC(code.y, code.m - 1, code.d, code.H, code.M, code.S));
  }

  private static normalizeCell(value: unknown): CellValue {
    if (value === null || value === undefined) {
      return null;
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
      return value;
    }
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? null : value;
    }
    const text = String(value);
    return CellProcessor.isMissingText(text) ? null : text;
  }
}
