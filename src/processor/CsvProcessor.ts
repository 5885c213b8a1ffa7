import * as Papa from 'papaparse';
import { uniqueColumnNames } from '../model/DataSheet';
import type { CellValue } from '../model/DataSheet';
import { CellProcessor } from './CellProcessor';

export class CsvProcessor {
  /**
   * Generates a CSV string from headers and data using PapaParse.
   * Missing values are written as empty fields.
   * @param headers The headers for the CSV file.
   * @param data The data rows for the CSV file.
   * @returns A CSV string.
   */
  static generateCSV(headers: string[], data: CellValue[][]): string {
    const csvData = [
      headers,
      ...data.map(row => row.map(cell => (cell === null ? '' : CellProcessor.formatCell(cell)))),
    ];

    return Papa.unparse(csvData, {
      quotes: false, // only fields that need it are quoted
      delimiter: ',',
      newline: '\n',
    });
  }

  /**
   * Parses a CSV string into headers and typed data rows using PapaParse.
   * The delimiter is detected; rows are padded or cut to the header width.
   * Repeated header names get a numeric suffix.
   * @param csvString The CSV string to parse.
   * @returns An object containing headers and data.
   */
  static parseCSV(csvString: string): { headers: string[]; data: CellValue[][] } {
    const result = Papa.parse<string[]>(csvString.replace(/^\uFEFF/, ''), {
      header: false,
      skipEmptyLines: true,
    });

    // a single-column file has no delimiter to detect, which is not an error
    const errors = result.errors.filter(e => e.type !== 'Delimiter');
    if (errors.length > 0) {
      throw new Error(`Error parsing CSV: ${errors.map(e => `${e.message} (row ${e.row})`).join(', ')}`);
    }

    const [rawHeaders, ...rows] = result.data;
    if (!rawHeaders) {
      throw new Error('CSV appears to be empty.');
    }

    const headers = uniqueColumnNames(rawHeaders.map((header, i) => (header.trim() ? header.trim() : `Unnamed: ${i}`)));
    const data = rows.map(row => headers.map((_, i) => (i < row.length ? CellProcessor.coerceText(row[i]) : null)));

    return { headers, data };
  }
}
