import * as fs from 'fs';
import * as path from 'path';
import { CsvProcessor } from '../processor/CsvProcessor';
import { createDataSheet } from '../model/DataSheet';
import type { DataSheet, SheetsData } from '../model/DataSheet';

export class CsvReader {
  /**
   * Reads multiple CSV files and returns a dictionary of DataSheet objects.
   * @param csvFilePaths An array of paths to the CSV files.
   * @returns A promise that resolves to a dictionary of DataSheet objects.
   */
  static async readCsvFiles(csvFilePaths: string[]): Promise<SheetsData> {
    const sheetsData: SheetsData = {};

    for (const filePath of csvFilePaths) {
      const dataSheet = await this.readCsvFile(filePath);
      sheetsData[dataSheet.name] = dataSheet;
    }

    return sheetsData;
  }

  /**
   * Reads a single CSV file. The sheet is named after the file, without its extension.
   * @param filePath The path to the CSV file.
   */
  static async readCsvFile(filePath: string): Promise<DataSheet> {
    let csvString: string;
    try {
      csvString = await fs.promises.readFile(filePath, 'utf8');
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Error reading CSV file "${filePath}": ${message}`);
    }

    try {
      const { headers, data } = CsvProcessor.parseCSV(csvString);
      return createDataSheet(path.basename(filePath, path.extname(filePath)), headers, data);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Error parsing CSV file "${filePath}": ${message}`);
    }
  }
}
