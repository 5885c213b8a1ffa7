import * as path from 'path';
import type { SheetsData } from '../model/DataSheet';
import { CsvReader } from './CsvReader';
import { ExcelReader } from './ExcelReader';

export type DataFileType = 'csv' | 'excel';

export class DataFileReader {
  static fileType(filePath: string): DataFileType {
    const extension = path.extname(filePath).toLowerCase();
    if (extension === '.csv') return 'csv';
    if (extension === '.xls' || extension === '.xlsx') return 'excel';
    throw new Error(`Unsupported file type "${extension || filePath}". Please provide .csv, .xls or .xlsx files.`);
  }

  /**
   * Loads every file into named sheets. A file that cannot be loaded is reported and skipped.
   * Sheet names that are already taken get a numeric suffix.
   */
  static async readDataFiles(filePaths: string[]): Promise<SheetsData> {
    const sheetsData: SheetsData = {};

    for (const filePath of filePaths) {
      let loaded: SheetsData;
      try {
        loaded = DataFileReader.fileType(filePath) === 'csv'
          ? await CsvReader.readCsvFiles([filePath])
          : await ExcelReader.readExcelFile(filePath);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`Failed to load ${path.basename(filePath)}: ${message}`);
        continue;
      }

      for (const sheet of Object.values(loaded)) {
        const name = DataFileReader.uniqueName(sheet.name, sheetsData);
        sheet.name = name;
        sheetsData[name] = sheet;
        console.log(`Loaded sheet "${name}" from ${path.basename(filePath)} (${sheet.data.length} rows, ${sheet.columnNames.length} columns).`);
      }
    }

    return sheetsData;
  }

  private static uniqueName(name: string, sheetsData: SheetsData): string {
    if (!(name in sheetsData)) {
      return name;
    }
    let suffix = 2;
    while (`${name}_${suffix}` in sheetsData) {
      suffix++;
    }
    return `${name}_${suffix}`;
  }
}
