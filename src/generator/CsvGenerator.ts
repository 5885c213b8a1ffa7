import * as fs from 'fs';
import * as path from 'path';
import { CsvProcessor } from '../processor/CsvProcessor';
import type { DataSheet } from '../model/DataSheet';

export class CsvGenerator {
  /**
   * Writes a DataSheet to a CSV file.
   * @param dataSheet The sheet to write.
   * @param outputFolder The folder where the CSV file will be saved. It is created if missing.
   * @param fileName Name of the file inside the output folder.
   * @param includeIndex Whether to write the row labels as the first column.
   * @returns The path of the written file.
   */
  static async generateCsvFile(
    dataSheet: DataSheet,
    outputFolder: string,
    fileName: string,
    includeIndex = false
  ): Promise<string> {
    try {
      await fs.promises.mkdir(outputFolder, { recursive: true });

      const headers = includeIndex ? [dataSheet.indexName ?? '', ...dataSheet.columnNames] : dataSheet.columnNames;
      const rows = includeIndex ? dataSheet.data.map((row, i) => [dataSheet.index[i], ...row]) : dataSheet.data;
      const csvContent = CsvProcessor.generateCSV(headers, rows);

      const outputFilePath = path.join(outputFolder, fileName);
      await fs.promises.writeFile(outputFilePath, csvContent, 'utf8');
      return outputFilePath;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      console.error('Error generating CSV file:', message);
      throw error;
    }
  }
}
