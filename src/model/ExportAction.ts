export type ExportFormat = 'xlsx' | 'csv';

export class ExportAction {
  fileName: string;
  format: ExportFormat;
  includeIndex: boolean;
  includeStatistics: boolean;

  constructor(fileName: string, format: ExportFormat, includeIndex = false, includeStatistics = false) {
    this.fileName = fileName;
    this.format = format;
    this.includeIndex = includeIndex;
    this.includeStatistics = includeStatistics;
  }
}
