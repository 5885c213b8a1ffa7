// src/model/AppConfiguration.ts
export class AppConfiguration {
  stopOnError: boolean;
  rollbackOnError: boolean;
  previewRows: number;
  chartWidth: number;
  chartHeight: number;
  outputFolder: string;
  constructor(
    stopOnError: boolean,
    rollbackOnError: boolean,
    previewRows: number,
    chartWidth: number,
    chartHeight: number,
    outputFolder: string
  ) {
    this.stopOnError = stopOnError;
    this.rollbackOnError = rollbackOnError;
    this.previewRows = previewRows;
    this.chartWidth = chartWidth;
    this.chartHeight = chartHeight;
    this.outputFolder = outputFolder;
  }
}
