import * as path from 'path';
import type { Action } from '../model/Action';
import type { AppConfiguration } from '../model/AppConfiguration';
import type { ChartConf } from '../model/ChartConf';
import type { CombineAction } from '../model/CombineAction';
import type { DataSheet, SheetsData } from '../model/DataSheet';
import type { ExecConf } from '../model/ExecConf';
import type { ExportAction } from '../model/ExportAction';
import type { Operation } from '../model/Operation';
import { ChartGenerator } from '../generator/ChartGenerator';
import { CsvGenerator } from '../generator/CsvGenerator';
import { ExcelGenerator } from '../generator/ExcelGenerator';
import { PreviewGenerator } from '../generator/PreviewGenerator';
import { CombineProcessor } from './CombineProcessor';
import { DataSheetProcessor } from './DataSheetProcessor';
import { DropRestoreProcessor } from './DropRestoreProcessor';
import { StatisticsProcessor } from './StatisticsProcessor';

export interface ActionsResult {
  completed: string[];
  failed: string[];
  stopped: boolean;
}

type Step = { name: string; run: () => Promise<void> | void };

export class ActionProcessor {
  /**
   * Processes a list of actions in order. Each action combines, transforms, describes,
   * charts and exports its sheet, skipping the steps it does not configure.
   * @param execConf The execution configuration.
   * @param sheetsData Dictionary of DataSheet objects, updated in place.
   */
  static async processActions(execConf: ExecConf, sheetsData: SheetsData): Promise<ActionsResult> {
    const appConf = execConf.appConfiguration;
    const result: ActionsResult = { completed: [], failed: [], stopped: false };

    for (const action of execConf.actions) {
      const snapshot = appConf.stopOnError && appConf.rollbackOnError ? ActionProcessor.snapshotSheets(sheetsData) : undefined;

      console.log(`Processing action "${action.name}"...`);
      const succeeded = await ActionProcessor.processAction(appConf, action, sheetsData);
      if (succeeded) {
        result.completed.push(action.name);
        continue;
      }

      result.failed.push(action.name);
      if (appConf.stopOnError) {
        if (snapshot) {
          console.error(`Rolling back changes from action "${action.name}".`);
          ActionProcessor.restoreSheets(sheetsData, snapshot);
        }
        result.stopped = true;
        return result;
      }
    }

    return result;
  }

  /**
   * @returns false when any step failed.
   */
  static async processAction(appConf: AppConfiguration, action: Action, sheetsData: SheetsData): Promise<boolean> {
    const steps: Step[] = [];
    const { combineAction, transformAction, statisticsAction, chartAction, exportAction } = action;

    if (combineAction) {
      steps.push({ name: 'combine', run: () => ActionProcessor.executeCombineAction(action, combineAction, sheetsData) });
    }
    if (transformAction) {
      steps.push({
        name: 'transformation',
        run: () => ActionProcessor.executeTransformAction(appConf, action, transformAction.operations, sheetsData),
      });
    }
    if (statisticsAction) {
      steps.push({
        name: 'statistics',
        run: () => ActionProcessor.executeStatisticsAction(action, statisticsAction.outputSheet, sheetsData),
      });
    }
    for (const chart of chartAction?.charts ?? []) {
      steps.push({
        name: `${chart.type} chart`,
        run: () => ActionProcessor.executeChart(appConf, action, chart, sheetsData),
      });
    }
    if (exportAction) {
      steps.push({ name: 'export', run: () => ActionProcessor.executeExportAction(appConf, action, exportAction, sheetsData) });
    }

    let succeeded = true;
    for (const step of steps) {
      try {
        await step.run();
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`Error processing ${step.name} in action "${action.name}": ${message}`);
        succeeded = false;
        if (appConf.stopOnError) {
          return false;
        }
      }
    }
    return succeeded;
  }

  private static sheet(sheetsData: SheetsData, sheetName: string, action: Action): DataSheet {
    const dataSheet = sheetsData[sheetName];
    if (!dataSheet) {
      throw new Error(`DataSheet "${sheetName}" not found for action "${action.name}"`);
    }
    return dataSheet;
  }

  private static executeCombineAction(action: Action, combineAction: CombineAction, sheetsData: SheetsData): void {
    const sheets = combineAction.sheets.map(sheetName => ActionProcessor.sheet(sheetsData, sheetName, action));
    let combined: DataSheet;
    if (combineAction.method === 'merge') {
      if (combineAction.on === undefined) {
        throw new Error(`A merge in action "${action.name}" needs an "on" column`);
      }
      combined = CombineProcessor.mergeSheets(action.inputSheet, sheets, combineAction.on, combineAction.how);
    } else {
      combined = CombineProcessor.concatSheets(action.inputSheet, sheets);
    }
    sheetsData[combined.name] = combined;
    console.log(
      `Combined [${combineAction.sheets.join(', ')}] with ${combineAction.method} into "${combined.name}" ` +
        `(${combined.data.length} rows, ${combined.columnNames.length} columns).`
    );
  }

  private static executeTransformAction(
    appConf: AppConfiguration,
    action: Action,
    operations: Operation[],
    sheetsData: SheetsData
  ): void {
    const inputSheet = ActionProcessor.sheet(sheetsData, action.inputSheet, action);

    // If outputSheet is different from inputSheet, the operations work on a clone
    let dataSheet = inputSheet;
    if (action.outputSheet !== action.inputSheet) {
      dataSheet = DataSheetProcessor.cloneDataSheet(inputSheet, action.outputSheet);
      sheetsData[action.outputSheet] = dataSheet;
    }

    console.log(`Processing transformation for DataSheet "${dataSheet.name}"...`);
    for (const operation of operations) {
      ActionProcessor.applyOperation(appConf, dataSheet, operation, sheetsData);
    }
  }

  /**
   * Applies a single cleaning operation to a sheet. Operations that build a new sheet store it in sheetsData.
   */
  static applyOperation(appConf: AppConfiguration, dataSheet: DataSheet, operation: Operation, sheetsData: SheetsData): void {
    const name = dataSheet.name;
    switch (operation.type) {
      case 'dropDuplicates': {
        const removed = DataSheetProcessor.dropDuplicates(dataSheet);
        console.log(`Removed ${removed} duplicate rows from "${name}".`);
        break;
      }
      case 'convertType':
        DataSheetProcessor.convertColumnType(dataSheet, operation.column, operation.to);
        console.log(`Column "${operation.column}" of "${name}" converted to ${operation.to}.`);
        break;
      case 'sort':
        DataSheetProcessor.sortByColumn(dataSheet, operation.column, operation.ascending);
        console.log(`Sorted "${name}" by "${operation.column}" (${operation.ascending ? 'ascending' : 'descending'}).`);
        break;
      case 'groupBy': {
        const grouped = DataSheetProcessor.groupBy(dataSheet, operation.column, operation.agg, operation.outputSheet);
        sheetsData[grouped.name] = grouped;
        console.log(`Grouped "${name}" by "${operation.column}" with ${operation.agg} into "${grouped.name}".`);
        break;
      }
      case 'setIndex':
        DataSheetProcessor.setIndex(dataSheet, operation.column);
        console.log(`Column "${operation.column}" is now the index of "${name}".`);
        break;
      case 'resetIndex':
        DataSheetProcessor.resetIndex(dataSheet);
        console.log(`Index of "${name}" reset.`);
        break;
      case 'dropMissing': {
        const removed = DataSheetProcessor.dropMissing(dataSheet);
        console.log(`Removed ${removed} rows with missing values from "${name}".`);
        break;
      }
      case 'fillMissing': {
        const filled = DataSheetProcessor.fillMissing(dataSheet, operation.value, operation.columns);
        console.log(`Filled ${filled} missing values in "${name}" with "${operation.value}".`);
        break;
      }
      case 'rename':
        DataSheetProcessor.renameColumn(dataSheet, operation.from, operation.to);
        console.log(`Column "${operation.from}" of "${name}" renamed to "${operation.to}".`);
        break;
      case 'dropColumns':
        DropRestoreProcessor.dropColumns(dataSheet, operation.columns);
        console.log(`Dropped columns [${operation.columns.join(', ')}] from "${name}".`);
        break;
      case 'restoreColumns':
        DropRestoreProcessor.restoreColumns(dataSheet, operation.columns);
        console.log(`Restored columns [${operation.columns.join(', ')}] in "${name}".`);
        break;
      case 'dropRows':
        DropRestoreProcessor.dropRows(dataSheet, operation.rows);
        console.log(`Dropped rows [${operation.rows.join(', ')}] from "${name}".`);
        break;
      case 'restoreRows':
        DropRestoreProcessor.restoreRows(dataSheet, operation.rows);
        console.log(`Restored rows [${operation.rows.join(', ')}] in "${name}".`);
        break;
      case 'filter': {
        const removed = DataSheetProcessor.filterRows(dataSheet, operation.column, operation.value, operation.operator);
        console.log(`Filter ${operation.operator} on "${operation.column}" removed ${removed} rows from "${name}".`);
        break;
      }
      case 'formula': {
        const target = DataSheetProcessor.applyFormula(dataSheet, operation.formula);
        console.log(`Formula applied to column "${target}" of "${name}".`);
        break;
      }
      case 'preview':
        PreviewGenerator.previewSheet(dataSheet, operation.rows ?? appConf.previewRows);
        break;
    }
  }

  private static executeStatisticsAction(action: Action, outputSheet: string | undefined, sheetsData: SheetsData): void {
    const dataSheet = ActionProcessor.sheet(sheetsData, action.outputSheet, action);
    const statistics = StatisticsProcessor.describe(dataSheet);
    if (outputSheet) {
      statistics.name = outputSheet;
    }
    sheetsData[statistics.name] = statistics;
    console.log(`Descriptive statistics for "${dataSheet.name}":`);
    console.log(PreviewGenerator.formatTable(statistics));
  }

  private static async executeChart(
    appConf: AppConfiguration,
    action: Action,
    chart: ChartConf,
    sheetsData: SheetsData
  ): Promise<void> {
    const dataSheet = ActionProcessor.sheet(sheetsData, action.outputSheet, action);
    await ChartGenerator.generateChartFile(dataSheet, chart, appConf.outputFolder, appConf.chartWidth, appConf.chartHeight);
  }

  private static async executeExportAction(
    appConf: AppConfiguration,
    action: Action,
    exportAction: ExportAction,
    sheetsData: SheetsData
  ): Promise<void> {
    const dataSheet = ActionProcessor.sheet(sheetsData, action.outputSheet, action);
    if (exportAction.format === 'csv') {
      const filePath = await CsvGenerator.generateCsvFile(
        dataSheet,
        appConf.outputFolder,
        exportAction.fileName,
        exportAction.includeIndex
      );
      console.log(`CSV file successfully generated at: ${filePath}`);
      return;
    }
    await ExcelGenerator.generateReport(dataSheet, path.join(appConf.outputFolder, exportAction.fileName), {
      includeIndex: exportAction.includeIndex,
      includeStatistics: exportAction.includeStatistics,
    });
  }

  private static snapshotSheets(sheetsData: SheetsData): SheetsData {
    const snapshot: SheetsData = {};
    for (const [sheetName, dataSheet] of Object.entries(sheetsData)) {
      snapshot[sheetName] = DataSheetProcessor.cloneDataSheet(dataSheet);
    }
    return snapshot;
  }

  /**
   * Puts sheetsData back to the snapshot: sheets created since are removed, changed sheets are replaced.
   */
  private static restoreSheets(sheetsData: SheetsData, snapshot: SheetsData): void {
    for (const sheetName of Object.keys(sheetsData)) {
      if (!(sheetName in snapshot)) {
        delete sheetsData[sheetName];
      }
    }
    Object.assign(sheetsData, snapshot);
  }
}
