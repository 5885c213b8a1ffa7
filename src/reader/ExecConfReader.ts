import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { Action } from '../model/Action';
import { AppConfiguration } from '../model/AppConfiguration';
import { ChartAction, CHART_TYPES } from '../model/ChartConf';
import type { ChartConf, ChartType } from '../model/ChartConf';
import { CombineAction } from '../model/CombineAction';
import type { CombineMethod, MergeHow } from '../model/CombineAction';
import { ExecConf } from '../model/ExecConf';
import { ExportAction } from '../model/ExportAction';
import type { ExportFormat } from '../model/ExportAction';
import { AGGREGATION_TYPES, CONVERSION_TYPES, FILTER_OPERATORS, OPERATION_TYPES } from '../model/Operation';
import type { Operation } from '../model/Operation';
import { SheetConf } from '../model/SheetConf';
import type { SheetField } from '../model/SheetConf';
import { StatisticsAction } from '../model/StatisticsAction';
import { TransformAction } from '../model/TransformAction';
import { CellProcessor } from '../processor/CellProcessor';

type Env = { [key: string]: string | undefined };
type ConfRecord = { [key: string]: unknown };

const DEFAULT_PREVIEW_ROWS = 5;
const DEFAULT_CHART_WIDTH = 800;
const DEFAULT_CHART_HEIGHT = 600;
const DEFAULT_OUTPUT_FOLDER = './';

function isRecord(value: unknown): value is ConfRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function oneOf<T extends string>(value: unknown, allowed: readonly T[], what: string): T {
  const found = allowed.find(candidate => candidate === value);
  if (found === undefined) {
    throw new Error(`${what} must be one of ${allowed.join(', ')}, got ${JSON.stringify(value)}`);
  }
  return found;
}

// Like requiredString, but a YAML boolean is read as the text a boolean cell shows
function requiredText(record: ConfRecord, key: string, where: string): string {
  const value = record[key];
  return typeof value === 'boolean' ? CellProcessor.formatCell(value) : requiredString(record, key, where);
}

function requiredString(record: ConfRecord, key: string, where: string): string {
  const value = record[key];
  if (typeof value === 'number') {
    return String(value);
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw new Error(`${where}: "${key}" is required`);
  }
  return value;
}

function optionalString(record: ConfRecord, key: string, where: string): string | undefined {
  return record[key] === undefined || record[key] === null ? undefined : requiredString(record, key, where);
}

function stringList(record: ConfRecord, key: string, where: string): string[] {
  const value = record[key];
  if (!Array.isArray(value) || value.length === 0) {
    throw new Error(`${where}: "${key}" must be a non-empty list`);
  }
  return value.map((item: unknown, i: number) => {
    if (typeof item === 'string' || typeof item === 'number') {
      return String(item);
    }
    throw new Error(`${where}: "${key}[${i}]" must be a string`);
  });
}

function labelList(record: ConfRecord, key: string, where: string): (string | number)[] {
  const value = record[key];
  if (!Array.isArray(value) || value.length === 0) {
    throw new Error(`${where}: "${key}" must be a non-empty list`);
  }
  return value.map((item: unknown, i: number) => {
    if (typeof item === 'string' || typeof item === 'number') {
      return item;
    }
    throw new Error(`${where}: "${key}[${i}]" must be a row label`);
  });
}

function optionalBoolean(value: unknown, what: string): boolean | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const lower = value.trim().toLowerCase();
    if (lower === 'true') return true;
    if (lower === 'false') return false;
  }
  throw new Error(`${what} must be true or false, got ${JSON.stringify(value)}`);
}

function optionalPositiveInt(value: unknown, what: string): number | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  const num = typeof value === 'string' ? Number(value.trim()) : value;
  if (typeof num !== 'number' || !Number.isInteger(num) || num <= 0) {
    throw new Error(`${what} must be a positive integer, got ${JSON.stringify(value)}`);
  }
  return num;
}

export class ExecConfReader {
  static readConfFile(confFilePath: string, env: Env = process.env): ExecConf {
    try {
      const confFileContent = fs.readFileSync(path.resolve(confFilePath), 'utf8');
      const confData: unknown = yaml.load(confFileContent);
      return this.parseExecConf(confData ?? {}, env);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Error reading or parsing configuration file: ${message}`);
    }
  }

  static parseExecConf(confData: unknown, env: Env = process.env): ExecConf {
    if (!isRecord(confData)) {
      throw new Error('Configuration must be a mapping');
    }
    const appConfiguration = this.parseAppConfiguration(confData.appConfiguration, env);
    const sheets = this.parseSheets(confData.sheets);
    const actions = this.parseActions(confData.actions);
    return new ExecConf(appConfiguration, actions, sheets);
  }

  /**
   * Builds the application settings: values from the configuration file win over
   * environment variables, which win over the defaults.
   */
  static parseAppConfiguration(appConfData: unknown, env: Env = process.env): AppConfiguration {
    const conf: ConfRecord = isRecord(appConfData) ? appConfData : {};

    const stopOnError = optionalBoolean(conf.stopOnError, 'appConfiguration.stopOnError')
      ?? optionalBoolean(env.REPORT_STOP_ON_ERROR, 'REPORT_STOP_ON_ERROR')
      ?? true;
    const rollbackOnError = optionalBoolean(conf.rollbackOnError, 'appConfiguration.rollbackOnError') ?? false;
    const previewRows = optionalPositiveInt(conf.previewRows, 'appConfiguration.previewRows')
      ?? optionalPositiveInt(env.REPORT_PREVIEW_ROWS, 'REPORT_PREVIEW_ROWS')
      ?? DEFAULT_PREVIEW_ROWS;
    const chartWidth = optionalPositiveInt(conf.chartWidth, 'appConfiguration.chartWidth')
      ?? optionalPositiveInt(env.REPORT_CHART_WIDTH, 'REPORT_CHART_WIDTH')
      ?? DEFAULT_CHART_WIDTH;
    const chartHeight = optionalPositiveInt(conf.chartHeight, 'appConfiguration.chartHeight')
      ?? optionalPositiveInt(env.REPORT_CHART_HEIGHT, 'REPORT_CHART_HEIGHT')
      ?? DEFAULT_CHART_HEIGHT;
    const outputFolder = (typeof conf.outputFolder === 'string' && conf.outputFolder)
      || env.REPORT_OUTPUT_FOLDER
      || DEFAULT_OUTPUT_FOLDER;

    return new AppConfiguration(stopOnError, rollbackOnError, previewRows, chartWidth, chartHeight, outputFolder);
  }

  private static parseSheets(sheetsData: unknown): SheetConf[] {
    if (!Array.isArray(sheetsData)) {
      return [];
    }
    return sheetsData.map((sheetData: unknown, i: number) => this.parseSheet(sheetData, `sheets[${i}]`));
  }

  private static parseSheet(sheetData: unknown, where: string): SheetConf {
    if (!isRecord(sheetData)) {
      throw new Error(`${where} must be a mapping`);
    }
    const name = requiredString(sheetData, 'name', where);
    let fields: SheetField[] = [];
    if (Array.isArray(sheetData.fields)) {
      fields = sheetData.fields.map((field: unknown, i: number) => {
        const fieldWhere = `${where}.fields[${i}]`;
        if (!isRecord(field)) {
          throw new Error(`${fieldWhere} must be a mapping`);
        }
        return {
          name: requiredString(field, 'name', fieldWhere),
          type: oneOf(field.type, CONVERSION_TYPES, `${fieldWhere}.type`),
        };
      });
    }
    return new SheetConf(name, fields);
  }

  private static parseActions(actionsData: unknown): Action[] {
    if (!Array.isArray(actionsData)) {
      return [];
    }
    return actionsData.map((actionData: unknown, i: number) => this.parseAction(actionData, i));
  }

  private static parseAction(actionData: unknown, position: number): Action {
    if (!isRecord(actionData)) {
      throw new Error(`actions[${position}] must be a mapping`);
    }
    const name = optionalString(actionData, 'name', `actions[${position}]`) ?? `action ${position + 1}`;
    const where = `Action "${name}"`;

    let combineAction: CombineAction | undefined = undefined;
    if (isRecord(actionData.combineAction)) {
      combineAction = this.parseCombineAction(actionData.combineAction, `${where} combineAction`);
    }

    // inputSheet is required unless the action builds its sheet by combining others
    const inputSheet = combineAction
      ? optionalString(actionData, 'inputSheet', where) ?? requiredString(actionData, 'outputSheet', where)
      : requiredString(actionData, 'inputSheet', where);
    const outputSheet = optionalString(actionData, 'outputSheet', where) ?? inputSheet;

    let transformAction: TransformAction | undefined = undefined;
    if (isRecord(actionData.transformAction)) {
      const operationsData = actionData.transformAction.operations;
      if (!Array.isArray(operationsData)) {
        throw new Error(`${where} transformAction: "operations" must be a list`);
      }
      transformAction = new TransformAction(
        operationsData.map((operationData: unknown, i: number) => this.parseOperation(operationData, `${where} operation ${i + 1}`))
      );
    }

    let statisticsAction: StatisticsAction | undefined = undefined;
    if (actionData.statisticsAction !== undefined && actionData.statisticsAction !== false) {
      const statisticsData: ConfRecord = isRecord(actionData.statisticsAction) ? actionData.statisticsAction : {};
      statisticsAction = new StatisticsAction(optionalString(statisticsData, 'outputSheet', `${where} statisticsAction`));
    }

    let chartAction: ChartAction | undefined = undefined;
    if (isRecord(actionData.chartAction)) {
      const chartsData = actionData.chartAction.charts;
      if (!Array.isArray(chartsData)) {
        throw new Error(`${where} chartAction: "charts" must be a list`);
      }
      chartAction = new ChartAction(
        chartsData.map((chartData: unknown, i: number) => this.parseChartConf(chartData, `${where} chart ${i + 1}`))
      );
    }

    let exportAction: ExportAction | undefined = undefined;
    if (isRecord(actionData.exportAction)) {
      exportAction = this.parseExportAction(actionData.exportAction, `${where} exportAction`);
    }

    return new Action(name, inputSheet, outputSheet, combineAction, transformAction, statisticsAction, chartAction, exportAction);
  }

  private static parseCombineAction(data: ConfRecord, where: string): CombineAction {
    const method: CombineMethod = oneOf(data.method, ['concat', 'merge'] as const, `${where} method`);
    const sheets = stringList(data, 'sheets', where);
    const on = optionalString(data, 'on', where);
    if (method === 'merge' && on === undefined) {
      throw new Error(`${where}: "on" is required to merge`);
    }
    const how: MergeHow = data.how === undefined ? 'inner' : oneOf(data.how, ['inner', 'left'] as const, `${where} how`);
    return new CombineAction(method, sheets, on, how);
  }

  private static parseExportAction(data: ConfRecord, where: string): ExportAction {
    const fileName = requiredString(data, 'fileName', where);
    const inferred = fileName.toLowerCase().endsWith('.csv') ? 'csv' : 'xlsx';
    const format: ExportFormat = data.format === undefined ? inferred : oneOf(data.format, ['xlsx', 'csv'] as const, `${where} format`);
    return new ExportAction(
      fileName,
      format,
      optionalBoolean(data.includeIndex, `${where} includeIndex`) ?? false,
      optionalBoolean(data.includeStatistics, `${where} includeStatistics`) ?? false
    );
  }

  private static parseChartConf(data: unknown, where: string): ChartConf {
    if (!isRecord(data)) {
      throw new Error(`${where} must be a mapping`);
    }
    const type: ChartType = oneOf(data.type, CHART_TYPES, `${where} type`);
    const x = optionalString(data, 'x', where);
    const y = optionalString(data, 'y', where);
    if (type !== 'heatmap' && x === undefined) {
      throw new Error(`${where}: "x" is required for a ${type} chart`);
    }
    if ((type === 'scatter' || type === 'line' || type === 'bar' || type === 'box') && y === undefined) {
      throw new Error(`${where}: "y" is required for a ${type} chart`);
    }
    return {
      type,
      x,
      y,
      title: optionalString(data, 'title', where),
      bins: optionalPositiveInt(data.bins, `${where} bins`),
      fileName: optionalString(data, 'fileName', where),
    };
  }

  static parseOperation(data: unknown, where: string): Operation {
    if (!isRecord(data)) {
      throw new Error(`${where} must be a mapping`);
    }
    const type = oneOf(data.type, OPERATION_TYPES, `${where} type`);
    switch (type) {
      case 'dropDuplicates':
      case 'resetIndex':
      case 'dropMissing':
        return { type };
      case 'convertType':
        return {
          type,
          column: requiredString(data, 'column', where),
          to: oneOf(data.to, CONVERSION_TYPES, `${where} to`),
        };
      case 'sort':
        return {
          type,
          column: requiredString(data, 'column', where),
          ascending: optionalBoolean(data.ascending, `${where} ascending`) ?? true,
        };
      case 'groupBy':
        return {
          type,
          column: requiredString(data, 'column', where),
          agg: oneOf(data.agg, AGGREGATION_TYPES, `${where} agg`),
          outputSheet: optionalString(data, 'outputSheet', where),
        };
      case 'setIndex':
        return { type, column: requiredString(data, 'column', where) };
      case 'fillMissing': {
        const value = data.value;
        if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
          throw new Error(`${where}: "value" is required`);
        }
        return {
          type,
          value: String(value),
          columns: data.columns === undefined ? undefined : stringList(data, 'columns', where),
        };
      }
      case 'rename':
        return { type, from: requiredString(data, 'from', where), to: requiredString(data, 'to', where) };
      case 'dropColumns':
      case 'restoreColumns':
        return { type, columns: stringList(data, 'columns', where) };
      case 'dropRows':
      case 'restoreRows':
        return { type, rows: labelList(data, 'rows', where) };
      case 'filter': {
        const operator = data.operator === undefined ? 'contains' : oneOf(data.operator, FILTER_OPERATORS, `${where} operator`);
        const needsValue = operator !== 'isNull' && operator !== 'isNotNull';
        return {
          type,
          column: requiredString(data, 'column', where),
          value: needsValue ? requiredText(data, 'value', where) : '',
          operator,
        };
      }
      case 'formula':
        return { type, formula: requiredString(data, 'formula', where) };
      case 'preview':
        return { type, rows: optionalPositiveInt(data.rows, `${where} rows`) };
    }
  }
}
