import type { SheetsData } from './model/DataSheet';
import type { ExecConf } from './model/ExecConf';
import { PreviewGenerator } from './generator/PreviewGenerator';
import { ActionProcessor } from './processor/ActionProcessor';
import type { ActionsResult } from './processor/ActionProcessor';
import { DataSheetProcessor } from './processor/DataSheetProcessor';
import { StatisticsProcessor } from './processor/StatisticsProcessor';
import { DataFileReader } from './reader/DataFileReader';
import { ExecConfReader } from './reader/ExecConfReader';

export interface RunOptions {
  files: string[];
  confFile?: string;
  outputFolder?: string;
  previewRows?: number;
  preview?: boolean;
  env?: { [key: string]: string | undefined };
}

export interface RunResult {
  execConf: ExecConf;
  sheetsData: SheetsData;
  actions: ActionsResult;
}

export class ReportRunner {
  /**
   * Loads the configuration, overriding it with the command line values.
   * Without a configuration file only the application settings are set.
   */
  static loadExecConf(options: RunOptions): ExecConf {
    const env = options.env ?? process.env;
    const execConf = options.confFile
      ? ExecConfReader.readConfFile(options.confFile, env)
      : ExecConfReader.parseExecConf({}, env);
    if (options.outputFolder) {
      execConf.appConfiguration.outputFolder = options.outputFolder;
    }
    if (options.previewRows !== undefined) {
      execConf.appConfiguration.previewRows = options.previewRows;
    }
    return execConf;
  }

  static async run(options: RunOptions): Promise<RunResult> {
    const execConf = ReportRunner.loadExecConf(options);
    const appConf = execConf.appConfiguration;

    const sheetsData = await DataFileReader.readDataFiles(options.files);
    if (Object.keys(sheetsData).length === 0) {
      throw new Error('No data could be loaded from the given files.');
    }

    // Column types declared per sheet are applied before any action
    for (const sheetConf of execConf.sheets) {
      const sheet = sheetsData[sheetConf.name];
      if (sheet == null) {
        console.warn(`Sheet "${sheetConf.name}" is configured but was not loaded.`);
        continue;
      }
      DataSheetProcessor.applyFieldTypes(sheet, sheetConf.fields);
    }

    if (options.preview ?? true) {
      for (const sheet of Object.values(sheetsData)) {
        PreviewGenerator.previewSheet(sheet, appConf.previewRows);
      }
    }

    if (execConf.actions.length === 0) {
      for (const sheet of Object.values(sheetsData)) {
        console.log(`Descriptive statistics for "${sheet.name}":`);
        console.log(PreviewGenerator.formatTable(StatisticsProcessor.describe(sheet)));
      }
      return { execConf, sheetsData, actions: { completed: [], failed: [], stopped: false } };
    }

    const actions = await ActionProcessor.processActions(execConf, sheetsData);
    if (actions.failed.length === 0) {
      console.log('All actions completed successfully.');
    } else {
      console.error(`Actions with errors: ${actions.failed.join(', ')}${actions.stopped ? '. Processing stopped.' : ''}`);
    }
    return { execConf, sheetsData, actions };
  }
}
