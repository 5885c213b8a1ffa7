import { AppConfiguration } from './AppConfiguration';
import { Action } from './Action';
import { SheetConf } from './SheetConf';

/**
 * A parsed report configuration: run settings, the actions in the order they run,
 * and the column types to apply to loaded sheets.
 */
export class ExecConf {
  appConfiguration: AppConfiguration;
  actions: Action[];
  /** Field types per sheet; sheets not listed keep the types read from their file. */
  sheets: SheetConf[];

  constructor(appConfiguration: AppConfiguration, actions: Action[], sheets: SheetConf[]) {
    this.appConfiguration = appConfiguration;
    this.actions = actions;
    this.sheets = sheets;
  }
}
