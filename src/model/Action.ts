import { CombineAction } from './CombineAction';
import { TransformAction } from './TransformAction';
import { StatisticsAction } from './StatisticsAction';
import { ChartAction } from './ChartConf';
import { ExportAction } from './ExportAction';

export class Action {
  name: string;
  inputSheet: string;
  outputSheet: string;
  combineAction?: CombineAction;
  transformAction?: TransformAction;
  statisticsAction?: StatisticsAction;
  chartAction?: ChartAction;
  exportAction?: ExportAction;

  constructor(
    name: string,
    inputSheet: string,
    outputSheet: string,
    combineAction?: CombineAction,
    transformAction?: TransformAction,
    statisticsAction?: StatisticsAction,
    chartAction?: ChartAction,
    exportAction?: ExportAction
  ) {
    this.name = name;
    this.inputSheet = inputSheet;
    this.outputSheet = outputSheet || inputSheet;
    this.combineAction = combineAction;
    this.transformAction = transformAction;
    this.statisticsAction = statisticsAction;
    this.chartAction = chartAction;
    this.exportAction = exportAction;
  }
}
