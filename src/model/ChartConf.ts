export type ChartType = 'scatter' | 'line' | 'bar' | 'histogram' | 'box' | 'heatmap';

export const CHART_TYPES: readonly ChartType[] = ['scatter', 'line', 'bar', 'histogram', 'box', 'heatmap'];

export interface ChartConf {
  type: ChartType;
  x?: string;
  y?: string;
  title?: string;
  bins?: number;
  fileName?: string;
}

export class ChartAction {
  charts: ChartConf[];

  constructor(charts: ChartConf[] = []) {
    this.charts = charts;
  }
}
