import * as echarts from 'echarts';
import * as fs from 'fs';
import * as path from 'path';
import type { CellValue, DataSheet } from '../model/DataSheet';
import type { ChartConf } from '../model/ChartConf';
import { CellProcessor } from '../processor/CellProcessor';
import { StatisticsProcessor } from '../processor/StatisticsProcessor';

const DEFAULT_BINS = 10;

export interface CategorySeries {
  categories: string[];
  values: number[];
}

export interface BoxSeries {
  categories: string[];
  boxes: [number, number, number, number, number][];
}

export interface HeatmapSeries {
  columns: string[];
  cells: [number, number, number][];
}

export class ChartGenerator {
  private static column(sheet: DataSheet, name: string | undefined, role: string, conf: ChartConf): CellValue[] {
    if (!name) {
      throw new Error(`Chart "${conf.type}" requires a ${role} column`);
    }
    const index = sheet.columnNames.indexOf(name);
    if (index === -1) {
      throw new Error(`Column "${name}" not found in sheet "${sheet.name}"`);
    }
    return StatisticsProcessor.columnValues(sheet, index);
  }

  private static numericColumn(sheet: DataSheet, name: string | undefined, role: string, conf: ChartConf): CellValue[] {
    const values = ChartGenerator.column(sheet, name, role, conf);
    if (StatisticsProcessor.inferColumnType(values) !== 'number') {
      throw new Error(`Column "${name}" must be numeric for a ${conf.type} chart`);
    }
    return values;
  }

  private static finite(value: CellValue): number | null {
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
  }

  /** Sums y for each x category, in order of first appearance. */
  static barData(xs: CellValue[], ys: CellValue[]): CategorySeries {
    const totals = new Map<string, number>();
    xs.forEach((x, i) => {
      const y = ChartGenerator.finite(ys[i]);
      if (x === null || y === null) return;
      const key = CellProcessor.formatCell(x);
      totals.set(key, (totals.get(key) ?? 0) + y);
    });
    return { categories: [...totals.keys()], values: [...totals.values()] };
  }

  /**
   * Equal-width bins over numeric values, or a count per category for anything else.
   */
  static histogramData(values: CellValue[], bins = DEFAULT_BINS): CategorySeries {
    const nums = StatisticsProcessor.numericValues(values);
    const present = values.filter(value => value !== null);
    if (present.length > 0 && nums.length === present.length) {
      let min = nums[0];
      let max = nums[0];
      for (const v of nums) {
        if (v < min) min = v;
        if (v > max) max = v;
      }
      const width = max - min || 1;
      const edges = Array.from({ length: bins + 1 }, (_, i) => min + (i * width) / bins);
      const counts: number[] = Array(bins).fill(0);
      for (const v of nums) {
        const idx = Math.min(bins - 1, Math.max(0, Math.floor(((v - min) / width) * bins)));
        counts[idx]++;
      }
      const label = (v: number) => String(Number(v.toPrecision(4)));
      return {
        categories: counts.map((_, i) => `${label(edges[i])} - ${label(edges[i + 1])}`),
        values: counts,
      };
    }

    const counts = new Map<string, number>();
    for (const value of present) {
      const key = CellProcessor.formatCell(value);
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    return { categories: [...counts.keys()], values: [...counts.values()] };
  }

  /** Five-number summary of y for each x category, in order of first appearance. */
  static boxData(xs: CellValue[], ys: CellValue[]): BoxSeries {
    const groups = new Map<string, number[]>();
    xs.forEach((x, i) => {
      const y = ChartGenerator.finite(ys[i]);
      if (x === null || y === null) return;
      const key = CellProcessor.formatCell(x);
      const group = groups.get(key);
      if (group) {
        group.push(y);
      } else {
        groups.set(key, [y]);
      }
    });
    const boxes = [...groups.values()].map(group => {
      const sorted = [...group].sort((a, b) => a - b);
      const q = (p: number) => StatisticsProcessor.quantile(sorted, p) ?? 0;
      return [sorted[0], q(0.25), q(0.5), q(0.75), sorted[sorted.length - 1]] as [number, number, number, number, number];
    });
    return { categories: [...groups.keys()], boxes };
  }

  static heatmapData(sheet: DataSheet): HeatmapSeries {
    const { columns, matrix } = StatisticsProcessor.correlationMatrix(sheet);
    if (columns.length < 2) {
      throw new Error(`Heatmap needs at least two numeric columns in sheet "${sheet.name}"`);
    }
    const cells: [number, number, number][] = [];
    matrix.forEach((row, yi) =>
      row.forEach((r, xi) => {
        if (r !== null) {
          cells.push([xi, yi, Number(r.toFixed(2))]);
        }
      })
    );
    return { columns, cells };
  }

  static defaultTitle(conf: ChartConf): string {
    switch (conf.type) {
      case 'histogram':
        return `Distribution of ${conf.x}`;
      case 'heatmap':
        return 'Correlation heatmap';
      default:
        return `${conf.y} by ${conf.x}`;
    }
  }

  /**
   * Builds the ECharts option for a chart of the sheet's data.
   */
  static buildChartOption(sheet: DataSheet, conf: ChartConf): echarts.EChartsOption {
    const title = { text: conf.title ?? ChartGenerator.defaultTitle(conf), left: 'center' };

    switch (conf.type) {
      case 'scatter': {
        const xs = ChartGenerator.column(sheet, conf.x, 'x', conf);
        const ys = ChartGenerator.numericColumn(sheet, conf.y, 'y', conf);
        const numericX = StatisticsProcessor.inferColumnType(xs) === 'number';
        const points: [number | string, number][] = [];
        xs.forEach((x, i) => {
          const y = ChartGenerator.finite(ys[i]);
          if (x === null || y === null) return;
          points.push([numericX && typeof x === 'number' ? x : CellProcessor.formatCell(x), y]);
        });
        return {
          title,
          tooltip: { trigger: 'item' },
          xAxis: numericX ? { type: 'value', name: conf.x, scale: true } : { type: 'category', name: conf.x },
          yAxis: { type: 'value', name: conf.y, scale: true },
          series: [{ type: 'scatter', data: points }],
        };
      }
      case 'line': {
        const xs = ChartGenerator.column(sheet, conf.x, 'x', conf);
        const ys = ChartGenerator.column(sheet, conf.y, 'y', conf);
        return {
          title,
          tooltip: { trigger: 'axis' },
          xAxis: { type: 'category', name: conf.x, data: xs.map(CellProcessor.formatCell) },
          yAxis: { type: 'value', name: conf.y, scale: true },
          series: [{ type: 'line', data: ys.map(y => ChartGenerator.finite(y) ?? '-') }],
        };
      }
      case 'bar': {
        const xs = ChartGenerator.column(sheet, conf.x, 'x', conf);
        const ys = ChartGenerator.numericColumn(sheet, conf.y, 'y', conf);
        const { categories, values } = ChartGenerator.barData(xs, ys);
        return {
          title,
          tooltip: { trigger: 'axis' },
          xAxis: { type: 'category', name: conf.x, data: categories },
          yAxis: { type: 'value', name: conf.y },
          series: [{ type: 'bar', data: values }],
        };
      }
      case 'histogram': {
        const xs = ChartGenerator.column(sheet, conf.x, 'x', conf);
        const { categories, values } = ChartGenerator.histogramData(xs, conf.bins ?? DEFAULT_BINS);
        return {
          title,
          tooltip: { trigger: 'axis' },
          xAxis: { type: 'category', name: conf.x, data: categories },
          yAxis: { type: 'value', name: 'count' },
          series: [{ type: 'bar', data: values, barCategoryGap: '2%' }],
        };
      }
      case 'box': {
        const xs = ChartGenerator.column(sheet, conf.x, 'x', conf);
        const ys = ChartGenerator.numericColumn(sheet, conf.y, 'y', conf);
        const { categories, boxes } = ChartGenerator.boxData(xs, ys);
        return {
          title,
          tooltip: { trigger: 'item' },
          xAxis: { type: 'category', name: conf.x, data: categories },
          yAxis: { type: 'value', name: conf.y, scale: true },
          series: [{ type: 'boxplot', data: boxes }],
        };
      }
      case 'heatmap': {
        const { columns, cells } = ChartGenerator.heatmapData(sheet);
        return {
          title,
          tooltip: { position: 'top' },
          grid: { top: 60, bottom: 100 },
          xAxis: { type: 'category', data: columns },
          yAxis: { type: 'category', data: columns },
          visualMap: { min: -1, max: 1, calculable: true, orient: 'horizontal', left: 'center', bottom: 10 },
          series: [{ type: 'heatmap', data: cells, label: { show: true } }],
        };
      }
    }
  }

  /**
   * Renders an option to an SVG string with the server-side renderer, without a DOM.
   */
  static renderChartSvg(option: echarts.EChartsOption, width: number, height: number): string {
    const chart = echarts.init(null, null, { renderer: 'svg', ssr: true, width, height });
    try {
      chart.setOption({ ...option, animation: false });
      return chart.renderToSVGString();
    } finally {
      chart.dispose();
    }
  }

  static chartFileName(sheet: DataSheet, conf: ChartConf): string {
    const base = conf.fileName
      ?? [sheet.name, conf.type, conf.type === 'heatmap' ? undefined : conf.x, conf.y && conf.type !== 'histogram' && conf.type !== 'heatmap' ? conf.y : undefined]
        .filter((part): part is string => Boolean(part))
        .join('_');
    const safe = base.replace(/[^A-Za-z0-9_.-]+/g, '_');
    return safe.toLowerCase().endsWith('.svg') ? safe : `${safe}.svg`;
  }

  /**
   * Builds, renders and writes a chart as an SVG file.
   * @returns The path of the written file.
   */
  static async generateChartFile(
    sheet: DataSheet,
    conf: ChartConf,
    outputFolder: string,
    width: number,
    height: number
  ): Promise<string> {
    const svg = ChartGenerator.renderChartSvg(ChartGenerator.buildChartOption(sheet, conf), width, height);
    await fs.promises.mkdir(outputFolder, { recursive: true });
    const filePath = path.join(outputFolder, ChartGenerator.chartFileName(sheet, conf));
    await fs.promises.writeFile(filePath, svg, 'utf8');
    console.log(`Chart "${conf.type}" for sheet "${sheet.name}" written to ${filePath}`);
    return filePath;
  }
}
