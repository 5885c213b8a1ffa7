import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ReportRunner } from '../ReportRunner';

describe('ReportRunner', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sheet-report-run-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('applies field types and runs the configured actions', async () => {
    const dataPath = path.join(tmpDir, 'orders.csv');
    fs.writeFileSync(dataPath, 'id,qty,price\n1,2,9.5\n2,,3\n2,,3\n');
    const confPath = path.join(tmpDir, 'report.yaml');
    fs.writeFileSync(
      confPath,
      [
        'sheets:',
        '  - name: orders',
        '    fields:',
        '      - name: id',
        '        type: string',
        'actions:',
        '  - name: totals',
        '    inputSheet: orders',
        '    outputSheet: totals',
        '    transformAction:',
        '      operations:',
        '        - type: dropDuplicates',
        '        - type: fillMissing',
        '          value: 1',
        '        - type: formula',
        '          formula: total = qty * price',
        '    exportAction:',
        '      fileName: totals.csv',
        '',
      ].join('\n')
    );

    const result = await ReportRunner.run({
      files: [dataPath],
      confFile: confPath,
      outputFolder: path.join(tmpDir, 'out'),
      preview: false,
      env: {},
    });

    expect(result.actions).toEqual({ completed: ['totals'], failed: [], stopped: false });
    expect(result.sheetsData.orders.data[0]).toEqual(['1', 2, 9.5]);
    expect(fs.readFileSync(path.join(tmpDir, 'out', 'totals.csv'), 'utf8')).toBe('id,qty,price,total\n1,2,9.5,19\n2,1,3,3');
  });

  it('describes every sheet when there are no actions', async () => {
    const dataPath = path.join(tmpDir, 'scores.csv');
    fs.writeFileSync(dataPath, 'name,score\nAnn,1\nBob,3\n');

    const result = await ReportRunner.run({ files: [dataPath], previewRows: 1, env: {} });

    expect(result.execConf.appConfiguration.previewRows).toBe(1);
    expect(result.actions.completed).toEqual([]);
    expect(console.log).toHaveBeenCalledWith('Descriptive statistics for "scores":');
    expect(console.log).toHaveBeenCalledWith('Data Preview for scores');
  });

  it('runs the sample report', async () => {
    const confDir = path.join(__dirname, '..', '..', 'conf');
    const outputFolder = path.join(tmpDir, 'out');

    const result = await ReportRunner.run({
      files: [path.join(confDir, 'sample-data', 'sales.csv'), path.join(confDir, 'sample-data', 'regions.csv')],
      confFile: path.join(confDir, 'sample-report.yaml'),
      outputFolder,
      preview: false,
      env: {},
    });

    expect(result.actions).toEqual({
      completed: ['clean sales', 'revenue by region', 'flatten totals', 'region managers'],
      failed: [],
      stopped: false,
    });
    expect(fs.readFileSync(path.join(outputFolder, 'region_report.csv'), 'utf8')).toBe(
      [
        'region,units,unit_price,revenue,manager',
        'East,3,14.5,21.75,Cid',
        'North,8,5,20,Ann',
        'South,8,12.5,27.5,Bob',
        'West,2,10,20,Dee',
      ].join('\n')
    );
    expect(fs.readdirSync(outputFolder).sort()).toEqual([
      'cleaned_data_report.xlsx',
      'region_report.csv',
      'sales_clean_bar_region_revenue.svg',
      'sales_clean_box_product_revenue.svg',
      'sales_clean_heatmap.svg',
      'sales_clean_histogram_unit_price.svg',
    ]);
  });

  it('fails when no file could be loaded', async () => {
    const txtPath = path.join(tmpDir, 'notes.txt');
    fs.writeFileSync(txtPath, 'hello');
    await expect(ReportRunner.run({ files: [txtPath], env: {} })).rejects.toThrow(
      'No data could be loaded from the given files.'
    );
  });
});
