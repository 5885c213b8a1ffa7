import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ExecConfReader } from '../reader/ExecConfReader';

describe('ExecConfReader', () => {
  describe('parseAppConfiguration', () => {
    it('uses defaults when nothing is configured', () => {
      expect({ ...ExecConfReader.parseAppConfiguration(undefined, {}) }).toEqual({
        stopOnError: true,
        rollbackOnError: false,
        previewRows: 5,
        chartWidth: 800,
        chartHeight: 600,
        outputFolder: './',
      });
    });

    it('prefers the configuration file over the environment', () => {
      const appConf = ExecConfReader.parseAppConfiguration(
        { previewRows: 10 },
        { REPORT_PREVIEW_ROWS: '3', REPORT_STOP_ON_ERROR: 'false', REPORT_OUTPUT_FOLDER: 'out', REPORT_CHART_HEIGHT: '450' }
      );
      expect(appConf.previewRows).toBe(10);
      expect(appConf.stopOnError).toBe(false);
      expect(appConf.outputFolder).toBe('out');
      expect(appConf.chartHeight).toBe(450);
    });

    it('rejects invalid values', () => {
      expect(() => ExecConfReader.parseAppConfiguration({}, { REPORT_CHART_WIDTH: 'wide' })).toThrow(
        'REPORT_CHART_WIDTH must be a positive integer, got "wide"'
      );
      expect(() => ExecConfReader.parseAppConfiguration({ stopOnError: 'maybe' }, {})).toThrow(
        'appConfiguration.stopOnError must be true or false, got "maybe"'
      );
    });
  });

  describe('parseOperation', () => {
    it('fills in operation defaults', () => {
      expect(ExecConfReader.parseOperation({ type: 'sort', column: 'amount' }, 'op')).toEqual({
        type: 'sort',
        column: 'amount',
        ascending: true,
      });
      expect(ExecConfReader.parseOperation({ type: 'filter', column: 'city', value: 'Os' }, 'op')).toEqual({
        type: 'filter',
        column: 'city',
        value: 'Os',
        operator: 'contains',
      });
      expect(ExecConfReader.parseOperation({ type: 'filter', column: 'city', operator: 'isNull' }, 'op')).toEqual({
        type: 'filter',
        column: 'city',
        value: '',
        operator: 'isNull',
      });
    });

    it('reads fill values and row labels as written', () => {
      expect(ExecConfReader.parseOperation({ type: 'fillMissing', value: 0 }, 'op')).toEqual({
        type: 'fillMissing',
        value: '0',
        columns: undefined,
      });
      expect(ExecConfReader.parseOperation({ type: 'dropRows', rows: [1, 'x'] }, 'op')).toEqual({
        type: 'dropRows',
        rows: [1, 'x'],
      });
    });

    it('reads a boolean filter value as cell text', () => {
      expect(
        ExecConfReader.parseOperation({ type: 'filter', column: 'active', operator: 'eq', value: true }, 'op')
      ).toEqual({ type: 'filter', column: 'active', value: 'True', operator: 'eq' });
    });

    it('names the operation in errors', () => {
      expect(() => ExecConfReader.parseOperation({ type: 'explode' }, 'Action "a" operation 1')).toThrow(
        'Action "a" operation 1 type must be one of dropDuplicates, convertType'
      );
      expect(() => ExecConfReader.parseOperation({ type: 'convertType', column: 'a', to: 'decimal' }, 'op')).toThrow(
        'op to must be one of int, float, string, datetime, got "decimal"'
      );
      expect(() => ExecConfReader.parseOperation({ type: 'dropColumns', columns: [] }, 'op')).toThrow(
        'op: "columns" must be a non-empty list'
      );
    });
  });

  describe('parseExecConf', () => {
    it('reads sheets and actions', () => {
      const execConf = ExecConfReader.parseExecConf(
        {
          sheets: [{ name: 'sales', fields: [{ name: 'amount', type: 'float' }] }],
          actions: [
            {
              name: 'clean',
              inputSheet: 'sales',
              transformAction: { operations: [{ type: 'dropDuplicates' }] },
              statisticsAction: true,
              chartAction: { charts: [{ type: 'histogram', x: 'amount', bins: 5 }] },
              exportAction: { fileName: 'clean.csv' },
            },
            {
              outputSheet: 'all',
              combineAction: { method: 'merge', sheets: ['a', 'b'], on: 'id', how: 'left' },
            },
          ],
        },
        {}
      );

      expect(execConf.sheets).toEqual([{ name: 'sales', fields: [{ name: 'amount', type: 'float' }] }]);
      const [clean, combine] = execConf.actions;
      expect(clean.outputSheet).toBe('sales');
      expect(clean.transformAction?.operations).toEqual([{ type: 'dropDuplicates' }]);
      expect(clean.statisticsAction?.outputSheet).toBeUndefined();
      expect(clean.chartAction?.charts).toEqual([
        { type: 'histogram', x: 'amount', y: undefined, title: undefined, bins: 5, fileName: undefined },
      ]);
      expect(clean.exportAction?.format).toBe('csv');
      expect(clean.exportAction?.includeIndex).toBe(false);

      expect(combine.name).toBe('action 2');
      expect(combine.inputSheet).toBe('all');
      expect(combine.outputSheet).toBe('all');
      expect(combine.combineAction?.how).toBe('left');
    });

    it('requires an input sheet and the chart columns', () => {
      expect(() => ExecConfReader.parseExecConf({ actions: [{ name: 'clean' }] }, {})).toThrow(
        'Action "clean": "inputSheet" is required'
      );
      expect(() =>
        ExecConfReader.parseExecConf(
          { actions: [{ name: 'a', inputSheet: 's', chartAction: { charts: [{ type: 'bar', x: 'x' }] } }] },
          {}
        )
      ).toThrow('Action "a" chart 1: "y" is required for a bar chart');
      expect(() =>
        ExecConfReader.parseExecConf(
          { actions: [{ name: 'm', outputSheet: 'all', combineAction: { method: 'merge', sheets: ['a', 'b'] } }] },
          {}
        )
      ).toThrow('Action "m" combineAction: "on" is required to merge');
    });
  });

  describe('readConfFile', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sheet-report-conf-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('reads a YAML file', () => {
      const confPath = path.join(tmpDir, 'conf.yaml');
      fs.writeFileSync(
        confPath,
        [
          'appConfiguration:',
          '  stopOnError: false',
          '  outputFolder: reports',
          'actions:',
          '  - name: tidy',
          '    inputSheet: sales',
          '    outputSheet: sales_tidy',
          '    transformAction:',
          '      operations:',
          '        - type: rename',
          '          from: amt',
          '          to: amount',
          '',
        ].join('\n')
      );

      const execConf = ExecConfReader.readConfFile(confPath, {});
      expect(execConf.appConfiguration.stopOnError).toBe(false);
      expect(execConf.appConfiguration.outputFolder).toBe('reports');
      expect(execConf.actions[0].outputSheet).toBe('sales_tidy');
      expect(execConf.actions[0].transformAction?.operations).toEqual([{ type: 'rename', from: 'amt', to: 'amount' }]);
      expect(execConf.sheets).toEqual([]);
    });

    it('wraps read and parse errors', () => {
      expect(() => ExecConfReader.readConfFile(path.join(tmpDir, 'missing.yaml'), {})).toThrow(
        'Error reading or parsing configuration file: '
      );
      const badPath = path.join(tmpDir, 'bad.yaml');
      fs.writeFileSync(badPath, 'actions: [\n');
      expect(() => ExecConfReader.readConfFile(badPath, {})).toThrow('Error reading or parsing configuration file: ');
    });
  });
});
