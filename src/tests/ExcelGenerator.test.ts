import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as XLSX from 'xlsx';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createDataSheet } from '../model/DataSheet';
import { CsvGenerator } from '../generator/CsvGenerator';
import { ExcelGenerator, REPORT_DATA_SHEET, REPORT_STATISTICS_SHEET } from '../generator/ExcelGenerator';
import { CellProcessor } from '../processor/CellProcessor';
import { ExcelReader } from '../reader/ExcelReader';

describe('ExcelGenerator', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sheet-report-excel-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('sanitises worksheet names', () => {
    expect(ExcelGenerator.worksheetName('Q1: sales/returns', [])).toBe('Q1_ sales_returns');
    expect(ExcelGenerator.worksheetName('a'.repeat(40), [])).toBe('a'.repeat(31));
    expect(ExcelGenerator.worksheetName('Data', ['Data'])).toBe('Data_2');
    expect(ExcelGenerator.worksheetName('', [])).toBe('Sheet');
  });

  it('builds worksheet rows with or without the index', () => {
    const sheet = createDataSheet('s', ['x'], [[1], [2]]);
    expect(ExcelGenerator.worksheetRows(sheet, false)).toEqual([['x'], [1], [2]]);
    expect(ExcelGenerator.worksheetRows(sheet, true)).toEqual([
      ['', 'x'],
      [0, 1],
      [1, 2],
    ]);
  });

  it('writes a report with its statistics', async () => {
    const sheet = createDataSheet('scores', ['name', 'score'], [
      ['Ann', 80],
      ['Bob', 90],
      ['Cid', 70],
    ]);
    const filePath = await ExcelGenerator.generateReport(sheet, path.join(tmpDir, 'out', 'report.xlsx'), {
      includeStatistics: true,
    });

    expect(filePath).toBe(path.resolve(tmpDir, 'out', 'report.xlsx'));
    const sheetsData = await ExcelReader.readExcelFile(filePath);
    expect(Object.keys(sheetsData)).toEqual([REPORT_DATA_SHEET, REPORT_STATISTICS_SHEET]);
    expect(sheetsData[REPORT_DATA_SHEET].columnNames).toEqual(['name', 'score']);
    expect(sheetsData[REPORT_DATA_SHEET].data).toEqual(sheet.data);
    expect(sheetsData[REPORT_STATISTICS_SHEET].columnNames).toEqual(['Unnamed: 0', 'score']);
    expect(sheetsData[REPORT_STATISTICS_SHEET].data).toEqual([
      ['count', 3],
      ['mean', 80],
      ['std', 10],
      ['min', 70],
      ['25%', 75],
      ['50%', 80],
      ['75%', 85],
      ['max', 90],
    ]);
  });

  it('writes one worksheet per sheet', async () => {
    const filePath = await ExcelGenerator.generateExcelFile(
      {
        first: createDataSheet('first', ['a'], [[1]]),
        second: createDataSheet('second', ['b'], [['x']]),
      },
      path.join(tmpDir, 'all.xlsx')
    );
    const sheetsData = await ExcelReader.readExcelFile(filePath);
    expect(Object.keys(sheetsData)).toEqual(['first', 'second']);
    expect(sheetsData.second.data).toEqual([['x']]);
  });
});

describe('CsvGenerator', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sheet-report-csv-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('writes a sheet with its index', async () => {
    const sheet = createDataSheet('grouped', ['total'], [[7.5], [20]]);
    sheet.index = ['East', 'North'];
    sheet.indexName = 'region';

    const filePath = await CsvGenerator.generateCsvFile(sheet, path.join(tmpDir, 'nested'), 'grouped.csv', true);

    expect(filePath).toBe(path.join(tmpDir, 'nested', 'grouped.csv'));
    expect(fs.readFileSync(filePath, 'utf8')).toBe('region,total\nEast,7.5\nNorth,20');
  });
});

describe('Excel dates', () => {
  const timeZone = process.env.TZ;
  let tmpDir: string;

  beforeEach(() => {
    process.env.TZ = 'America/New_York';
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sheet-report-dates-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
    if (timeZone === undefined) {
      delete process.env.TZ;
    } else {
      process.env.TZ = timeZone;
    }
  });

  it('counts date serials in UTC days', () => {
    expect(new Date(Date.UTC(2024, 0, 1)).getTimezoneOffset()).toBe(300);
    expect(ExcelGenerator.dateSerial(new Date(Date.UTC(2024, 0, 1)))).toBe(45292);
    expect(ExcelReader.dateFromSerial(45292.5)).toEqual(new Date(Date.UTC(2024, 0, 1, 12)));
  });

  it('reads date formatted cells as UTC calendar dates', () => {
    const worksheet = XLSX.utils.aoa_to_sheet([
      ['day', 'count'],
      [45292, 3],
    ]);
    const cell: XLSX.CellObject = worksheet.A2;
    cell.z = 'yyyy-mm-dd';
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, worksheet, 'Days');

    const sheet = ExcelReader.readWorkbook(workbook).Days;
    expect(sheet.data).toEqual([[new Date(Date.UTC(2024, 0, 1)), 3]]);
    expect(CellProcessor.formatCell(sheet.data[0][0])).toBe('2024-01-01');
  });

  it('writes and reads back dates unchanged', async () => {
    const days = createDataSheet('days', ['day'], [
      [new Date(Date.UTC(2024, 0, 1))],
      [new Date(Date.UTC(2024, 2, 10, 12))],
    ]);
    const filePath = await ExcelGenerator.generateReport(days, path.join(tmpDir, 'days.xlsx'));

    const sheetsData = await ExcelReader.readExcelFile(filePath);
    expect(sheetsData[REPORT_DATA_SHEET].data).toEqual(days.data);
  });
});
