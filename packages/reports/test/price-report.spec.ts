import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as XLSX from 'xlsx';
import { PriceReport } from '../src/spreadsheet/price-report';
import { PersistenceError } from '@coin-tracker/shared/errors';
import { bitcoin, recordFor } from './fixtures';

describe('PriceReport', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'price-report-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should start empty when the file does not exist', () => {
    const report = PriceReport.open(path.join(dir, 'prices.xlsx'), 14);

    expect(report.sheetNames).toEqual([]);
    expect(fs.existsSync(path.join(dir, 'prices.xlsx'))).toBe(false);
  });

  it('should create a sheet per currency with a header row', () => {
    const file = path.join(dir, 'prices.xlsx');
    const report = PriceReport.open(file, 14);

    report.sheetFor(bitcoin).append(recordFor('2024-01-01'));

    const workbook = XLSX.readFile(file);
    expect(workbook.SheetNames).toEqual(['Bitcoin']);
    const [header] = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets.Bitcoin, { header: 1 });
    expect(header[0]).toBe('Date');
    expect(header[8]).toBe('14 Days Average');
  });

  it('should save after every append and read the rows back', () => {
    const file = path.join(dir, 'prices.xlsx');
    const sheet = PriceReport.open(file, 14).sheetFor(bitcoin);

    sheet.append(recordFor('2024-01-01', 100));
    sheet.append(recordFor('2024-01-02', 120, 110));

    const reopened = PriceReport.open(file, 14).sheetFor(bitcoin);
    expect(reopened.existingDates()).toEqual(new Set(['2024-01-01', '2024-01-02']));
    expect(reopened.rows()[1].slice(0, 9)).toEqual(['2024-01-02', 120, 130, 110, 120, 1234567, 987654321, 120, 110]);
  });

  it('should keep other sheets when adding a currency', () => {
    const file = path.join(dir, 'prices.xlsx');
    PriceReport.open(file, 14).sheetFor(bitcoin).append(recordFor('2024-01-01'));

    const report = PriceReport.open(file, 14);
    report.sheetFor({ name: 'Ethereum', symbol: 'ETH', cmcId: '1027' }).append(recordFor('2024-01-01'));

    expect(XLSX.readFile(file).SheetNames).toEqual(['Bitcoin', 'Ethereum']);
  });

  it('should keep an in-memory report off disk', () => {
    const report = PriceReport.inMemory(14);
    const sheet = report.sheetFor(bitcoin);

    sheet.append(recordFor('2024-01-01'));

    expect(report.fileName).toBeNull();
    expect(sheet.existingDates()).toEqual(new Set(['2024-01-01']));
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('should raise a persistence error when the file cannot be read', () => {
    const file = path.join(dir, 'not-a-workbook.xlsx');
    fs.mkdirSync(file);

    expect(() => PriceReport.open(file, 14)).toThrow(PersistenceError);
  });

  it('should raise a persistence error when the file cannot be written', () => {
    const sheet = PriceReport.open(path.join(dir, 'missing', 'prices.xlsx'), 14).sheetFor(bitcoin);

    expect(() => sheet.append(recordFor('2024-01-01'))).toThrow(PersistenceError);
  });
});
