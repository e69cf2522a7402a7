import * as fs from 'fs';
import * as XLSX from 'xlsx';
import { Logger } from '@nestjs/common';
import { CurrencyConfig, EnrichedRecord } from '@coin-tracker/shared/types/price.types';
import { PersistenceError, describeError } from '@coin-tracker/shared/errors';
import { CellValue, LONG_COLUMN_WIDTH, ReportColumn, reportColumns, toRow } from './report-columns';

/**
 * Workbook with one sheet per currency. Rows are appended below a header row
 * and keyed by the date in the first column.
 */
export class PriceReport {
  private readonly logger = new Logger(PriceReport.name);
  private readonly columns: ReportColumn[];

  constructor(
    private readonly workbook: XLSX.WorkBook,
    readonly fileName: string | null,
    averageDays: number,
  ) {
    this.columns = reportColumns(averageDays);
  }

  /**
   * Open the report file, or start an empty workbook when it does not exist.
   */
  static open(fileName: string, averageDays: number): PriceReport {
    let workbook: XLSX.WorkBook;

    if (fs.existsSync(fileName)) {
      try {
        workbook = XLSX.readFile(fileName);
      } catch (error) {
        throw new PersistenceError(`Cannot read report ${fileName}: ${describeError(error)}`, { cause: error });
      }
    } else {
      workbook = XLSX.utils.book_new();
    }

    return new PriceReport(workbook, fileName, averageDays);
  }

  /**
   * Report that is never written to disk.
   */
  static inMemory(averageDays: number): PriceReport {
    return new PriceReport(XLSX.utils.book_new(), null, averageDays);
  }

  get sheetNames(): string[] {
    return [...this.workbook.SheetNames];
  }

  sheetFor(currency: CurrencyConfig): CurrencySheet {
    let sheet = this.workbook.Sheets[currency.name];

    if (!sheet) {
      sheet = XLSX.utils.aoa_to_sheet([this.columns.map(c => c.name)]);
      sheet['!cols'] = this.columns.map(c => (c.wide ? { wch: LONG_COLUMN_WIDTH } : {}));
      XLSX.utils.book_append_sheet(this.workbook, sheet, currency.name);
      this.logger.log(`Created sheet ${currency.name}${this.fileName ? ` in ${this.fileName}` : ''}`);
    }

    return new CurrencySheet(sheet, this.columns, this);
  }

  save(): void {
    if (!this.fileName) return;

    try {
      XLSX.writeFile(this.workbook, this.fileName);
    } catch (error) {
      throw new PersistenceError(`Cannot save report ${this.fileName}: ${describeError(error)}`, { cause: error });
    }
  }
}

export class CurrencySheet {
  constructor(
    private readonly sheet: XLSX.WorkSheet,
    private readonly columns: ReportColumn[],
    private readonly report: PriceReport,
  ) {}

  /**
   * All rows below the header, as cell values.
   */
  rows(): CellValue[][] {
    const rows = XLSX.utils.sheet_to_json<unknown[]>(this.sheet, { header: 1, raw: true, defval: '' });
    return rows.slice(1).map(row => row.map(toCellValue));
  }

  existingDates(): Set<string> {
    return new Set(this.rows().map(row => String(row[0] ?? '')));
  }

  /**
   * Append the record below the last row and save the report.
   */
  append(record: EnrichedRecord): void {
    XLSX.utils.sheet_add_aoa(this.sheet, [toRow(record)], { origin: -1 });

    const range = XLSX.utils.decode_range(this.sheet['!ref'] ?? 'A1');
    this.columns.forEach((column, c) => {
      if (!column.numFmt) return;
      const cell: XLSX.CellObject | undefined = this.sheet[XLSX.utils.encode_cell({ r: range.e.r, c })];
      if (cell) cell.z = column.numFmt;
    });

    this.report.save();
  }
}

function toCellValue(value: unknown): CellValue {
  return typeof value === 'number' ? value : String(value ?? '');
}
