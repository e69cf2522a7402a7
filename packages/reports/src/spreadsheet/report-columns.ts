import { EnrichedRecord } from '@coin-tracker/shared/types/price.types';
import { formatDdMmYy, splitDay } from '@coin-tracker/shared/utils/dates';

export const REPORT_VERSION = '1.0.0';

export const LONG_NUM_FORMAT = '#,##0';
export const LONG_COLUMN_WIDTH = 20;

// Written in the N-day average column while the average is not available yet
export const UNAVAILABLE_AVERAGE_CELL = 0;

export interface ReportColumn {
  name: string;
  wide?: boolean;
  numFmt?: string;
}

export type CellValue = string | number;

export function reportColumns(averageDays: number): ReportColumn[] {
  return [
    { name: 'Date' },
    { name: 'Open' },
    { name: 'High' },
    { name: 'Low' },
    { name: 'Close' },
    { name: 'Volume', wide: true, numFmt: LONG_NUM_FORMAT },
    { name: 'Market Cap', wide: true, numFmt: LONG_NUM_FORMAT },
    { name: 'Daily Average' },
    { name: `${averageDays} Days Average` },
    { name: 'Year' },
    { name: 'Month' },
    { name: 'Day' },
    { name: 'Average USD' },
    { name: 'Dollar rate' },
    { name: 'Date' },
    { name: 'Average ILS' },
    { name: 'Importer version' },
  ];
}

/**
 * Cell values for one report row, in column order. The first cell is the
 * row key.
 */
export function toRow(record: EnrichedRecord): CellValue[] {
  const { price } = record;
  const { year, month, day } = splitDay(price.date);

  return [
    price.date,
    price.open,
    price.high,
    price.low,
    price.close,
    price.volume,
    price.marketCap,
    record.dailyAverage,
    record.movingAverage ?? UNAVAILABLE_AVERAGE_CELL,
    year,
    month,
    day,
    record.dailyAverage,
    record.conversionRate,
    formatDdMmYy(price.date),
    record.convertedDailyAverage,
    REPORT_VERSION,
  ];
}
