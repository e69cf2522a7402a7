import { Logger } from '@nestjs/common';
import { CurrencyConfig, EnrichedRecord } from '@coin-tracker/shared/types/price.types';
import { ForwardResult, IRateForwarder, MergeResult } from '@coin-tracker/shared/types/report.types';
import { describeError } from '@coin-tracker/shared/errors';

export interface ReportTable {
  existingDates(): ReadonlySet<string>;
  append(record: EnrichedRecord): void;
}

export interface MergeTargets {
  primary: ReportTable;
  /** Receives exactly the rows appended to `primary` in this run. */
  delta?: ReportTable;
}

/**
 * Appends records whose date is not yet in the primary table, oldest first.
 * Each new row is forwarded (best effort) before it is persisted.
 */
export class ReportMerger {
  private readonly logger = new Logger(ReportMerger.name);

  constructor(private readonly forwarder?: IRateForwarder) {}

  /**
   * @param records - enriched records, oldest first
   */
  async merge(currency: CurrencyConfig, records: readonly EnrichedRecord[], targets: MergeTargets): Promise<MergeResult> {
    const known = new Set(targets.primary.existingDates());
    const pending: EnrichedRecord[] = [];
    let skipped = 0;

    for (let i = records.length - 1; i >= 0; i--) {
      const record = records[i];
      if (known.has(record.price.date)) {
        this.logger.debug(`Skipping existing row for ${currency.name} ${record.price.date}`);
        skipped++;
        continue;
      }
      known.add(record.price.date);
      pending.push(record);
    }

    pending.reverse();

    let forwardFailures = 0;
    for (const record of pending) {
      if (this.forwarder) {
        const result = await this.forward(currency, record);
        if (!result.ok) forwardFailures++;
      }

      targets.primary.append(record);
      targets.delta?.append(record);
    }

    this.logger.log(
      `${currency.name}: appended ${pending.length}, skipped ${skipped}` +
        (forwardFailures > 0 ? `, ${forwardFailures} forward failures` : ''),
    );

    return { appended: pending.length, skipped, forwardFailures };
  }

  private async forward(currency: CurrencyConfig, record: EnrichedRecord): Promise<ForwardResult> {
    if (!this.forwarder) return { ok: true };

    try {
      return await this.forwarder.forward(currency, {
        exchangeRate: record.convertedDailyAverage,
        currencyDate: record.price.date,
      });
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`Forwarding ${currency.name} ${record.price.date} failed: ${message}`);
      return { ok: false, status: 0, message };
    }
  }
}
