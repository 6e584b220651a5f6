import { Injectable, Logger } from '@nestjs/common';

import { ClockService, formatSheetTimestamp } from '../common';
import { AppConfigService, ExchangeRateConfig, SheetConfig } from '../config';
import { FetchException, PriceFetcherService } from '../prices';
import {
  CellAddress,
  cellAddress,
  CellValue,
  HeaderCell,
  parseCellAddress,
  SheetClientService,
  SheetReadException,
  SheetWriteException,
} from '../sheets';
import { CycleResult } from './cycle-result.interface';

type CycleCounts = Omit<CycleResult, 'success' | 'startedAt' | 'finishedAt'>;

const EMPTY_COUNTS: CycleCounts = {
  tickers: 0,
  fetched: 0,
  failed: 0,
  cancelled: 0,
  exchangeRate: null,
  cellsWritten: 0,
};

const toCell = (address: string): CellAddress => {
  const { row, column } = parseCellAddress(address);
  return cellAddress(row, column);
};

/**
 * One read → fetch → write pass over the spreadsheet.
 */
@Injectable()
export class UpdateCycleService {
  private readonly logger = new Logger(UpdateCycleService.name);
  private readonly sheetConfig: SheetConfig;
  private readonly exchangeRateConfig: ExchangeRateConfig;
  private readonly timezone: string;

  constructor(
    private readonly sheetClient: SheetClientService,
    private readonly priceFetcher: PriceFetcherService,
    private readonly clock: ClockService,
    configService: AppConfigService,
  ) {
    this.sheetConfig = configService.get('sheet');
    this.exchangeRateConfig = configService.get('exchangeRate');
    this.timezone = configService.get('market.timezone');
  }

  async runCycle(signal?: AbortSignal): Promise<CycleResult> {
    const startedAt = this.clock.now();
    const finish = (
      success: boolean,
      counts: Partial<CycleCounts> = {},
    ): CycleResult => ({
      ...EMPTY_COUNTS,
      ...counts,
      success,
      startedAt,
      finishedAt: this.clock.now(),
    });

    let header: HeaderCell[];
    try {
      header = await this.sheetClient.readHeaderRow();
    } catch (error) {
      if (error instanceof SheetReadException) {
        this.logger.error({ range: error.range, err: error }, 'Cycle skipped');
        return finish(false);
      }
      throw error;
    }

    const columnsByTicker = this.groupFetchableColumns(header);
    if (columnsByTicker.size === 0) {
      this.logger.warn(
        { labels: header.length },
        'No fetchable tickers in header row, nothing to update',
      );
      return finish(false);
    }

    const prices = await this.priceFetcher.fetchPrices(
      [...columnsByTicker.keys()],
      signal,
    );
    const exchangeRate = await this.fetchExchangeRate(signal);

    const updates = new Map<CellAddress, CellValue>();
    let fetched = 0;
    let failed = 0;
    let cancelled = 0;

    for (const [ticker, columns] of columnsByTicker) {
      const outcome = prices.get(ticker);
      let value: CellValue | undefined;

      if (outcome instanceof FetchException && outcome.cancelled) {
        // not exhausted: keep whatever the sheet already shows
        cancelled++;
        continue;
      }
      if (outcome === undefined || outcome instanceof FetchException) {
        failed++;
        value = this.sheetConfig.missingPriceMarker;
      } else {
        fetched++;
        value = outcome.price;
      }

      if (value === undefined) {
        continue;
      }
      for (const column of columns) {
        updates.set(cellAddress(this.sheetConfig.priceRow, column), value);
      }
    }

    const counts = {
      tickers: columnsByTicker.size,
      fetched,
      failed,
      cancelled,
      exchangeRate,
    };

    if (fetched === 0) {
      this.logger.error(
        { tickers: columnsByTicker.size, failed, cancelled },
        'No prices fetched, skipping write',
      );
      return finish(false, counts);
    }

    if (exchangeRate !== null) {
      updates.set(toCell(this.sheetConfig.exchangeRateCell), exchangeRate);
    }
    updates.set(
      toCell(this.sheetConfig.timestampCell),
      formatSheetTimestamp(this.clock.now(), this.timezone),
    );

    try {
      const cellsWritten = await this.sheetClient.batchWrite(updates);
      const result = finish(true, { ...counts, cellsWritten });
      this.logger.log(
        {
          fetched,
          failed,
          cancelled,
          cells: cellsWritten,
          durationMs: result.finishedAt.getTime() - startedAt.getTime(),
        },
        'Update cycle complete',
      );
      return result;
    } catch (error) {
      if (error instanceof SheetWriteException) {
        this.logger.error({ cells: updates.size, err: error }, 'Write failed');
        return finish(false, counts);
      }
      throw error;
    }
  }

  /**
   * Columns per fetchable ticker, in first-seen order. A ticker listed in
   * several columns is fetched once and written to each of them.
   */
  private groupFetchableColumns(header: HeaderCell[]): Map<string, number[]> {
    const columnsByTicker = new Map<string, number[]>();
    for (const { ticker, column } of header) {
      if (!this.priceFetcher.isFetchable(ticker)) {
        continue;
      }
      const columns = columnsByTicker.get(ticker);
      if (columns) {
        columns.push(column);
      } else {
        columnsByTicker.set(ticker, [column]);
      }
    }
    return columnsByTicker;
  }

  private async fetchExchangeRate(signal?: AbortSignal): Promise<number | null> {
    if (!this.exchangeRateConfig.enabled) {
      return null;
    }

    const outcome = await this.priceFetcher.fetchExchangeRate(
      this.exchangeRateConfig.pair,
      signal,
    );
    return outcome instanceof FetchException ? null : outcome.rate;
  }
}
