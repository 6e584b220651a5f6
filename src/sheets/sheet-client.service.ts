import { Inject, Injectable, Logger } from '@nestjs/common';

import { AppConfigService, SheetConfig } from '../config';
import {
  CellAddress,
  CellValue,
  columnToLetter,
  qualifyRange,
} from './a1-notation.util';
import { SheetReadException, SheetWriteException } from './exceptions';
import { SPREADSHEET_GATEWAY } from './sheets.constants';
import {
  SpreadsheetGateway,
  SpreadsheetMetadata,
} from './spreadsheet-gateway.interface';

export interface HeaderCell {
  ticker: string;
  column: number;
}

@Injectable()
export class SheetClientService {
  private readonly logger = new Logger(SheetClientService.name);
  private readonly sheetConfig: SheetConfig;

  constructor(
    @Inject(SPREADSHEET_GATEWAY)
    private readonly gateway: SpreadsheetGateway,
    configService: AppConfigService,
  ) {
    this.sheetConfig = configService.get('sheet');
  }

  get worksheet(): string | undefined {
    return this.sheetConfig.worksheet;
  }

  /**
   * Non-blank labels of the ticker row from `tickerStartColumn` onwards, in
   * column order, each with its 1-based column.
   */
  async readHeaderRow(): Promise<HeaderCell[]> {
    const { tickerRow, tickerStartColumn } = this.sheetConfig;
    const range = qualifyRange(this.worksheet, `${tickerRow}:${tickerRow}`);

    let rows: unknown[][];
    try {
      rows = await this.gateway.getValues(this.sheetConfig.spreadsheetId, range);
    } catch (error) {
      throw new SheetReadException(range, error);
    }

    const cells: HeaderCell[] = [];
    const row = rows[0] ?? [];
    for (let index = tickerStartColumn - 1; index < row.length; index++) {
      const raw = row[index];
      const ticker =
        raw === undefined || raw === null ? '' : String(raw).trim();
      if (ticker) {
        cells.push({ ticker, column: index + 1 });
      }
    }

    this.logger.debug(
      {
        range,
        from: columnToLetter(tickerStartColumn),
        labels: cells.length,
      },
      'Header row read',
    );
    return cells;
  }

  /**
   * Writes all updates in one request. An empty map issues no request.
   * Returns the number of cells the service reports as updated.
   */
  async batchWrite(updates: ReadonlyMap<CellAddress, CellValue>): Promise<number> {
    if (updates.size === 0) {
      this.logger.debug('Nothing to write');
      return 0;
    }

    const data = [...updates].map(([address, value]) => ({
      range: qualifyRange(this.worksheet, address),
      value,
    }));

    try {
      const updated = await this.gateway.batchUpdateValues(
        this.sheetConfig.spreadsheetId,
        data,
      );
      this.logger.log({ cells: updated }, 'Batch update written');
      return updated;
    } catch (error) {
      throw new SheetWriteException(
        data.map(({ range }) => range),
        error,
      );
    }
  }

  async describe(): Promise<SpreadsheetMetadata> {
    try {
      return await this.gateway.getMetadata(this.sheetConfig.spreadsheetId);
    } catch (error) {
      throw new SheetReadException(this.sheetConfig.spreadsheetId, error);
    }
  }
}
