import { CellValue } from './a1-notation.util';

export interface CellUpdate {
  range: string;
  value: CellValue;
}

export interface SpreadsheetMetadata {
  title: string;
  worksheets: string[];
}

/**
 * Transport to the spreadsheet service. Implementations throw on any
 * failure; the caller wraps errors with range context.
 */
export interface SpreadsheetGateway {
  getValues(spreadsheetId: string, range: string): Promise<unknown[][]>;
  batchUpdateValues(
    spreadsheetId: string,
    updates: CellUpdate[],
  ): Promise<number>;
  getMetadata(spreadsheetId: string): Promise<SpreadsheetMetadata>;
}
