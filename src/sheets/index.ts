export { SheetsModule } from './sheets.module';
export { SheetClientService } from './sheet-client.service';
export type { HeaderCell } from './sheet-client.service';
export { SPREADSHEET_GATEWAY } from './sheets.constants';
export * from './a1-notation.util';
export * from './exceptions';
export type {
  CellUpdate,
  SpreadsheetGateway,
  SpreadsheetMetadata,
} from './spreadsheet-gateway.interface';
