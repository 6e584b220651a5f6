import { google, sheets_v4 } from 'googleapis';

import { SHEETS_SCOPE, VALUE_INPUT_OPTION } from './sheets.constants';
import {
  CellUpdate,
  SpreadsheetGateway,
  SpreadsheetMetadata,
} from './spreadsheet-gateway.interface';

export class GoogleSheetsGateway implements SpreadsheetGateway {
  private readonly sheets: sheets_v4.Sheets;

  constructor(keyFile: string) {
    const auth = new google.auth.GoogleAuth({
      keyFile,
      scopes: [SHEETS_SCOPE],
    });
    this.sheets = google.sheets({ version: 'v4', auth });
  }

  async getValues(spreadsheetId: string, range: string): Promise<unknown[][]> {
    const { data } = await this.sheets.spreadsheets.values.get({
      spreadsheetId,
      range,
      majorDimension: 'ROWS',
    });
    return data.values ?? [];
  }

  async batchUpdateValues(
    spreadsheetId: string,
    updates: CellUpdate[],
  ): Promise<number> {
    const { data } = await this.sheets.spreadsheets.values.batchUpdate({
      spreadsheetId,
      requestBody: {
        valueInputOption: VALUE_INPUT_OPTION,
        data: updates.map(({ range, value }) => ({
          range,
          values: [[value]],
        })),
      },
    });
    return data.totalUpdatedCells ?? updates.length;
  }

  async getMetadata(spreadsheetId: string): Promise<SpreadsheetMetadata> {
    const { data } = await this.sheets.spreadsheets.get({
      spreadsheetId,
      fields: 'properties.title,sheets.properties.title',
    });

    const worksheets: string[] = [];
    for (const sheet of data.sheets ?? []) {
      const title = sheet.properties?.title;
      if (title) {
        worksheets.push(title);
      }
    }

    return {
      title: data.properties?.title ?? spreadsheetId,
      worksheets,
    };
  }
}
