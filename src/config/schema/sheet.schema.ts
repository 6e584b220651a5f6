import { Static, Type } from '@sinclair/typebox';

import { a1CellSchema } from '../utils/schema.util';

export const sheetSchema = Type.Object(
  {
    spreadsheetId: Type.String({
      minLength: 1,
      description:
        'Identifier of the spreadsheet to update (SPREADSHEET_ID environment variable)',
    }),
    credentialsFile: Type.String({
      minLength: 1,
      default: 'credentials.json',
      description:
        'Path to the service account key file (GOOGLE_APPLICATION_CREDENTIALS or CREDENTIALS_FILE)',
    }),
    worksheet: Type.Optional(
      Type.String({
        minLength: 1,
        description: 'Worksheet title; the first worksheet is used when unset',
      }),
    ),
    tickerRow: Type.Integer({
      minimum: 1,
      default: 1,
      description: 'Row holding the ticker symbols',
    }),
    tickerStartColumn: Type.Integer({
      minimum: 1,
      default: 2,
      description: 'First column (1 = A) holding a ticker symbol',
    }),
    priceRow: Type.Integer({
      minimum: 1,
      default: 3,
      description: 'Row prices are written to, under their ticker column',
    }),
    timestampCell: a1CellSchema('A1', {
      description: 'Cell receiving the time of the last update',
    }),
    exchangeRateCell: a1CellSchema('A100', {
      description: 'Cell receiving the exchange rate',
    }),
    missingPriceMarker: Type.Optional(
      Type.String({
        description:
          'Value written in place of a price that could not be fetched; the cell is left untouched when unset',
        examples: ['N/A', '#N/A'],
      }),
    ),
  },
  { default: {} },
);

export type SheetConfig = Static<typeof sheetSchema>;
