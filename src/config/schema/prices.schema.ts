import { Static, Type } from '@sinclair/typebox';

import { SourceName } from '../../sources/source-name.enum';

const sourceNameSchema = (defaultValue: SourceName, description: string) =>
  Type.Enum(SourceName, { default: defaultValue, description });

export const pricesSchema = Type.Object(
  {
    source: sourceNameSchema(
      SourceName.YAHOO_FINANCE,
      'Source used for ticker prices',
    ),
  },
  { default: {} },
);

export const exchangeRateSchema = Type.Object(
  {
    enabled: Type.Boolean({
      default: true,
      description: 'Fetch and write the exchange rate each cycle',
    }),
    source: sourceNameSchema(
      SourceName.YAHOO_FINANCE,
      'Source used for the exchange rate',
    ),
    pair: Type.Tuple(
      [
        Type.String({ pattern: '^[A-Za-z]{3}$' }),
        Type.String({ pattern: '^[A-Za-z]{3}$' }),
      ],
      {
        default: ['USD', 'CAD'],
        description: 'Currency pair [base, quote]; the rate is quote per base',
      },
    ),
  },
  { default: {} },
);

export type PricesConfig = Static<typeof pricesSchema>;
export type ExchangeRateConfig = Static<typeof exchangeRateSchema>;
