import { Type } from '@sinclair/typebox';

import { fetchSchema } from './fetch.schema';
import { loggerSchema } from './logger.schema';
import { marketSchema } from './market.schema';
import { exchangeRateSchema, pricesSchema } from './prices.schema';
import { proxySchema } from './proxy.schema';
import { scheduleSchema } from './schedule.schema';
import { sheetSchema } from './sheet.schema';
import { sourcesSchema } from './sources.schema';
import { tickersSchema } from './tickers.schema';

export const configValidationSchema = Type.Object(
  {
    logger: loggerSchema,
    market: marketSchema,
    schedule: scheduleSchema,
    fetch: fetchSchema,
    tickers: tickersSchema,
    prices: pricesSchema,
    exchangeRate: exchangeRateSchema,
    sheet: sheetSchema,
    sources: sourcesSchema,
    proxy: proxySchema,
  },
  {
    default: {},
  },
);
