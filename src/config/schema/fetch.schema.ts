import { Static, Type } from '@sinclair/typebox';

import { BACKOFF_STRATEGIES } from '../constants';
import { variantsSchema } from '../utils/schema.util';

export const fetchSchema = Type.Object(
  {
    maxAttempts: Type.Integer({
      minimum: 1,
      maximum: 20,
      default: 3,
      description: 'Attempts per ticker before it is recorded as failed',
    }),
    retryDelayMs: Type.Integer({
      minimum: 0,
      maximum: 600000,
      default: 5000,
      description: 'Delay in milliseconds between attempts for one ticker',
    }),
    backoff: variantsSchema(BACKOFF_STRATEGIES, {
      default: 'fixed',
      description:
        'fixed keeps retryDelayMs between every attempt; exponential multiplies it after each failure',
    }),
    backoffMultiplier: Type.Number({
      minimum: 1,
      maximum: 10,
      default: 2,
      description: 'Growth factor for exponential backoff',
    }),
    maxRetryDelayMs: Type.Integer({
      minimum: 0,
      maximum: 3600000,
      default: 60000,
      description: 'Upper bound for a single exponential backoff delay',
    }),
    requestGapMs: Type.Integer({
      minimum: 0,
      maximum: 60000,
      default: 1000,
      description: 'Pause in milliseconds between two consecutive tickers',
    }),
  },
  { default: {} },
);

export type FetchConfig = Static<typeof fetchSchema>;
