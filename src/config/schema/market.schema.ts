import { StaticDecode, Type } from '@sinclair/typebox';

import { timeZoneSchema, wallClockTimeSchema } from '../utils/schema.util';

export const marketSchema = Type.Transform(
  Type.Object(
    {
      timezone: timeZoneSchema('America/Toronto', {
        description: 'IANA time zone the exchange trades in',
      }),
      openTime: wallClockTimeSchema('09:00', {
        description: 'Wall-clock time (HH:mm) the market opens',
      }),
      closeTime: wallClockTimeSchema('16:00', {
        description: 'Wall-clock time (HH:mm) the market closes',
      }),
      tradingDays: Type.Array(Type.Integer({ minimum: 1, maximum: 7 }), {
        minItems: 1,
        default: [1, 2, 3, 4, 5],
        description: 'ISO weekdays the market trades on (1 = Monday)',
      }),
      holidays: Type.Array(Type.String({ pattern: '^\\d{4}-\\d{2}-\\d{2}$' }), {
        default: [],
        description: 'Dates (YYYY-MM-DD) the market is closed all day',
        examples: [['2025-12-25', '2026-01-01']],
      }),
    },
    { default: {} },
  ),
)
  .Decode((value) => {
    if (value.openTime >= value.closeTime) {
      throw new Error(
        `market.openTime (${value.openTime}) must be earlier than market.closeTime (${value.closeTime})`,
      );
    }
    return value;
  })
  .Encode((value) => value);

export type MarketConfig = StaticDecode<typeof marketSchema>;
