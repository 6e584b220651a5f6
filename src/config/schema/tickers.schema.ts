import { Static, Type } from '@sinclair/typebox';

export const tickersSchema = Type.Object(
  {
    sentinels: Type.Array(Type.String({ minLength: 1 }), {
      default: ['Total', 'Unused'],
      description:
        'Header labels that are not tickers and are never fetched or written',
    }),
    skipContaining: Type.Array(Type.String({ minLength: 1 }), {
      default: ['@'],
      description: 'Header labels containing any of these are skipped',
    }),
  },
  { default: {} },
);

export type TickersConfig = Static<typeof tickersSchema>;
