import { Static, Type } from '@sinclair/typebox';

export const scheduleSchema = Type.Object(
  {
    intervalMinutes: Type.Integer({
      minimum: 1,
      maximum: 240,
      default: 10,
      description: 'Minutes between update cycles while the market is open',
    }),
    alignToInterval: Type.Boolean({
      default: true,
      description:
        'Wake on wall-clock multiples of the interval (e.g. :00, :10, :20) instead of a plain delay',
    }),
    errorBackoffMs: Type.Integer({
      minimum: 1000,
      maximum: 3600000,
      default: 60000,
      description:
        'Pause in milliseconds after an unexpected error in the scheduling loop',
    }),
  },
  { default: {} },
);

export type ScheduleConfig = Static<typeof scheduleSchema>;
