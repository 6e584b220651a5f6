export const LOGGER_LEVELS = [
  'error',
  'warn',
  'info',
  'debug',
  'verbose',
] as const;

export const BACKOFF_STRATEGIES = ['fixed', 'exponential'] as const;

export const DEFAULT_CONFIG_FILE = 'config.yaml';

export type LoggerLevel = (typeof LOGGER_LEVELS)[number];
export type BackoffStrategy = (typeof BACKOFF_STRATEGIES)[number];
