export * from './config.schema';
export * from './env.schema';
export type { FetchConfig } from './fetch.schema';
export type { LoggerConfig } from './logger.schema';
export type { MarketConfig } from './market.schema';
export type { ExchangeRateConfig, PricesConfig } from './prices.schema';
export type { ScheduleConfig } from './schedule.schema';
export type { SheetConfig } from './sheet.schema';
export type { SourceConfig, SourcesConfig } from './sources.schema';
export type { TickersConfig } from './tickers.schema';
