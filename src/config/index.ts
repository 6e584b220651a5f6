export { AppConfigModule } from './config.module';
export { AppConfigService } from './config.service';
export { ConfigException } from './exceptions';
export * from './constants';
export type { Config } from './types';
export type {
  ExchangeRateConfig,
  FetchConfig,
  LoggerConfig,
  MarketConfig,
  PricesConfig,
  ScheduleConfig,
  SheetConfig,
  SourceConfig,
  TickersConfig,
} from './schema';
