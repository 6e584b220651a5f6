export { PricesModule } from './prices.module';
export { PriceFetcherService } from './price-fetcher.service';
export { FetchException } from './exceptions';
export { createTickerFilter } from './ticker-filter';
export type { TickerFilterOptions, TickerPredicate } from './ticker-filter';
export type {
  ExchangeRate,
  ExchangeRateOutcome,
  PriceOutcome,
  PriceReading,
} from './price-reading.interface';
