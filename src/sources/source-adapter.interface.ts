import { SourceConfig as SourceAdapterConfig } from '../config/schema/sources.schema';
import { SourceName } from './source-name.enum';

export type { SourceAdapterConfig };
export type Pair = [string, string];

export interface Quote {
  symbol: string;
  price: number;
  receivedAt: Date;
}

export interface Rate {
  pair: Pair;
  rate: number;
  receivedAt: Date;
}

export interface SourceAdapter {
  readonly name: SourceName;
  getConfig(): SourceAdapterConfig;
  fetchQuote?(symbol: string): Promise<Quote>;
  fetchRate?(pair: Pair): Promise<Rate>;
}
