import { Pair } from '../sources';
import { FetchException } from './exceptions';

export interface PriceReading {
  ticker: string;
  price: number;
  fetchedAt: Date;
}

export interface ExchangeRate {
  pair: Pair;
  rate: number;
  fetchedAt: Date;
}

export type PriceOutcome = PriceReading | FetchException;
export type ExchangeRateOutcome = ExchangeRate | FetchException;
