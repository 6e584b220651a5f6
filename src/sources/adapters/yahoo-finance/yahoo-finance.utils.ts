import { isUsablePrice } from '../../source-adapter.helpers';
import { Pair } from '../../source-adapter.interface';
import { YahooChartMeta } from './yahoo-finance.types';

export const PRICE_FIELDS = [
  'regularMarketPrice',
  'previousClose',
  'chartPreviousClose',
] as const;

export type PriceField = (typeof PRICE_FIELDS)[number];

export type PriceExtraction =
  | { found: true; price: number; field: PriceField }
  | { found: false; rejected?: unknown };

/**
 * Yahoo quotes FX as `{BASE}{QUOTE}=X`, except that USD-based pairs drop the
 * base: USD→CAD is `CAD=X`.
 */
export function pairToYahooSymbol(pair: Pair): string {
  const base = pair[0].toUpperCase();
  const quote = pair[1].toUpperCase();

  if (base === 'USD') {
    return `${quote}=X`;
  }

  return `${base}${quote}=X`;
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

/**
 * First usable price among {@link PRICE_FIELDS}. When a field is present but
 * unusable and none after it works, the rejected value is reported.
 */
export function extractPrice(meta: YahooChartMeta | undefined): PriceExtraction {
  if (!meta) {
    return { found: false };
  }

  let rejected: unknown;
  for (const field of PRICE_FIELDS) {
    const value = meta[field];
    if (isUsablePrice(value)) {
      return { found: true, price: value, field };
    }
    if (value !== undefined && value !== null && rejected === undefined) {
      rejected = value;
    }
  }

  return rejected === undefined ? { found: false } : { found: false, rejected };
}
