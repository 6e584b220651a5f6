export { YahooFinanceAdapter } from './yahoo-finance.adapter';
export { pairToYahooSymbol, extractPrice } from './yahoo-finance.utils';
export type { YahooFinanceResponse } from './yahoo-finance.types';
