export interface YahooChartMeta {
  symbol: string;
  currency?: string;
  exchangeName?: string;
  exchangeTimezoneName?: string;
  regularMarketPrice?: number | null;
  regularMarketTime?: number;
  previousClose?: number | null;
  chartPreviousClose?: number | null;
}

export interface YahooFinanceResponse {
  chart: {
    result?: Array<{
      meta: YahooChartMeta;
      timestamp?: number[];
      indicators?: {
        quote: Array<{
          close?: Array<number | null>;
        }>;
      };
    }> | null;
    error?: {
      code: string;
      description: string;
    } | null;
  };
}
