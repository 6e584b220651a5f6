import { extractPrice, pairToYahooSymbol } from './yahoo-finance.utils';

describe('pairToYahooSymbol', () => {
  test('drops the base currency for USD pairs', () => {
    expect(pairToYahooSymbol(['USD', 'CAD'])).toBe('CAD=X');
    expect(pairToYahooSymbol(['usd', 'jpy'])).toBe('JPY=X');
  });

  test('joins both currencies for other pairs', () => {
    expect(pairToYahooSymbol(['EUR', 'USD'])).toBe('EURUSD=X');
    expect(pairToYahooSymbol(['cad', 'usd'])).toBe('CADUSD=X');
  });
});

describe('extractPrice', () => {
  test('prefers the regular market price', () => {
    expect(
      extractPrice({
        symbol: 'AAPL',
        regularMarketPrice: 150.25,
        previousClose: 149.5,
        chartPreviousClose: 148,
      }),
    ).toEqual({ found: true, price: 150.25, field: 'regularMarketPrice' });
  });

  test('falls back to previous close values in order', () => {
    expect(
      extractPrice({
        symbol: 'AAPL',
        regularMarketPrice: null,
        previousClose: 149.5,
        chartPreviousClose: 148,
      }),
    ).toEqual({ found: true, price: 149.5, field: 'previousClose' });

    expect(
      extractPrice({ symbol: 'AAPL', chartPreviousClose: 148 }),
    ).toEqual({ found: true, price: 148, field: 'chartPreviousClose' });
  });

  test('skips non-positive values', () => {
    expect(
      extractPrice({ symbol: 'AAPL', regularMarketPrice: 0, previousClose: 12 }),
    ).toEqual({ found: true, price: 12, field: 'previousClose' });
  });

  test('reports the rejected value when nothing usable remains', () => {
    expect(
      extractPrice({ symbol: 'AAPL', regularMarketPrice: -3 }),
    ).toEqual({ found: false, rejected: -3 });
  });

  test('reports nothing found for empty metadata', () => {
    expect(extractPrice({ symbol: 'AAPL' })).toEqual({ found: false });
    expect(extractPrice(undefined)).toEqual({ found: false });
  });
});
