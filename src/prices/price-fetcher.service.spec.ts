import { FakeClock } from '../common/clock/testing/fake-clock';
import { ConfigException } from '../config';
import {
  buildTestConfig,
  createTestConfigService,
} from '../config/testing/config.testing';
import {
  InvalidPriceException,
  Pair,
  Quote,
  Rate,
  SourceAdapter,
  SourceApiException,
  SourceName,
  SourcesManagerService,
} from '../sources';
import { FetchException } from './exceptions';
import { PriceFetcherService } from './price-fetcher.service';
import { PriceOutcome, PriceReading } from './price-reading.interface';

const receivedAt = new Date('2025-06-10T14:00:00Z');
const sourceConfig = buildTestConfig().sources.yahoofinance;

type QuoteFn = (symbol: string) => Promise<Quote>;
type RateFn = (pair: Pair) => Promise<Rate>;

const quote = (symbol: string, price: number): Quote => ({
  symbol,
  price,
  receivedAt,
});

const createFetcher = (
  fetchQuote: QuoteFn,
  options: {
    fetchRate?: RateFn;
    overrides?: Record<string, unknown>;
  } = {},
) => {
  const adapter: SourceAdapter = {
    name: SourceName.YAHOO_FINANCE,
    getConfig: () => sourceConfig,
    fetchQuote,
    fetchRate:
      options.fetchRate ??
      (async (pair: Pair) => ({ pair, rate: 1.3654, receivedAt })),
  };
  const clock = new FakeClock('2025-06-10T14:00:00Z');
  const fetcher = new PriceFetcherService(
    new SourcesManagerService([adapter]),
    createTestConfigService({
      fetch: { retryDelayMs: 5000, requestGapMs: 1000 },
      ...options.overrides,
    }),
    clock,
  );
  return { fetcher, clock };
};

const readingOf = (outcome: PriceOutcome | undefined): PriceReading => {
  if (!outcome || outcome instanceof FetchException) {
    throw new Error(`expected a reading, got ${String(outcome)}`);
  }
  return outcome;
};

const failureOf = (outcome: PriceOutcome | undefined): FetchException => {
  if (!(outcome instanceof FetchException)) {
    throw new Error('expected a FetchException');
  }
  return outcome;
};

describe('PriceFetcherService', () => {
  test('fetches fetchable tickers and skips sentinels without a call', async () => {
    const fetchQuote = jest.fn(async (symbol: string) => quote(symbol, 100));
    const { fetcher } = createFetcher(fetchQuote);

    const results = await fetcher.fetchPrices([
      'AAPL',
      'Total',
      'Unused',
      'USD@CAD',
      '',
      'MSFT',
    ]);

    expect([...results.keys()]).toEqual(['AAPL', 'MSFT']);
    expect(fetchQuote.mock.calls).toEqual([['AAPL'], ['MSFT']]);
    expect(readingOf(results.get('AAPL'))).toEqual({
      ticker: 'AAPL',
      price: 100,
      fetchedAt: receivedAt,
    });
  });

  test('fetches a repeated ticker once', async () => {
    const fetchQuote = jest.fn(async (symbol: string) => quote(symbol, 10));
    const { fetcher } = createFetcher(fetchQuote);

    const results = await fetcher.fetchPrices(['AAPL', 'AAPL', ' AAPL ']);

    expect(results.size).toBe(1);
    expect(fetchQuote).toHaveBeenCalledTimes(1);
  });

  test('records a failure after every attempt fails and carries on', async () => {
    const lastError = new SourceApiException(
      'yahoofinance',
      new Error('MSFT unavailable'),
    );
    const fetchQuote = jest.fn(async (symbol: string) => {
      if (symbol === 'MSFT') {
        throw lastError;
      }
      return quote(symbol, 150.25);
    });
    const { fetcher, clock } = createFetcher(fetchQuote);

    const results = await fetcher.fetchPrices(['AAPL', 'MSFT', 'GOOG']);

    const failure = failureOf(results.get('MSFT'));
    expect(failure.attempts).toBe(3);
    expect(failure.cancelled).toBe(false);
    expect(failure.cause).toBe(lastError);
    expect(failure.message).toBe(
      'Failed to fetch MSFT after 3 attempts: API error from yahoofinance: MSFT unavailable',
    );
    expect(readingOf(results.get('GOOG')).price).toBe(150.25);
    expect(fetchQuote).toHaveBeenCalledTimes(5);
    expect(clock.sleeps).toEqual([1000, 5000, 5000, 1000]);
  });

  test('retries until an attempt succeeds', async () => {
    const fetchQuote = jest
      .fn<Promise<Quote>, [string]>()
      .mockRejectedValueOnce(new Error('timeout of 10000ms exceeded'))
      .mockResolvedValue(quote('AAPL', 151));
    const { fetcher, clock } = createFetcher(fetchQuote);

    const results = await fetcher.fetchPrices(['AAPL']);

    expect(readingOf(results.get('AAPL')).price).toBe(151);
    expect(clock.sleeps).toEqual([5000]);
  });

  test('treats a non-positive or non-finite price as a failed attempt', async () => {
    const fetchQuote = jest
      .fn<Promise<Quote>, [string]>()
      .mockResolvedValueOnce(quote('AAPL', 0))
      .mockResolvedValueOnce(quote('AAPL', Number.NaN))
      .mockResolvedValueOnce(quote('AAPL', -1));
    const { fetcher } = createFetcher(fetchQuote);

    const results = await fetcher.fetchPrices(['AAPL']);

    const failure = failureOf(results.get('AAPL'));
    expect(failure.attempts).toBe(3);
    expect(failure.cause).toBeInstanceOf(InvalidPriceException);
  });

  test('starts nothing once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchQuote = jest.fn(async (symbol: string) => quote(symbol, 1));
    const { fetcher } = createFetcher(fetchQuote);

    const results = await fetcher.fetchPrices(['AAPL', 'MSFT'], controller.signal);

    expect(fetchQuote).not.toHaveBeenCalled();
    expect(failureOf(results.get('AAPL')).cancelled).toBe(true);
    expect(failureOf(results.get('MSFT')).cancelled).toBe(true);
  });

  test('lets the in-flight call finish and cancels the rest on abort', async () => {
    const controller = new AbortController();
    const fetchQuote = jest.fn(async (symbol: string) => {
      controller.abort();
      return quote(symbol, 42);
    });
    const { fetcher } = createFetcher(fetchQuote);

    const results = await fetcher.fetchPrices(
      ['AAPL', 'MSFT', 'GOOG'],
      controller.signal,
    );

    expect(readingOf(results.get('AAPL')).price).toBe(42);
    expect(failureOf(results.get('MSFT')).cancelled).toBe(true);
    expect(failureOf(results.get('GOOG')).cancelled).toBe(true);
    expect(fetchQuote).toHaveBeenCalledTimes(1);
  });

  test('fetches the exchange rate', async () => {
    const { fetcher } = createFetcher(async (symbol) => quote(symbol, 1));

    await expect(fetcher.fetchExchangeRate(['USD', 'CAD'])).resolves.toEqual({
      pair: ['USD', 'CAD'],
      rate: 1.3654,
      fetchedAt: receivedAt,
    });
  });

  test('returns a failure for an exchange rate that cannot be fetched', async () => {
    const fetchRate = jest.fn(async (): Promise<Rate> => {
      throw new Error('rate service down');
    });
    const { fetcher } = createFetcher(async (symbol) => quote(symbol, 1), {
      fetchRate,
    });

    const outcome = await fetcher.fetchExchangeRate(['USD', 'CAD']);

    expect(outcome).toBeInstanceOf(FetchException);
    expect(outcome).toMatchObject({ ticker: 'USD/CAD', attempts: 3 });
    expect(fetchRate).toHaveBeenCalledTimes(3);
  });

  test('refuses a price source that cannot quote tickers', () => {
    const { fetcher } = createFetcher(async (symbol) => quote(symbol, 1), {
      overrides: { prices: { source: 'frankfurter' } },
    });

    expect(() => fetcher.onModuleInit()).toThrow(ConfigException);
  });

  test('accepts the configured sources at startup', () => {
    const { fetcher } = createFetcher(async (symbol) => quote(symbol, 1));

    expect(() => fetcher.onModuleInit()).not.toThrow();
  });
});
