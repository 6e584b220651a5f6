import {
  createTestHttpClientBuilder,
  FakeRequestHandler,
} from '../../../common/http-client/testing/http-client.testing';
import { createTestConfigService } from '../../../config/testing/config.testing';
import {
  InvalidPriceException,
  PriceNotFoundException,
  SourceApiException,
} from '../../exceptions';
import { YahooFinanceAdapter } from './yahoo-finance.adapter';

const chart = (meta: Record<string, unknown>) => ({
  data: { chart: { result: [{ meta: { symbol: 'TEST', ...meta } }], error: null } },
});

const createAdapter = (handler: FakeRequestHandler) => {
  const configService = createTestConfigService({
    sources: { yahoofinance: { rps: null } },
  });
  const { builder, requests } = createTestHttpClientBuilder(
    configService,
    handler,
  );
  return { adapter: new YahooFinanceAdapter(builder, configService), requests };
};

describe('YahooFinanceAdapter', () => {
  test('fetches a quote from the chart endpoint', async () => {
    const { adapter, requests } = createAdapter(() =>
      chart({ regularMarketPrice: 150.25 }),
    );

    const quote = await adapter.fetchQuote('AAPL');

    expect(quote.symbol).toBe('AAPL');
    expect(quote.price).toBe(150.25);
    expect(quote.receivedAt).toBeInstanceOf(Date);
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe(
      'https://query1.finance.yahoo.com/v8/finance/chart/AAPL',
    );
    expect(requests[0].params).toEqual({ interval: '1d', range: '1d' });
    expect(requests[0].headers['User-Agent']).toEqual(expect.any(String));
  });

  test('uses the previous close when there is no market price', async () => {
    const { adapter } = createAdapter(() =>
      chart({ regularMarketPrice: null, previousClose: 41.1 }),
    );

    await expect(adapter.fetchQuote('SHOP.TO')).resolves.toMatchObject({
      symbol: 'SHOP.TO',
      price: 41.1,
    });
  });

  test('rejects a non-positive price', async () => {
    const { adapter } = createAdapter(() => chart({ regularMarketPrice: 0 }));

    await expect(adapter.fetchQuote('AAPL')).rejects.toBeInstanceOf(
      InvalidPriceException,
    );
  });

  test('maps a 404 response to PriceNotFoundException', async () => {
    const { adapter } = createAdapter(() => ({ status: 404, data: {} }));

    await expect(adapter.fetchQuote('NOPE')).rejects.toThrow(
      new PriceNotFoundException('NOPE', 'yahoofinance'),
    );
  });

  test('maps a chart error payload to PriceNotFoundException', async () => {
    const { adapter } = createAdapter(() => ({
      data: {
        chart: {
          result: null,
          error: { code: 'Not Found', description: 'No data found' },
        },
      },
    }));

    await expect(adapter.fetchQuote('NOPE')).rejects.toBeInstanceOf(
      PriceNotFoundException,
    );
  });

  test('maps a server error to SourceApiException with its status', async () => {
    const { adapter } = createAdapter(() => ({ status: 502, data: {} }));

    const error = await adapter.fetchQuote('AAPL').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceApiException);
    expect(error).toMatchObject({ statusCode: 502 });
  });

  test('fetches a USD based rate through the =X symbol', async () => {
    const { adapter, requests } = createAdapter(() =>
      chart({ regularMarketPrice: 1.3654 }),
    );

    const rate = await adapter.fetchRate(['USD', 'CAD']);

    expect(rate.pair).toEqual(['USD', 'CAD']);
    expect(rate.rate).toBe(1.3654);
    expect(requests[0].url).toBe(
      'https://query1.finance.yahoo.com/v8/finance/chart/CAD%3DX',
    );
  });
});
