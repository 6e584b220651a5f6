import {
  createTestHttpClientBuilder,
  FakeRequestHandler,
} from '../../../common/http-client/testing/http-client.testing';
import { createTestConfigService } from '../../../config/testing/config.testing';
import {
  InvalidPriceException,
  PriceNotFoundException,
  SourceUnauthorizedException,
} from '../../exceptions';
import { FrankfurterAdapter } from './frankfurter.adapter';

const createAdapter = (handler: FakeRequestHandler) => {
  const configService = createTestConfigService({
    sources: { frankfurter: { rps: null } },
  });
  const { builder, requests } = createTestHttpClientBuilder(
    configService,
    handler,
  );
  return { adapter: new FrankfurterAdapter(builder, configService), requests };
};

describe('FrankfurterAdapter', () => {
  test('fetches the latest rate for a pair', async () => {
    const { adapter, requests } = createAdapter(() => ({
      data: { amount: 1, base: 'USD', date: '2025-06-10', rates: { CAD: 1.3654 } },
    }));

    const rate = await adapter.fetchRate(['usd', 'cad']);

    expect(rate.rate).toBe(1.3654);
    expect(rate.pair).toEqual(['usd', 'cad']);
    expect(requests[0].url).toBe('https://api.frankfurter.app/latest');
    expect(requests[0].params).toEqual({ from: 'USD', to: 'CAD' });
  });

  test('does not quote tickers', () => {
    const { adapter } = createAdapter(() => ({ data: {} }));

    expect('fetchQuote' in adapter).toBe(false);
  });

  test('reports a missing rate', async () => {
    const { adapter } = createAdapter(() => ({
      data: { amount: 1, base: 'USD', date: '2025-06-10', rates: {} },
    }));

    await expect(adapter.fetchRate(['USD', 'CAD'])).rejects.toThrow(
      new PriceNotFoundException('USD/CAD', 'frankfurter'),
    );
  });

  test('rejects a zero rate', async () => {
    const { adapter } = createAdapter(() => ({
      data: { amount: 1, base: 'USD', date: '2025-06-10', rates: { CAD: 0 } },
    }));

    await expect(adapter.fetchRate(['USD', 'CAD'])).rejects.toBeInstanceOf(
      InvalidPriceException,
    );
  });

  test('maps 403 to SourceUnauthorizedException', async () => {
    const { adapter } = createAdapter(() => ({ status: 403, data: {} }));

    await expect(adapter.fetchRate(['USD', 'CAD'])).rejects.toBeInstanceOf(
      SourceUnauthorizedException,
    );
  });
});
