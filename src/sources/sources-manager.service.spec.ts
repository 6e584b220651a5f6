import { buildTestConfig } from '../config/testing/config.testing';
import {
  FeatureNotImplementedException,
  SourceDisabledException,
  SourceNotFoundException,
  SourceUnsupportedException,
} from './exceptions';
import { Pair, SourceAdapter } from './source-adapter.interface';
import { SourceName } from './source-name.enum';
import { SourcesManagerService } from './sources-manager.service';

const sourceConfig = buildTestConfig().sources.yahoofinance;
const receivedAt = new Date('2025-06-10T14:00:00Z');

const quoteAdapter = (enabled = true): SourceAdapter => ({
  name: SourceName.YAHOO_FINANCE,
  getConfig: () => ({ ...sourceConfig, enabled }),
  fetchQuote: async (symbol: string) => ({ symbol, price: 150.25, receivedAt }),
  fetchRate: async (pair: Pair) => ({ pair, rate: 1.37, receivedAt }),
});

const rateOnlyAdapter: SourceAdapter = {
  name: SourceName.FRANKFURTER,
  getConfig: () => sourceConfig,
  fetchRate: async (pair: Pair) => ({ pair, rate: 1.36, receivedAt }),
};

describe('SourcesManagerService', () => {
  test('routes quotes and rates to the named adapter', async () => {
    const manager = new SourcesManagerService([quoteAdapter(), rateOnlyAdapter]);

    await expect(
      manager.fetchQuote(SourceName.YAHOO_FINANCE, 'AAPL'),
    ).resolves.toEqual({ symbol: 'AAPL', price: 150.25, receivedAt });
    await expect(
      manager.fetchRate(SourceName.FRANKFURTER, ['USD', 'CAD']),
    ).resolves.toEqual({ pair: ['USD', 'CAD'], rate: 1.36, receivedAt });
  });

  test('rejects sources it does not know', async () => {
    const manager = new SourcesManagerService([quoteAdapter()]);

    await expect(manager.fetchQuote('bloomberg', 'AAPL')).rejects.toBeInstanceOf(
      SourceUnsupportedException,
    );
    await expect(
      manager.fetchRate(SourceName.FRANKFURTER, ['USD', 'CAD']),
    ).rejects.toBeInstanceOf(SourceNotFoundException);
  });

  test('rejects disabled sources', async () => {
    const manager = new SourcesManagerService([quoteAdapter(false)]);

    await expect(
      manager.fetchQuote(SourceName.YAHOO_FINANCE, 'AAPL'),
    ).rejects.toBeInstanceOf(SourceDisabledException);
    expect(() =>
      manager.assertCapability(SourceName.YAHOO_FINANCE, 'quotes'),
    ).toThrow(SourceDisabledException);
  });

  test('rejects a capability the adapter lacks', async () => {
    const manager = new SourcesManagerService([rateOnlyAdapter]);

    await expect(
      manager.fetchQuote(SourceName.FRANKFURTER, 'AAPL'),
    ).rejects.toBeInstanceOf(FeatureNotImplementedException);
    expect(() =>
      manager.assertCapability(SourceName.FRANKFURTER, 'quotes'),
    ).toThrow(FeatureNotImplementedException);
    expect(() =>
      manager.assertCapability(SourceName.FRANKFURTER, 'rates'),
    ).not.toThrow();
  });
});
