import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  FeatureNotImplementedException,
  SourceDisabledException,
  SourceNotFoundException,
  SourceUnsupportedException,
} from './exceptions';
import { formatPairLabel } from './source-adapter.helpers';
import { Pair, Quote, Rate, SourceAdapter } from './source-adapter.interface';
import { isSourceName, SourceName } from './source-name.enum';
import { SOURCE_ADAPTERS } from './sources.constants';

export type SourceCapability = 'quotes' | 'rates';

@Injectable()
export class SourcesManagerService {
  private readonly logger = new Logger(SourcesManagerService.name);
  private readonly adapters = new Map<SourceName, SourceAdapter>();

  constructor(@Inject(SOURCE_ADAPTERS) adapters: SourceAdapter[]) {
    for (const adapter of adapters) {
      this.adapters.set(adapter.name, adapter);
    }
  }

  async fetchQuote(
    sourceName: SourceName | string,
    symbol: string,
  ): Promise<Quote> {
    this.logger.debug({ source: sourceName, symbol }, 'Fetching quote');
    const adapter = this.getAdapterFor(sourceName, 'quotes');

    if (!adapter.fetchQuote) {
      throw new FeatureNotImplementedException('quotes', sourceName);
    }

    return adapter.fetchQuote(symbol);
  }

  async fetchRate(sourceName: SourceName | string, pair: Pair): Promise<Rate> {
    this.logger.debug(
      { source: sourceName, pair: formatPairLabel(pair) },
      'Fetching exchange rate',
    );
    const adapter = this.getAdapterFor(sourceName, 'rates');

    if (!adapter.fetchRate) {
      throw new FeatureNotImplementedException('rates', sourceName);
    }

    return adapter.fetchRate(pair);
  }

  /**
   * Throws when `sourceName` is unknown, disabled or cannot serve `capability`.
   */
  assertCapability(
    sourceName: SourceName | string,
    capability: SourceCapability,
  ): void {
    this.getAdapterFor(sourceName, capability);
  }

  private getAdapterFor(
    sourceName: SourceName | string,
    capability: SourceCapability,
  ): SourceAdapter {
    const adapter = this.getAdapterByName(sourceName);
    const supported =
      capability === 'quotes'
        ? adapter.fetchQuote !== undefined
        : adapter.fetchRate !== undefined;

    if (!supported) {
      throw new FeatureNotImplementedException(capability, sourceName);
    }

    return adapter;
  }

  private getAdapterByName(sourceName: SourceName | string): SourceAdapter {
    if (!isSourceName(sourceName)) {
      throw new SourceUnsupportedException(
        sourceName,
        Object.values(SourceName),
      );
    }

    const adapter = this.adapters.get(sourceName);
    if (!adapter) {
      throw new SourceNotFoundException(sourceName);
    }

    if (!adapter.getConfig().enabled) {
      throw new SourceDisabledException(sourceName);
    }

    return adapter;
  }
}
