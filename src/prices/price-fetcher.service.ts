import { Injectable, Logger, OnModuleInit } from '@nestjs/common';

import { ClockService, retry, RetryOptions } from '../common';
import { AppConfigService, ConfigException, FetchConfig } from '../config';
import {
  formatPairLabel,
  InvalidPriceException,
  isUsablePrice,
  Pair,
  SourceApiException,
  SourceCapability,
  SourceName,
  SourcesManagerService,
} from '../sources';
import { FetchException } from './exceptions';
import {
  ExchangeRateOutcome,
  PriceOutcome,
} from './price-reading.interface';
import { createTickerFilter, TickerPredicate } from './ticker-filter';

@Injectable()
export class PriceFetcherService implements OnModuleInit {
  private readonly logger = new Logger(PriceFetcherService.name);
  private readonly fetchConfig: FetchConfig;
  private readonly priceSource: SourceName;
  readonly isFetchable: TickerPredicate;

  constructor(
    private readonly sourcesManager: SourcesManagerService,
    private readonly configService: AppConfigService,
    private readonly clock: ClockService,
  ) {
    this.fetchConfig = configService.get('fetch');
    this.priceSource = configService.get('prices.source');
    this.isFetchable = createTickerFilter(configService.get('tickers'));
  }

  onModuleInit(): void {
    this.assertSource(this.priceSource, 'quotes', 'prices.source');

    const exchangeRate = this.configService.get('exchangeRate');
    if (exchangeRate.enabled) {
      this.assertSource(exchangeRate.source, 'rates', 'exchangeRate.source');
    }
  }

  /**
   * Fetches every fetchable ticker once, in order. Non-fetchable labels are
   * left out of the result; failures and cancellations are recorded as
   * {@link FetchException} values.
   */
  async fetchPrices(
    tickers: readonly string[],
    signal?: AbortSignal,
  ): Promise<Map<string, PriceOutcome>> {
    const pending = this.selectFetchable(tickers);
    const results = new Map<string, PriceOutcome>();

    for (const [index, ticker] of pending.entries()) {
      if (signal?.aborted) {
        results.set(ticker, FetchException.cancelled(ticker));
        continue;
      }

      if (index > 0 && this.fetchConfig.requestGapMs > 0) {
        const completed = await this.clock.sleep(
          this.fetchConfig.requestGapMs,
          signal,
        );
        if (!completed) {
          results.set(ticker, FetchException.cancelled(ticker));
          continue;
        }
      }

      results.set(ticker, await this.fetchTicker(ticker, signal));
    }

    const failed = [...results.values()].filter(
      (outcome) => outcome instanceof FetchException,
    ).length;
    this.logger.log(
      { requested: pending.length, fetched: results.size - failed, failed },
      'Price fetch finished',
    );

    return results;
  }

  async fetchExchangeRate(
    pair: Pair,
    signal?: AbortSignal,
  ): Promise<ExchangeRateOutcome> {
    const label = formatPairLabel(pair);
    const source = this.configService.get('exchangeRate.source');

    const outcome = await retry(
      async () => {
        const { rate, receivedAt } = await this.sourcesManager.fetchRate(
          source,
          pair,
        );
        if (!isUsablePrice(rate)) {
          throw new InvalidPriceException(label, rate, source);
        }
        return { pair, rate, fetchedAt: receivedAt };
      },
      this.retryOptions(label, signal),
    );

    if (outcome.ok) {
      this.logger.debug(
        { pair: label, rate: outcome.value.rate, attempts: outcome.attempts },
        'Exchange rate fetched',
      );
      return outcome.value;
    }

    return this.recordFailure(
      label,
      outcome.attempts,
      outcome.error,
      outcome.aborted,
    );
  }

  private selectFetchable(tickers: readonly string[]): string[] {
    const selected = new Set<string>();
    for (const label of tickers) {
      const ticker = label.trim();
      if (this.isFetchable(ticker)) {
        selected.add(ticker);
      } else {
        this.logger.verbose({ label }, 'Skipping non-ticker label');
      }
    }
    return [...selected];
  }

  private async fetchTicker(
    ticker: string,
    signal?: AbortSignal,
  ): Promise<PriceOutcome> {
    const outcome = await retry(async () => {
      const { price, receivedAt } = await this.sourcesManager.fetchQuote(
        this.priceSource,
        ticker,
      );
      if (!isUsablePrice(price)) {
        throw new InvalidPriceException(ticker, price, this.priceSource);
      }
      return { ticker, price, fetchedAt: receivedAt };
    }, this.retryOptions(ticker, signal));

    if (outcome.ok) {
      this.logger.debug(
        { ticker, price: outcome.value.price, attempts: outcome.attempts },
        'Price fetched',
      );
      return outcome.value;
    }

    return this.recordFailure(
      ticker,
      outcome.attempts,
      outcome.error,
      outcome.aborted,
    );
  }

  private retryOptions(subject: string, signal?: AbortSignal): RetryOptions {
    return {
      maxAttempts: this.fetchConfig.maxAttempts,
      delayMs: this.fetchConfig.retryDelayMs,
      backoff: this.fetchConfig.backoff,
      multiplier: this.fetchConfig.backoffMultiplier,
      maxDelayMs: this.fetchConfig.maxRetryDelayMs,
      signal,
      sleep: (ms, abortSignal) => this.clock.sleep(ms, abortSignal),
      onAttemptFailed: (error, attempt, nextDelayMs) => {
        this.logger.warn(
          {
            ticker: subject,
            attempt,
            maxAttempts: this.fetchConfig.maxAttempts,
            nextDelayMs,
            ...(error instanceof SourceApiException &&
              error.isRateLimited && { rateLimited: true }),
            err: error,
          },
          `Attempt ${attempt} for ${subject} failed`,
        );
      },
    };
  }

  private recordFailure(
    subject: string,
    attempts: number,
    error: unknown,
    aborted: boolean,
  ): FetchException {
    const failure = new FetchException(subject, attempts, error, aborted);
    if (aborted) {
      this.logger.warn({ ticker: subject, attempts }, failure.message);
    } else {
      this.logger.error(
        { ticker: subject, attempts, err: error },
        failure.message,
      );
    }
    return failure;
  }

  private assertSource(
    source: SourceName,
    capability: SourceCapability,
    field: string,
  ): void {
    try {
      this.sourcesManager.assertCapability(source, capability);
    } catch (error) {
      throw new ConfigException(
        `${field}: source "${source}" cannot be used for ${capability}. ${
          error instanceof Error ? error.message : String(error)
        }`,
        { cause: error },
      );
    }
  }
}
