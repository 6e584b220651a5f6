import { Injectable, Logger } from '@nestjs/common';

import { YahooFinanceResponse } from './yahoo-finance.types';
import {
  extractPrice,
  normalizeSymbol,
  pairToYahooSymbol,
} from './yahoo-finance.utils';
import { getRandomUserAgent, HttpClient, HttpClientBuilder } from '../../../common';
import { AppConfigService } from '../../../config';
import { HandleSourceError } from '../../decorators';
import {
  InvalidPriceException,
  PriceNotFoundException,
  SourceApiException,
} from '../../exceptions';
import { formatPairLabel } from '../../source-adapter.helpers';
import {
  Pair,
  Quote,
  Rate,
  SourceAdapter,
  SourceAdapterConfig,
} from '../../source-adapter.interface';
import { SourceName } from '../../source-name.enum';

const BASE_URL = 'https://query1.finance.yahoo.com';
const CHART_PATH = '/v8/finance/chart';

@Injectable()
export class YahooFinanceAdapter implements SourceAdapter {
  readonly name = SourceName.YAHOO_FINANCE;
  private readonly logger = new Logger(YahooFinanceAdapter.name);
  private readonly sourceConfig: SourceAdapterConfig;
  private readonly httpClient: HttpClient;

  constructor(
    httpClientBuilder: HttpClientBuilder,
    configService: AppConfigService,
  ) {
    this.sourceConfig = configService.get('sources.yahoofinance');

    this.httpClient = httpClientBuilder.forSource(
      this.name,
      BASE_URL,
      this.sourceConfig,
    );
  }

  getConfig(): SourceAdapterConfig {
    return this.sourceConfig;
  }

  @HandleSourceError()
  async fetchQuote(symbol: string): Promise<Quote> {
    const yahooSymbol = normalizeSymbol(symbol);
    const price = await this.fetchChartPrice(yahooSymbol, symbol);

    return {
      symbol,
      price,
      receivedAt: new Date(),
    };
  }

  @HandleSourceError()
  async fetchRate(pair: Pair): Promise<Rate> {
    const yahooSymbol = pairToYahooSymbol(pair);
    const rate = await this.fetchChartPrice(yahooSymbol, formatPairLabel(pair));

    return {
      pair,
      rate,
      receivedAt: new Date(),
    };
  }

  private async fetchChartPrice(
    yahooSymbol: string,
    subject: string,
  ): Promise<number> {
    const { data } = await this.httpClient.get<YahooFinanceResponse>(
      `${CHART_PATH}/${encodeURIComponent(yahooSymbol)}`,
      {
        params: {
          interval: '1d',
          range: '1d',
        },
        headers: {
          'User-Agent': getRandomUserAgent(),
        },
      },
    );

    const chartError = data?.chart?.error;
    if (chartError) {
      if (chartError.code === 'Not Found') {
        throw new PriceNotFoundException(subject, this.name);
      }
      throw new SourceApiException(
        this.name,
        new Error(`${chartError.code}: ${chartError.description}`),
      );
    }

    const extraction = extractPrice(data?.chart?.result?.[0]?.meta);
    if (extraction.found) {
      this.logger.verbose(
        { symbol: yahooSymbol, field: extraction.field },
        'Price resolved',
      );
      return extraction.price;
    }

    if (extraction.rejected !== undefined) {
      throw new InvalidPriceException(subject, extraction.rejected, this.name);
    }

    throw new PriceNotFoundException(subject, this.name);
  }
}
