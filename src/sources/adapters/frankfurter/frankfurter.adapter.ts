import { Injectable } from '@nestjs/common';

import { HttpClient, HttpClientBuilder } from '../../../common';
import { AppConfigService } from '../../../config';
import { HandleSourceError } from '../../decorators';
import {
  InvalidPriceException,
  PriceNotFoundException,
} from '../../exceptions';
import { formatPairLabel, isUsablePrice } from '../../source-adapter.helpers';
import {
  Pair,
  Rate,
  SourceAdapter,
  SourceAdapterConfig,
} from '../../source-adapter.interface';
import { SourceName } from '../../source-name.enum';

const BASE_URL = 'https://api.frankfurter.app';
const API_PATH = '/latest';

interface FrankfurterResponse {
  amount: number;
  base: string;
  date: string;
  rates: Record<string, number>;
}

@Injectable()
export class FrankfurterAdapter implements SourceAdapter {
  readonly name = SourceName.FRANKFURTER;
  private readonly sourceConfig: SourceAdapterConfig;
  private readonly httpClient: HttpClient;

  constructor(
    httpClientBuilder: HttpClientBuilder,
    configService: AppConfigService,
  ) {
    this.sourceConfig = configService.get('sources.frankfurter');

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
  async fetchRate(pair: Pair): Promise<Rate> {
    const base = pair[0].toUpperCase();
    const quote = pair[1].toUpperCase();
    const { data } = await this.httpClient.get<FrankfurterResponse>(API_PATH, {
      params: {
        from: base,
        to: quote,
      },
    });
    const rate = data?.rates?.[quote];

    if (rate === undefined || rate === null) {
      throw new PriceNotFoundException(formatPairLabel(pair), this.name);
    }
    if (!isUsablePrice(rate)) {
      throw new InvalidPriceException(formatPairLabel(pair), rate, this.name);
    }

    return {
      pair,
      rate,
      receivedAt: new Date(),
    };
  }
}
