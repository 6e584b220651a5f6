import { HttpService } from '@nestjs/axios';
import { Injectable, Logger } from '@nestjs/common';

import { ConfiguredHttpClient } from './configured-http-client';
import { ProxyResolverService } from './proxy-resolver.service';
import { RpsLimiterService } from './rps-limiter.service';
import { HttpClient, SourceHttpSettings } from './types';

@Injectable()
export class HttpClientBuilder {
  private readonly logger = new Logger(HttpClientBuilder.name);

  constructor(
    private readonly httpService: HttpService,
    private readonly rpsLimiter: RpsLimiterService,
    private readonly proxyResolver: ProxyResolverService,
  ) {}

  forSource(
    sourceName: string,
    baseUrl: string,
    settings: SourceHttpSettings,
  ): HttpClient {
    const { useProxy, timeoutMs, rps, maxConcurrent, maxRetries } = settings;
    const proxyUrl = this.proxyResolver.resolve(sourceName, useProxy);

    this.logger.debug(
      { source: sourceName, baseUrl, timeoutMs, rps, proxied: !!proxyUrl },
      'Configured HTTP client',
    );

    return new ConfiguredHttpClient(
      { sourceName, baseUrl, timeoutMs, rps, maxConcurrent, maxRetries, proxyUrl },
      this.httpService,
      this.rpsLimiter,
    );
  }
}
