import { HttpService } from '@nestjs/axios';
import { Logger } from '@nestjs/common';
import { AxiosRequestConfig, AxiosResponse } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';

import { HttpClient } from './interfaces/http-client.interface';
import { RpsLimiterService } from './rps-limiter.service';
import { ClientOptions } from './types/client-params';
import { sanitizeUrlForLogging } from './url-sanitizer';

export class ConfiguredHttpClient implements HttpClient {
  private readonly logger = new Logger(ConfiguredHttpClient.name);
  private readonly proxyAgent?: HttpsProxyAgent<string>;

  constructor(
    private readonly options: ClientOptions,
    private readonly httpService: HttpService,
    private readonly rpsLimiter: RpsLimiterService,
  ) {
    if (options.proxyUrl) {
      this.proxyAgent = new HttpsProxyAgent(options.proxyUrl);
    }
  }

  get sourceName(): string {
    return this.options.sourceName;
  }

  get<T>(path: string, config: AxiosRequestConfig = {}): Promise<AxiosResponse<T>> {
    const url = new URL(path, this.options.baseUrl).toString();
    const requestConfig: AxiosRequestConfig = {
      ...config,
      method: 'GET',
      url,
      timeout: this.options.timeoutMs,
      ...(this.proxyAgent && { httpsAgent: this.proxyAgent, proxy: false }),
    };

    // one limiter per source, shared by all of its clients
    return this.rpsLimiter.executeWithLimit(
      this.options.sourceName,
      {
        rps: this.options.rps,
        maxConcurrent: this.options.maxConcurrent,
        maxRetries: this.options.maxRetries,
      },
      () => {
        this.logger.debug(
          { source: this.options.sourceName },
          `HTTP GET ${sanitizeUrlForLogging(url, config.params)}`,
        );
        return this.httpService.axiosRef.request<T>(requestConfig);
      },
    );
  }
}
