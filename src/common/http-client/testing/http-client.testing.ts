import { HttpService } from '@nestjs/axios';
import axios, {
  AxiosError,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from 'axios';

import { AppConfigService } from '../../../config';
import { HttpClientBuilder } from '../http-client.builder';
import { ProxyResolverService } from '../proxy-resolver.service';
import { RpsLimiterService } from '../rps-limiter.service';

export interface FakeResponse {
  status?: number;
  data: unknown;
}

export type FakeRequestHandler = (
  config: InternalAxiosRequestConfig,
) => FakeResponse | Promise<FakeResponse>;

/**
 * HttpClientBuilder whose axios instance answers from `handler` in process.
 * Non-2xx answers reject the way axios does.
 */
export function createTestHttpClientBuilder(
  configService: AppConfigService,
  handler: FakeRequestHandler,
): { builder: HttpClientBuilder; requests: InternalAxiosRequestConfig[] } {
  const requests: InternalAxiosRequestConfig[] = [];

  const instance = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const { status = 200, data } = await handler(config);
      const response: AxiosResponse = {
        data,
        status,
        statusText: String(status),
        headers: {},
        config,
      };

      if (status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${status}`,
          status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
          config,
          undefined,
          response,
        );
      }

      return response;
    },
  });

  const builder = new HttpClientBuilder(
    new HttpService(instance),
    new RpsLimiterService(),
    new ProxyResolverService(configService),
  );

  return { builder, requests };
}
