import { HttpModule } from '@nestjs/axios';
import { Module } from '@nestjs/common';

import { HttpClientBuilder } from './http-client.builder';
import { ProxyResolverService } from './proxy-resolver.service';
import { RpsLimiterService } from './rps-limiter.service';

@Module({
  imports: [
    HttpModule.register({
      headers: { Accept: 'application/json' },
      maxRedirects: 3,
    }),
  ],
  providers: [ProxyResolverService, RpsLimiterService, HttpClientBuilder],
  exports: [HttpClientBuilder],
})
export class HttpClientModule {}
