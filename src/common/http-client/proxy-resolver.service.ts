import { Injectable } from '@nestjs/common';

import { AppConfigService, ConfigException } from '../../config';
import { UseProxyConfig } from './types';

/**
 * Turns a source's `useProxy` setting into the proxy URL its requests go
 * through: `false` means direct, `true` the global `proxy`, a string its own.
 */
@Injectable()
export class ProxyResolverService {
  constructor(private readonly configService: AppConfigService) {}

  resolve(sourceName: string, useProxy: UseProxyConfig): string | undefined {
    if (useProxy === false) {
      return undefined;
    }
    if (typeof useProxy === 'string') {
      return useProxy;
    }

    const globalProxy = this.configService.get('proxy');
    if (!globalProxy) {
      throw new ConfigException(
        `sources.${sourceName}.useProxy is true but no global proxy URL is configured. Set proxy or put the URL in useProxy itself.`,
      );
    }

    return globalProxy;
  }
}
