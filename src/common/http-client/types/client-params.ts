import { SourceConfig } from '../../../config/schema/sources.schema';

export type UseProxyConfig = SourceConfig['useProxy'];

export type SourceHttpSettings = Pick<
  SourceConfig,
  'timeoutMs' | 'rps' | 'maxConcurrent' | 'maxRetries' | 'useProxy'
>;

export interface ClientOptions
  extends Omit<SourceHttpSettings, 'useProxy'> {
  sourceName: string;
  baseUrl: string;
  proxyUrl?: string;
}
