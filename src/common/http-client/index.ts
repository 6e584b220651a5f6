export { HttpClientModule } from './http-client.module';
export { HttpClientBuilder } from './http-client.builder';
export { ProxyResolverService } from './proxy-resolver.service';
export { shouldRetryError } from './rps-limiter.service';
export { sanitizeUrlForLogging } from './url-sanitizer';
export type { HttpClient, SourceHttpSettings, UseProxyConfig } from './types';
