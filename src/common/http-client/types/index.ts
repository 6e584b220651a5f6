export type { HttpClient } from '../interfaces/http-client.interface';
export type {
  ClientOptions,
  SourceHttpSettings,
  UseProxyConfig,
} from './client-params';
