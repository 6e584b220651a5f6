import { AxiosRequestConfig, AxiosResponse } from 'axios';

/** GET-only client bound to one price source's base URL and limits. */
export interface HttpClient {
  readonly sourceName: string;
  get<T>(path: string, config?: AxiosRequestConfig): Promise<AxiosResponse<T>>;
}
