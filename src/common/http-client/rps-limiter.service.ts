import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { isAxiosError } from 'axios';
import Bottleneck from 'bottleneck';

export interface RpsLimiterOptions {
  rps?: number | null;
  maxConcurrent?: number;
  maxRetries: number;
}

const NETWORK_ERROR_PATTERNS = [
  'network error',
  'connection',
  'timeout',
  'econnreset',
  'enotfound',
  'econnrefused',
  'socket hang up',
];

export function shouldRetryError(error: unknown): boolean {
  if (!error) {
    return false;
  }

  if (isAxiosError(error)) {
    if (!error.response) {
      return true;
    }
    const status = error.response.status;
    return status >= 500 || status === 429 || status === 408;
  }

  if (error instanceof Error) {
    const errorMessage = error.message.toLowerCase();
    return NETWORK_ERROR_PATTERNS.some((pattern) =>
      errorMessage.includes(pattern),
    );
  }

  return false;
}

@Injectable()
export class RpsLimiterService implements OnApplicationShutdown {
  private readonly logger = new Logger(RpsLimiterService.name);
  private limiters = new Map<string, Bottleneck>();

  createLimiter(key: string, options: RpsLimiterOptions): Bottleneck | null {
    if (options.rps === null || options.rps === undefined || options.rps <= 0) {
      return null;
    }

    const existing = this.limiters.get(key);
    if (existing) {
      return existing;
    }

    const minTime = Math.ceil(1000 / options.rps);
    const maxConcurrent = options.maxConcurrent || 1;
    const reservoir = Math.max(1, Math.floor(options.rps));

    const limiter = new Bottleneck({
      minTime,
      maxConcurrent,
      reservoir,
      reservoirRefreshAmount: reservoir,
      reservoirRefreshInterval: 1000,
    });

    limiter.on('error', (error) => {
      this.logger.error({ err: error, key }, 'Rate limiter error');
    });

    limiter.on('failed', (error, jobInfo) => {
      const shouldRetry = shouldRetryError(error);
      const statusCode = isAxiosError(error)
        ? (error.response?.status ?? 'network-error')
        : 'unknown';

      if (shouldRetry && jobInfo.retryCount < options.maxRetries) {
        this.logger.debug(
          {
            key,
            status: statusCode,
            attempt: jobInfo.retryCount + 1,
            maxRetries: options.maxRetries,
          },
          'Retrying request immediately',
        );
        return 0;
      }

      return undefined;
    });

    this.limiters.set(key, limiter);
    this.logger.debug(
      { key, rps: options.rps, maxConcurrent },
      'Created rate limiter',
    );

    return limiter;
  }

  async executeWithLimit<T>(
    key: string,
    options: RpsLimiterOptions,
    fn: () => Promise<T>,
  ): Promise<T> {
    const limiter = this.createLimiter(key, options);

    if (!limiter) {
      return fn();
    }

    return limiter.schedule(fn);
  }

  /**
   * Runs after the scheduler has stopped, so jobs still queued belong to the
   * last cycle and are allowed to finish.
   */
  async onApplicationShutdown(): Promise<void> {
    const limiters = Array.from(this.limiters.values());
    this.limiters.clear();
    await Promise.all(
      limiters.map((limiter) => limiter.stop({ dropWaitingJobs: false })),
    );
  }
}
