/**
 * Outcome of a ticker (or currency pair) whose attempts were exhausted or
 * cancelled. Returned as a value by the fetcher, never thrown.
 */
export class FetchException extends Error {
  constructor(
    public readonly ticker: string,
    public readonly attempts: number,
    cause: unknown,
    public readonly cancelled = false,
  ) {
    super(FetchException.describe(ticker, attempts, cause, cancelled), {
      cause,
    });
    this.name = 'FetchException';
  }

  static cancelled(ticker: string): FetchException {
    return new FetchException(ticker, 0, undefined, true);
  }

  private static describe(
    ticker: string,
    attempts: number,
    cause: unknown,
    cancelled: boolean,
  ): string {
    const attemptsStr = `${attempts} attempt${attempts === 1 ? '' : 's'}`;
    if (cancelled) {
      return `Fetch for ${ticker} cancelled after ${attemptsStr}`;
    }
    const reason = cause instanceof Error ? cause.message : String(cause);
    return `Failed to fetch ${ticker} after ${attemptsStr}: ${reason}`;
  }
}
