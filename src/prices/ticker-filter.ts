export interface TickerFilterOptions {
  sentinels: readonly string[];
  skipContaining: readonly string[];
}

export type TickerPredicate = (label: string) => boolean;

/**
 * Builds the predicate deciding whether a header label is a ticker worth
 * fetching. Blank labels, exact sentinel matches and labels containing any
 * skip fragment are rejected.
 */
export function createTickerFilter(
  options: TickerFilterOptions,
): TickerPredicate {
  const sentinels = new Set(options.sentinels.map((value) => value.trim()));
  const fragments = options.skipContaining.filter(
    (fragment) => fragment.length > 0,
  );

  return (label: string): boolean => {
    const ticker = label.trim();
    if (!ticker || sentinels.has(ticker)) {
      return false;
    }
    return !fragments.some((fragment) => ticker.includes(fragment));
  };
}
