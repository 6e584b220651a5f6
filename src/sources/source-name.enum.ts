export enum SourceName {
  YAHOO_FINANCE = 'yahoofinance',
  FRANKFURTER = 'frankfurter',
}

const SOURCE_NAMES: readonly string[] = Object.values(SourceName);

export function isSourceName(value: string): value is SourceName {
  return SOURCE_NAMES.includes(value);
}
