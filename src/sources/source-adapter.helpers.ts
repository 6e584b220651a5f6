import { Pair } from './source-adapter.interface';

export function formatPairLabel(pair: Pair): string {
  return pair.map((code) => code.toUpperCase()).join('/');
}

/**
 * Label of what a source call was asked for: a ticker symbol or a currency pair.
 */
export function describeSubject(subject: unknown): string | undefined {
  if (typeof subject === 'string') {
    return subject;
  }
  if (
    Array.isArray(subject) &&
    subject.length === 2 &&
    subject.every((code) => typeof code === 'string')
  ) {
    return formatPairLabel([String(subject[0]), String(subject[1])]);
  }
  return undefined;
}

export function isUsablePrice(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}
