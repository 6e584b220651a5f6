import { SourceException } from './source.exception';

export class PriceNotFoundException extends SourceException {
  constructor(
    public readonly subject: string,
    sourceName?: string,
  ) {
    const sourceStr = sourceName ? ` from ${sourceName}` : '';
    super(
      `No price found for ${subject}${sourceStr}`,
      'PriceNotFoundException',
    );
  }
}
