import { SourceException } from './source.exception';

export class InvalidPriceException extends SourceException {
  constructor(
    public readonly subject: string,
    public readonly value: unknown,
    sourceName?: string,
  ) {
    const sourceStr = sourceName ? ` from ${sourceName}` : '';
    super(
      `Invalid price ${String(value)} for ${subject}${sourceStr}: expected a positive finite number`,
      'InvalidPriceException',
    );
  }
}
