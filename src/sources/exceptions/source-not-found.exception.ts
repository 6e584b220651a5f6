import { SourceException } from './source.exception';

export class SourceNotFoundException extends SourceException {
  constructor(readonly sourceName: string) {
    super(
      `No adapter is registered for price source "${sourceName}"`,
      'SourceNotFoundException',
    );
  }
}
