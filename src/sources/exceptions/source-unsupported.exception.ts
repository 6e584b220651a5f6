import { SourceException } from './source.exception';

export class SourceUnsupportedException extends SourceException {
  constructor(
    readonly sourceName: string,
    readonly supportedSources: readonly string[],
  ) {
    super(
      `Unknown price source "${sourceName}". Expected one of: ${supportedSources.join(', ')}`,
      'SourceUnsupportedException',
    );
  }
}
