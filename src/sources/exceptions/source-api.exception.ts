import { SourceException } from './source.exception';

export class SourceApiException extends SourceException {
  readonly statusCode?: number;

  constructor(sourceName: string, originalError: Error, statusCode?: number) {
    super(
      `API error from ${sourceName}: ${originalError.message}`,
      'SourceApiException',
      { cause: originalError },
    );
    this.statusCode = statusCode;
  }

  get isRateLimited(): boolean {
    return this.statusCode === 429;
  }
}
