import { SourceException } from './source.exception';
import { SourceName } from '../source-name.enum';

export class SourceUnauthorizedException extends SourceException {
  constructor(
    public readonly sourceName: SourceName,
    public readonly statusCode = 401,
  ) {
    super(
      `Source ${sourceName} refused the request with ${statusCode}. The endpoint may be blocking this client.`,
      SourceUnauthorizedException.name,
    );
  }
}
