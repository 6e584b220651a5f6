import { SourceException } from './source.exception';

export class FeatureNotImplementedException extends SourceException {
  constructor(feature: string, sourceName: string) {
    super(
      `Source ${sourceName} does not implement ${feature}`,
      'FeatureNotImplementedException',
    );
  }
}
