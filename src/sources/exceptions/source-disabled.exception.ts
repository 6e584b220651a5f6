import { SourceException } from './source.exception';

export class SourceDisabledException extends SourceException {
  constructor(readonly sourceName: string) {
    super(
      `Price source "${sourceName}" is turned off (sources.${sourceName}.enabled)`,
      'SourceDisabledException',
    );
  }
}
