export { SourceException } from './source.exception';
export { SourceApiException } from './source-api.exception';
export { PriceNotFoundException } from './price-not-found.exception';
export { InvalidPriceException } from './invalid-price.exception';
export { SourceDisabledException } from './source-disabled.exception';
export { SourceNotFoundException } from './source-not-found.exception';
export { SourceUnauthorizedException } from './source-unauthorized.exception';
export { SourceUnsupportedException } from './source-unsupported.exception';
export { FeatureNotImplementedException } from './feature-not-implemented.exception';
