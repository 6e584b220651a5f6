import { Type } from '@nestjs/common';

import { FrankfurterAdapter } from './adapters/frankfurter';
import { YahooFinanceAdapter } from './adapters/yahoo-finance';
import { SourceAdapter } from './source-adapter.interface';
import { SourceName } from './source-name.enum';

export const SOURCE_ADAPTERS = Symbol('SOURCE_ADAPTERS');

export const SOURCES_MAP: Record<SourceName, Type<SourceAdapter>> = {
  [SourceName.YAHOO_FINANCE]: YahooFinanceAdapter,
  [SourceName.FRANKFURTER]: FrankfurterAdapter,
};
