import { Provider } from '@nestjs/common';

import { SourceAdapter } from './source-adapter.interface';
import { SOURCE_ADAPTERS, SOURCES_MAP } from './sources.constants';

const ADAPTER_CLASSES = Object.values(SOURCES_MAP);

export const SOURCES_PROVIDERS: Provider[] = [
  ...ADAPTER_CLASSES,
  {
    provide: SOURCE_ADAPTERS,
    useFactory: (...adapters: SourceAdapter[]): SourceAdapter[] => adapters,
    inject: ADAPTER_CLASSES,
  },
];
