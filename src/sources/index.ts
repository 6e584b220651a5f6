export { SourcesModule } from './sources.module';
export { SourcesManagerService } from './sources-manager.service';
export type { SourceCapability } from './sources-manager.service';
export { SourceName, isSourceName } from './source-name.enum';
export { SOURCE_ADAPTERS, SOURCES_MAP } from './sources.constants';
export { formatPairLabel, isUsablePrice } from './source-adapter.helpers';
export * from './exceptions';

export type {
  SourceAdapter,
  SourceAdapterConfig,
  Quote,
  Rate,
  Pair,
} from './source-adapter.interface';
