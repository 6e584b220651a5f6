import { Module } from '@nestjs/common';

import { HttpClientModule } from '../common';
import { SourcesManagerService } from './sources-manager.service';
import { SOURCES_PROVIDERS } from './sources.providers';

@Module({
  imports: [HttpClientModule],
  providers: [SourcesManagerService, ...SOURCES_PROVIDERS],
  exports: [SourcesManagerService],
})
export class SourcesModule {}
