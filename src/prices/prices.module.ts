import { Module } from '@nestjs/common';

import { SourcesModule } from '../sources';
import { PriceFetcherService } from './price-fetcher.service';

@Module({
  imports: [SourcesModule],
  providers: [PriceFetcherService],
  exports: [PriceFetcherService],
})
export class PricesModule {}
