import { Module } from '@nestjs/common';

import { PricesModule } from '../prices';
import { SheetsModule } from '../sheets';
import { SchedulerService } from './scheduler.service';
import { UpdateCycleService } from './update-cycle.service';

@Module({
  imports: [PricesModule, SheetsModule],
  providers: [UpdateCycleService, SchedulerService],
  exports: [SchedulerService],
})
export class SchedulerModule {}
