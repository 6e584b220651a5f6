export { SchedulerModule } from './scheduler.module';
export { SchedulerService } from './scheduler.service';
export { UpdateCycleService } from './update-cycle.service';
export { MarketCalendar, MAX_LOOKAHEAD_DAYS } from './market-calendar';
export { SchedulerState } from './scheduler-state.enum';
export type { CycleResult, MarketStatus } from './cycle-result.interface';
