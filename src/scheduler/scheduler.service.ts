import {
  BeforeApplicationShutdown,
  Injectable,
  Logger,
} from '@nestjs/common';

import { ClockService, formatSheetTimestamp } from '../common';
import { AppConfigService } from '../config';
import { CycleResult, MarketStatus } from './cycle-result.interface';
import { MarketCalendar } from './market-calendar';
import { SchedulerState } from './scheduler-state.enum';
import { UpdateCycleService } from './update-cycle.service';

const DAY_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class SchedulerService implements BeforeApplicationShutdown {
  private readonly logger = new Logger(SchedulerService.name);
  private readonly calendar: MarketCalendar;
  private readonly errorBackoffMs: number;
  private readonly abortController = new AbortController();
  private state = SchedulerState.IDLE;
  private inFlight?: Promise<unknown>;
  private lastCycle: CycleResult | null = null;
  private nextUpdateAt: Date | null = null;

  constructor(
    private readonly updateCycle: UpdateCycleService,
    private readonly clock: ClockService,
    configService: AppConfigService,
  ) {
    this.calendar = new MarketCalendar(
      configService.get('market'),
      configService.get('schedule'),
    );
    this.errorBackoffMs = configService.get('schedule.errorBackoffMs');
  }

  getState(): SchedulerState {
    return this.state;
  }

  getLastCycle(): CycleResult | null {
    return this.lastCycle;
  }

  getMarketStatus(now: Date = this.clock.now()): MarketStatus {
    const open = this.calendar.isMarketOpen(now);
    return {
      open,
      timezone: this.calendar.timezone,
      localTime: formatSheetTimestamp(now, this.calendar.timezone),
      nextOpen: this.calendar.nextMarketOpen(now),
      nextUpdate:
        this.nextUpdateAt ??
        (open
          ? new Date(now.getTime() + this.calendar.delayUntilNextUpdate(now))
          : null),
      lastUpdate: this.lastCycle?.success ? this.lastCycle.finishedAt : null,
    };
  }

  /**
   * Starts the continuous loop bound to the service's own shutdown signal.
   */
  start(): Promise<void> {
    const running = this.run(this.abortController.signal);
    this.inFlight = running;
    return running;
  }

  /**
   * Polls during market hours until `signal` aborts. Sleeps end early on
   * abort; a cycle already running is allowed to finish its write.
   */
  async run(signal: AbortSignal): Promise<void> {
    this.logger.log(
      {
        timezone: this.calendar.timezone,
        errorBackoffMs: this.errorBackoffMs,
      },
      'Scheduler started',
    );

    while (!signal.aborted) {
      try {
        await this.tick(signal);
      } catch (error) {
        this.logger.error(
          { err: error, backoffMs: this.errorBackoffMs },
          'Unexpected error in scheduling loop',
        );
        await this.clock.sleep(this.errorBackoffMs, signal);
      }
    }

    this.transition(SchedulerState.SHUTTING_DOWN);
    this.logger.log('Scheduler stopped');
  }

  /**
   * Runs exactly one cycle regardless of market hours.
   */
  async runOnce(
    signal: AbortSignal = this.abortController.signal,
  ): Promise<CycleResult> {
    this.transition(SchedulerState.ACTIVE_POLLING);
    const cycle = this.executeCycle(signal);
    this.inFlight = cycle;

    try {
      return await cycle;
    } finally {
      this.transition(
        signal.aborted ? SchedulerState.SHUTTING_DOWN : SchedulerState.IDLE,
      );
    }
  }

  async beforeApplicationShutdown(signal?: string): Promise<void> {
    this.logger.log({ signal }, 'Shutdown requested');
    this.abortController.abort();

    if (this.inFlight) {
      try {
        await this.inFlight;
      } catch (error) {
        this.logger.error({ err: error }, 'Work in flight failed during shutdown');
      }
    }
  }

  private async tick(signal: AbortSignal): Promise<void> {
    const now = this.clock.now();

    if (!this.calendar.isMarketOpen(now)) {
      this.transition(SchedulerState.WAITING_FOR_MARKET_OPEN);
      const nextOpen = this.calendar.nextMarketOpen(now);
      const sleepMs = nextOpen ? nextOpen.getTime() - now.getTime() : DAY_MS;
      this.nextUpdateAt = nextOpen;

      if (nextOpen) {
        this.logger.log(
          { nextOpen: nextOpen.toISOString(), sleepMs },
          'Market closed, waiting for next open',
        );
      } else {
        this.logger.warn(
          { sleepMs },
          'No trading session found in the lookahead window, checking again later',
        );
      }

      await this.clock.sleep(sleepMs, signal);
      return;
    }

    this.transition(SchedulerState.ACTIVE_POLLING);
    await this.executeCycle(signal);
    if (signal.aborted) {
      return;
    }

    const afterCycle = this.clock.now();
    const sleepMs = this.calendar.delayUntilNextUpdate(afterCycle);
    this.nextUpdateAt = new Date(afterCycle.getTime() + sleepMs);

    this.transition(SchedulerState.SLEEPING_BETWEEN_UPDATES);
    this.logger.log(
      { nextUpdate: this.nextUpdateAt.toISOString(), sleepMs },
      'Sleeping until next update',
    );
    await this.clock.sleep(sleepMs, signal);
  }

  private async executeCycle(signal: AbortSignal): Promise<CycleResult> {
    const result = await this.updateCycle.runCycle(signal);
    this.lastCycle = result;
    return result;
  }

  private transition(next: SchedulerState): void {
    if (this.state === next) {
      return;
    }
    this.logger.debug({ from: this.state, to: next }, 'State transition');
    this.state = next;
  }
}
