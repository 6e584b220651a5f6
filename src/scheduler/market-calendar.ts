import {
  addDays,
  formatLocalDate,
  fromZonedDateTime,
  isoWeekdayOf,
  LocalDate,
  toZonedDateTime,
} from '../common';
import { MarketConfig, ScheduleConfig } from '../config';

export const MAX_LOOKAHEAD_DAYS = 14;

const MINUTE_MS = 60_000;

function parseWallClock(value: string): { hour: number; minute: number } {
  const [hour, minute] = value.split(':').map(Number);
  return { hour: hour ?? 0, minute: minute ?? 0 };
}

/**
 * Trading-hours arithmetic in the exchange's time zone. The session is the
 * half-open window [openTime, closeTime) on trading days that are not
 * holidays.
 */
export class MarketCalendar {
  private readonly open: { hour: number; minute: number };
  private readonly openMinute: number;
  private readonly closeMinute: number;
  private readonly tradingDays: ReadonlySet<number>;
  private readonly holidays: ReadonlySet<string>;
  private readonly intervalMs: number;

  constructor(
    private readonly market: MarketConfig,
    private readonly schedule: Pick<
      ScheduleConfig,
      'intervalMinutes' | 'alignToInterval'
    >,
  ) {
    this.open = parseWallClock(market.openTime);
    const close = parseWallClock(market.closeTime);
    this.openMinute = this.open.hour * 60 + this.open.minute;
    this.closeMinute = close.hour * 60 + close.minute;
    this.tradingDays = new Set(market.tradingDays);
    this.holidays = new Set(market.holidays);
    this.intervalMs = schedule.intervalMinutes * MINUTE_MS;
  }

  get timezone(): string {
    return this.market.timezone;
  }

  isTradingDay(date: LocalDate): boolean {
    return (
      this.tradingDays.has(isoWeekdayOf(date)) &&
      !this.holidays.has(formatLocalDate(date))
    );
  }

  isMarketOpen(now: Date): boolean {
    const local = toZonedDateTime(now, this.timezone);
    if (!this.isTradingDay(local)) {
      return false;
    }
    const minute = local.hour * 60 + local.minute;
    return minute >= this.openMinute && minute < this.closeMinute;
  }

  /**
   * Earliest session open strictly after `now`, or null when none falls in
   * the next {@link MAX_LOOKAHEAD_DAYS} days.
   */
  nextMarketOpen(now: Date): Date | null {
    const today = toZonedDateTime(now, this.timezone);

    for (let offset = 0; offset <= MAX_LOOKAHEAD_DAYS; offset++) {
      const day = addDays(today, offset);
      if (!this.isTradingDay(day)) {
        continue;
      }

      const openAt = fromZonedDateTime(
        { ...day, ...this.open, second: 0 },
        this.timezone,
      );
      if (openAt.getTime() > now.getTime()) {
        return openAt;
      }
    }

    return null;
  }

  /**
   * Milliseconds until the next update. With alignment the wake-up lands on
   * the next multiple of the interval counted from local midnight.
   */
  delayUntilNextUpdate(now: Date): number {
    if (!this.schedule.alignToInterval) {
      return this.intervalMs;
    }

    const local = toZonedDateTime(now, this.timezone);
    const intoDayMs =
      ((local.hour * 60 + local.minute) * 60 + local.second) * 1000 +
      now.getUTCMilliseconds();
    const remainder = intoDayMs % this.intervalMs;

    return remainder === 0 ? this.intervalMs : this.intervalMs - remainder;
  }
}
