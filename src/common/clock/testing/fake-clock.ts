import { ClockService } from '../clock.service';

/**
 * Clock whose sleeps complete at once and move time forward by the
 * requested amount.
 */
export class FakeClock extends ClockService {
  readonly sleeps: number[] = [];
  private current: number;

  constructor(
    start: Date | string,
    private readonly onSleep?: (ms: number, clock: FakeClock) => void,
  ) {
    super();
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      return false;
    }
    this.sleeps.push(ms);
    this.current += ms;
    this.onSleep?.(ms, this);
    await Promise.resolve();
    return !signal?.aborted;
  }
}
