import { Injectable } from '@nestjs/common';

import { sleep } from '../utils/sleep.util';

/**
 * Source of time and interruptible waits for the scheduling code.
 */
@Injectable()
export class ClockService {
  now(): Date {
    return new Date();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    return sleep(ms, signal);
  }
}
