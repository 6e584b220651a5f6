import { ApplicationRunner } from './app.runner';
import { CliOptions, EXIT_FAILURE, EXIT_OK } from './cli';
import { FakeClock } from './common/clock/testing/fake-clock';
import { ConfigException } from './config';
import { CycleResult, SchedulerService } from './scheduler';
import { createTestUpdateCycle } from './scheduler/testing/update-cycle.testing';
import { SheetClientService } from './sheets';

const NOW = '2025-06-14T15:00:00Z';

const CONTINUOUS: CliOptions = { once: false, debug: false, help: false };
const ONCE: CliOptions = { once: true, debug: false, help: false };

const cycleResult = (success: boolean): CycleResult => ({
  success,
  tickers: 2,
  fetched: success ? 2 : 0,
  failed: success ? 0 : 2,
  cancelled: 0,
  exchangeRate: null,
  cellsWritten: success ? 3 : 0,
  startedAt: new Date(NOW),
  finishedAt: new Date(NOW),
});

const createRunner = (overrides: Record<string, unknown> = {}) => {
  const { cycle, gateway, configService } = createTestUpdateCycle({
    overrides,
  });
  const scheduler = new SchedulerService(
    cycle,
    new FakeClock(NOW),
    configService,
  );
  const runOnce = jest
    .spyOn(scheduler, 'runOnce')
    .mockResolvedValue(cycleResult(true));
  const start = jest.spyOn(scheduler, 'start').mockResolvedValue(undefined);
  const runner = new ApplicationRunner(
    new SheetClientService(gateway, configService),
    scheduler,
    configService,
  );
  return { runner, gateway, runOnce, start };
};

describe('ApplicationRunner', () => {
  test('single-shot mode exits 0 after a successful cycle', async () => {
    const { runner, runOnce, start } = createRunner();

    await expect(runner.run(ONCE)).resolves.toBe(EXIT_OK);
    expect(runOnce).toHaveBeenCalledTimes(1);
    expect(start).not.toHaveBeenCalled();
  });

  test('single-shot mode exits 1 when the cycle fails', async () => {
    const { runner, runOnce } = createRunner();
    runOnce.mockResolvedValue(cycleResult(false));

    await expect(runner.run(ONCE)).resolves.toBe(EXIT_FAILURE);
  });

  test('continuous mode runs the scheduler until it stops', async () => {
    const { runner, runOnce, start } = createRunner();

    await expect(runner.run(CONTINUOUS)).resolves.toBe(EXIT_OK);
    expect(start).toHaveBeenCalledTimes(1);
    expect(runOnce).not.toHaveBeenCalled();
  });

  test('keeps going when the spreadsheet cannot be reached at startup', async () => {
    const { runner, gateway, start } = createRunner({
      sheet: { worksheet: 'Portfolio' },
    });
    gateway.metadataError = new Error('socket hang up');

    await expect(runner.run(CONTINUOUS)).resolves.toBe(EXIT_OK);
    expect(start).toHaveBeenCalledTimes(1);
  });

  test('a failed metadata read does not fail a single-shot run', async () => {
    const { runner, gateway, runOnce } = createRunner();
    gateway.metadataError = new Error('503 Service Unavailable');

    await expect(runner.run(ONCE)).resolves.toBe(EXIT_OK);
    expect(runOnce).toHaveBeenCalledTimes(1);
  });

  test('a configured worksheet that does not exist is fatal', async () => {
    const { runner, start } = createRunner({
      sheet: { worksheet: 'Portfolio' },
    });

    await expect(runner.run(CONTINUOUS)).rejects.toThrow(ConfigException);
    await expect(runner.run(CONTINUOUS)).rejects.toThrow(
      'Worksheet "Portfolio" not found in "Test Portfolio". Available: Sheet1',
    );
    expect(start).not.toHaveBeenCalled();
  });
});
