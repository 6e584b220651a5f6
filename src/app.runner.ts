import { Injectable, Logger } from '@nestjs/common';

import { CliOptions, EXIT_FAILURE, EXIT_OK } from './cli';
import { AppConfigService, ConfigException } from './config';
import { SchedulerService } from './scheduler';
import {
  SheetClientService,
  SheetReadException,
  SpreadsheetMetadata,
} from './sheets';

@Injectable()
export class ApplicationRunner {
  private readonly logger = new Logger(ApplicationRunner.name);

  constructor(
    private readonly sheetClient: SheetClientService,
    private readonly scheduler: SchedulerService,
    private readonly configService: AppConfigService,
  ) {}

  /**
   * Runs the chosen mode and returns the process exit code. Configuration
   * errors propagate; a spreadsheet that cannot be reached yet does not stop
   * the scheduler.
   */
  async run(options: CliOptions): Promise<number> {
    await this.connect();
    this.logMarketStatus();

    if (options.once) {
      const result = await this.scheduler.runOnce();
      return result.success ? EXIT_OK : EXIT_FAILURE;
    }

    await this.scheduler.start();
    return EXIT_OK;
  }

  private async connect(): Promise<void> {
    const worksheet = this.configService.get('sheet.worksheet');

    let metadata: SpreadsheetMetadata;
    try {
      metadata = await this.sheetClient.describe();
    } catch (error) {
      if (error instanceof SheetReadException) {
        this.logger.warn(
          { err: error },
          'Spreadsheet metadata unavailable, continuing without the worksheet check',
        );
        return;
      }
      throw error;
    }

    if (worksheet && !metadata.worksheets.includes(worksheet)) {
      throw new ConfigException(
        `Worksheet "${worksheet}" not found in "${metadata.title}". Available: ${metadata.worksheets.join(', ')}`,
      );
    }
    this.logger.log(
      { worksheets: metadata.worksheets },
      `Connected to spreadsheet "${metadata.title}"`,
    );
  }

  private logMarketStatus(): void {
    const status = this.scheduler.getMarketStatus();
    this.logger.log(
      {
        timezone: status.timezone,
        localTime: status.localTime,
        nextOpen: status.nextOpen?.toISOString() ?? null,
      },
      status.open ? 'Market is open' : 'Market is closed',
    );
  }
}
