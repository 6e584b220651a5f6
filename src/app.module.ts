import { DynamicModule, Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';

import { ApplicationRunner } from './app.runner';
import { CliOptions } from './cli';
import { ClockModule } from './common';
import { AppConfigModule, AppConfigService } from './config';
import { SchedulerModule } from './scheduler';
import { SheetsModule } from './sheets';

@Module({})
export class AppModule {
  static register(cliOptions: CliOptions): DynamicModule {
    return {
      module: AppModule,
      imports: [
        AppConfigModule,
        ClockModule,
        LoggerModule.forRootAsync({
          inject: [AppConfigService],
          useFactory: (configService: AppConfigService) => {
            const { level, isPrettyEnabled } = configService.get('logger');

            return {
              pinoHttp: {
                level: cliOptions.debug ? 'debug' : level,
                customLevels: {
                  verbose: 10,
                },
                useOnlyCustomLevels: false,
                ...(isPrettyEnabled && { transport: { target: 'pino-pretty' } }),
              },
            };
          },
        }),
        SheetsModule,
        SchedulerModule,
      ],
      providers: [ApplicationRunner],
    };
  }
}
