#!/usr/bin/env node
import 'reflect-metadata';

import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Logger as PinoLogger } from 'nestjs-pino';

import { AppModule } from './app.module';
import { ApplicationRunner } from './app.runner';
import { EXIT_FAILURE, resolveCliOptions } from './cli';

async function bootstrap(argv: string[]): Promise<number> {
  const resolution = resolveCliOptions(argv);
  if (resolution.action === 'exit') {
    return resolution.exitCode;
  }
  const cliOptions = resolution.options;

  const app = await NestFactory.create(AppModule.register(cliOptions), {
    bufferLogs: true,
    abortOnError: false,
  });
  app.useLogger(app.get(PinoLogger));
  app.enableShutdownHooks();
  await app.init();

  try {
    const exitCode = await app.get(ApplicationRunner).run(cliOptions);
    if (cliOptions.once) {
      await app.close();
    }
    return exitCode;
  } catch (error) {
    await app.close();
    throw error;
  }
}

process.on('unhandledRejection', (reason, promise) => {
  const logger = new Logger('UnhandledRejection');
  logger.error(
    { err: reason, promise },
    'Unhandled promise rejection detected',
  );
});

process.on('uncaughtException', (error) => {
  const logger = new Logger('UncaughtException');
  logger.error({ err: error }, 'Uncaught exception detected');
});

bootstrap(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    new Logger('Bootstrap').error({ err: error }, 'Failed to start application');
    process.exit(EXIT_FAILURE);
  });
