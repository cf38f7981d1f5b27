#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ExitCode } from './cli/exit-codes';
import { DEFAULT_LOG_LEVELS, SmartplugCommand } from './cli/smartplug.command';

const logger = new Logger('Bootstrap');

async function bootstrap(): Promise<ExitCode> {
  let app: INestApplicationContext;
  try {
    // the environment is validated while the module is evaluated
    const { AppModule } = await import('./app.module');
    app = await NestFactory.createApplicationContext(AppModule, {
      logger: DEFAULT_LOG_LEVELS,
      abortOnError: false,
    });
  } catch (error) {
    logger.error(
      `Configuration preflight failed: ${error instanceof Error ? error.message : String(error)}`,
    );
    return ExitCode.CONFIGURATION_INVALID;
  }

  try {
    return await app.get(SmartplugCommand).execute(process.argv.slice(2));
  } finally {
    await app.close();
  }
}

bootstrap().then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    logger.error(
      error instanceof Error ? (error.stack ?? error.message) : String(error),
    );
    process.exitCode = ExitCode.CONFIGURATION_INVALID;
  },
);
