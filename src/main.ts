#!/usr/bin/env node
import 'reflect-metadata';
import { ConsoleLogger, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { CliCommand, parseCliArgs, USAGE } from './cli/cli-args';
import { TrimCommand } from './cli/trim.command';
import { resolveLogLevels } from './config/log-levels';
import { CliUsageError, errorMessage } from './errors';

async function bootstrap(argv: string[]): Promise<number> {
  const logger = new Logger('ClipTrimmer');

  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      logger.error(`Error: ${error.message}`);
      process.stderr.write(`${USAGE}\n`);
      return 1;
    }
    throw error;
  }

  // Nest's own start-up lines are noise for a CLI; only problems surface until the context is ready
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn'],
  });
  app.useLogger(new ConsoleLogger('ClipTrimmer', { logLevels: resolveLogLevels(process.env.LOG_LEVEL) }));

  try {
    return await app.get(TrimCommand).execute(command);
  } finally {
    await app.close();
  }
}

bootstrap(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    new Logger('ClipTrimmer').error(`Unhandled error: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
