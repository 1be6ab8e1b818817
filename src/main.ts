#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import {
  DateVarianceCommand,
  EXIT_FAILURE,
} from './modules/date-variance/infrastructure/date-variance.command';

/**
 * Boot a standalone context (no HTTP server), run the command once and
 * close the context again.
 */
async function bootstrap(args: string[]): Promise<number> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    // stdout carries only the result; Nest writes errors to stderr
    logger: ['error', 'warn'],
    abortOnError: false,
  });

  try {
    return await app.get(DateVarianceCommand).run(args);
  } finally {
    await app.close();
  }
}

(async () => {
  process.exitCode = await bootstrap(process.argv.slice(2));
})().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(
    `An unexpected error occurred: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exitCode = EXIT_FAILURE;
});
