#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { CliCommand, parseCommand, USAGE, UsageError } from './cli/parse-command';
import { getErrorMessage } from './common/errors';
import { HealthService } from './health/health.service';
import { IngestionService } from './ingestion/ingestion.service';
import { SearchService } from './search/search.service';

function print(value: unknown) {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

async function run(app: INestApplicationContext, command: Exclude<CliCommand, { name: 'help' }>): Promise<number> {
  switch (command.name) {
    case 'ingest': {
      const outcomes = await app.get(IngestionService).ingestMany(command.paths);
      print(outcomes);
      return outcomes.every(outcome => outcome.ok) ? 0 : 1;
    }
    case 'health': {
      const report = await app.get(HealthService).report();
      print(report);
      return report.status === 'ok' ? 0 : 1;
    }
    case 'search':
      print(await app.get(SearchService).textSearch(command.query, command.limit));
      return 0;
    case 'similar':
      print(await app.get(SearchService).similarTo(command.query, command.limit));
      return 0;
  }
}

async function main(argv: string[]): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCommand(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      process.stderr.write(`${error.message}\n\n${USAGE}\n`);
      return 2;
    }
    throw error;
  }

  if (command.name === 'help') {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['log', 'warn', 'error'] });
  try {
    return await run(app, command);
  } finally {
    await app.close();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    Logger.error(getErrorMessage(error), 'Cli');
    process.exitCode = 1;
  });
