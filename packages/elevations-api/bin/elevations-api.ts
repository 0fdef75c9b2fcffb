#!/usr/bin/env tsx
/**
 * Elevations API CLI Entry Point
 *
 * @module elevations-api-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { initDbCommand, serveCommand } from '../src/cli/commands.js';
import { logger } from '../src/core/utils/logger.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
} as const;

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const program = new Command();

program
  .name('elevations-api')
  .description('Serve H3 cell elevations and trigger backfill for unknown cells')
  .version(getVersion());

program
  .command('serve')
  .description('Start the HTTP API')
  .option('-p, --port <port>', 'port to listen on', parsePort)
  .option('-H, --host <host>', 'interface to bind')
  .option('--db <path>', 'SQLite elevation database')
  .option('--populator-url <url>', 'endpoint that backfills missing cells')
  .action(async (options: { port?: number; host?: string; db?: string; populatorUrl?: string }) => {
    const api = await serveCommand(options).catch((error: unknown) => {
      logger.error('Failed to start server', { error: errorMessage(error) });
      return process.exit(EXIT_CODES.CONFIG_ERROR);
    });

    const shutdown = (signal: string): void => {
      logger.info('Shutting down', { signal });
      api
        .stop()
        .then(() => process.exit(EXIT_CODES.SUCCESS))
        .catch((error: unknown) => {
          logger.error('Shutdown failed', { error: errorMessage(error) });
          process.exit(EXIT_CODES.ERRORS);
        });
    };

    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  });

program
  .command('init-db')
  .description('Create the elevations table, optionally seeding it')
  .requiredOption('--db <path>', 'SQLite elevation database')
  .option('--seed <file>', 'JSON object of {"<cell id>": <elevation>} to load')
  .action(async (options: { db: string; seed?: string }) => {
    try {
      const result = await initDbCommand(options);
      console.log(`Initialized ${result.databasePath} (${result.seeded} cells seeded)`);
    } catch (error) {
      logger.error('Failed to initialize database', { error: errorMessage(error) });
      process.exit(EXIT_CODES.ERRORS);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('Command failed', { error: errorMessage(error) });
  process.exit(EXIT_CODES.ERRORS);
});
