import chalk from 'chalk';
import type { Ora } from 'ora';
import { loadConfig, type Config } from '../config.js';
import { CatalogError, RequestValidationError, UnsupportedPlatformError, UnsupportedVoiceError } from '../errors.js';
import { loadCatalog } from '../modules/catalog/loader.js';
import type { ContentCatalog } from '../modules/catalog/schema.js';
import { createLogger } from './logger.js';

export interface CommandContext {
  config: Config;
  catalog: ContentCatalog;
}

/**
 * Config, logger and catalog for a command run.
 */
export function loadCommandContext(overrides: Partial<Config> = {}): CommandContext {
  const config = loadConfig(overrides);
  createLogger(config.logLevel);
  return { config, catalog: loadCatalog(config.dataDir) };
}

/**
 * Print a failure in red and mark the process as failed. Errors the user
 * can fix print just their message.
 */
export function reportFailure(err: unknown, spinner?: Ora): void {
  const known =
    err instanceof UnsupportedPlatformError ||
    err instanceof UnsupportedVoiceError ||
    err instanceof RequestValidationError ||
    err instanceof CatalogError;
  const message = err instanceof Error ? err.message : String(err);

  if (spinner?.isSpinning) spinner.fail(chalk.red(message));
  else console.error(chalk.red(message));

  if (!known && err instanceof Error && err.stack) {
    console.error(chalk.dim(err.stack));
  }
  process.exitCode = 1;
}

export function parseCount(value: string, name: string): number {
  const n = parseInt(value, 10);
  if (isNaN(n) || n < 1) throw new RequestValidationError([`${name} must be a positive integer`]);
  return n;
}
