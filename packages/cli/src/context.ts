/**
 * Per-command setup shared by all commands: configuration, the cases
 * directory and the logger
 */

import { createFileSink, createLogger, type Logger } from '@tessera/logger';
import * as path from 'node:path';
import { loadConfig, type TesseraConfig } from './config';

export interface CommonOptions {
  cases?: string;
  logFile?: string;
  /** Set to false by --no-color */
  color?: boolean;
}

export interface CommandContext {
  config: TesseraConfig;
  casesDir: string;
  logger: Logger;
}

export function createCommandContext(options: CommonOptions, cwd: string = process.cwd()): CommandContext {
  const config = loadConfig(cwd);
  const logger = createLogger({
    consoleOnly: !options.logFile,
    sink: options.logFile ? createFileSink(path.resolve(cwd, options.logFile)) : undefined,
    // stdout carries rendered output
    console: 'stderr',
    environment: config.logEnvironment,
  });

  return {
    config,
    casesDir: options.cases ? path.resolve(cwd, options.cases) : config.casesDir,
    logger,
  };
}
