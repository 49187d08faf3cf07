/**
 * CLI configuration loading
 *
 * Loads configuration from .env files, searching from the current directory
 * up to the filesystem root, then applies the process environment on top.
 */

import type { Environment as LogEnvironment } from '@tessera/logger';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

export interface TesseraConfig {
  casesDir: string;
  undefinedBehavior: 'lenient' | 'strict';
  logEnvironment: LogEnvironment;
  autoescape?: boolean;
}

/**
 * Raised for configuration values that fail validation
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const configSchema = z.object({
  TESSERA_CASES_DIR: z.string().min(1).default('./cases'),
  TESSERA_UNDEFINED: z.enum(['lenient', 'strict']).default('lenient'),
  TESSERA_LOG_LEVEL_ENV: z.enum(['test', 'development', 'production']).default('production'),
  TESSERA_AUTOESCAPE: z.enum(['true', 'false']).optional(),
});

const CONFIG_KEYS = Object.keys(configSchema.shape);

/**
 * Parse a .env file into a key-value object
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    // Remove surrounding quotes if present
    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }

    result[key] = value;
  }

  return result;
}

/**
 * Find the nearest .env file, searching from startDir up to root
 */
function findEnvFile(startDir: string): { path: string; values: Record<string, string> } | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const envPath = path.join(currentDir, '.env');

    if (fs.existsSync(envPath)) {
      return { path: envPath, values: parseEnvFile(fs.readFileSync(envPath, 'utf-8')) };
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Load tessera configuration from environment and .env files
 *
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env file (searched from cwd upward)
 *
 * A relative TESSERA_CASES_DIR is resolved against the directory of the .env
 * file that set it, or against cwd.
 */
export function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): TesseraConfig {
  const envFile = findEnvFile(cwd);
  const raw: Record<string, string> = {};
  let casesBase = cwd;

  for (const key of CONFIG_KEYS) {
    const fromFile = envFile?.values[key];
    if (fromFile !== undefined) {
      raw[key] = fromFile;
      if (key === 'TESSERA_CASES_DIR' && envFile) {
        casesBase = path.dirname(envFile.path);
      }
    }
    const fromProcess = env[key];
    if (fromProcess !== undefined && fromProcess !== '') {
      raw[key] = fromProcess;
      if (key === 'TESSERA_CASES_DIR') {
        casesBase = cwd;
      }
    }
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }

  const values = parsed.data;
  return {
    casesDir: path.resolve(casesBase, values.TESSERA_CASES_DIR),
    undefinedBehavior: values.TESSERA_UNDEFINED,
    logEnvironment: values.TESSERA_LOG_LEVEL_ENV,
    autoescape: values.TESSERA_AUTOESCAPE === undefined ? undefined : values.TESSERA_AUTOESCAPE === 'true',
  };
}
