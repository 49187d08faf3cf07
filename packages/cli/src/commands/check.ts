/**
 * tessera check command
 *
 * Renders cases and compares each with its expected.txt.
 */

import { Command } from 'commander';
import { listCases } from '../cases/loader';
import { ConfigError } from '../config';
import { createCommandContext, type CommonOptions } from '../context';
import { getExitCode, reportResults, runCases, type ReporterOptions } from '../runner/index';

export interface CheckOptions extends CommonOptions {
  format?: string;
  strict?: boolean;
  failFast?: boolean;
  verbose?: boolean;
}

function isFormat(value: string): value is ReporterOptions['format'] {
  return value === 'pretty' || value === 'json';
}

/**
 * Check the given cases, or every case when none are named. Returns the exit code.
 */
export async function checkCases(caseIds: string[], options: CheckOptions, cwd?: string): Promise<number> {
  const format = options.format ?? 'pretty';
  if (!isFormat(format)) {
    console.error(`Error: Unknown format '${format}', expected pretty or json`);
    return 2;
  }

  try {
    const { config, casesDir, logger } = createCommandContext(options, cwd);
    const ids = caseIds.length > 0 ? caseIds : await listCases(casesDir);

    if (ids.length === 0) {
      console.log(`No cases found in ${casesDir}`);
      return 0;
    }

    const results = await runCases(casesDir, ids, {
      undefinedBehavior: options.strict ? 'strict' : config.undefinedBehavior,
      autoescape: config.autoescape,
      failFast: options.failFast,
      logger,
    });
    await logger.flush();

    reportResults(results, {
      format,
      verbose: options.verbose,
      noColor: options.color === false,
    });
    return getExitCode(results);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      return 2;
    }
    throw error;
  }
}

export const checkCommand = new Command('check')
  .description('Render cases and compare them with their expected output')
  .argument('[cases...]', 'Case ids to check (default: all)')
  .option('--cases <dir>', 'Cases root directory (or set TESSERA_CASES_DIR)')
  .option('--strict', 'Raise on undefined variables')
  .option('--fail-fast', 'Stop on first failure')
  .option('--format <type>', 'Output format: pretty, json', 'pretty')
  .option('--log-file <path>', 'Append log entries to a file')
  .option('--no-color', 'Disable colored output')
  .option('-v, --verbose', 'Verbose output')
  .action(async (caseIds: string[], options: CheckOptions) => {
    try {
      process.exit(await checkCases(caseIds, options));
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(2);
    }
  });
