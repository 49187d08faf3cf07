/**
 * tessera run command
 */

import { Command } from 'commander';
import { CaseLoadError, loadCase } from '../cases/loader';
import { ConfigError } from '../config';
import { createCommandContext, type CommonOptions } from '../context';
import { colors, renderCase } from '../runner/index';

export interface RunOptions extends CommonOptions {
  strict?: boolean;
}

/**
 * Render one case to stdout. Returns the exit code.
 */
export async function runCase(caseId: string, options: RunOptions, cwd?: string): Promise<number> {
  const c = colors(options.color === false);

  try {
    const { config, casesDir, logger } = createCommandContext(options, cwd);
    const definition = await loadCase(casesDir, caseId);
    const result = renderCase(definition, {
      undefinedBehavior: options.strict ? 'strict' : config.undefinedBehavior,
      autoescape: config.autoescape,
      logger,
    });
    await logger.flush();

    if (result.status === 'error') {
      console.error(c.red(`Error: ${result.error?.message ?? 'unknown error'}`));
      return 1;
    }
    console.log(result.output ?? '');
    return 0;
  } catch (error) {
    if (error instanceof ConfigError || error instanceof CaseLoadError) {
      console.error(c.red(`Error: ${error.message}`));
      return 2;
    }
    throw error;
  }
}

export const runCommand = new Command('run')
  .description('Render a case and print the output')
  .argument('<case>', 'Case id (directory name under the cases root)')
  .option('--cases <dir>', 'Cases root directory (or set TESSERA_CASES_DIR)')
  .option('--strict', 'Raise on undefined variables')
  .option('--log-file <path>', 'Append log entries to a file')
  .option('--no-color', 'Disable colored output')
  .action(async (caseId: string, options: RunOptions) => {
    try {
      process.exit(await runCase(caseId, options));
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(2);
    }
  });
