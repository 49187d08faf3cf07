/**
 * tessera list command
 */

import { Command } from 'commander';
import { listCases } from '../cases/loader';
import { ConfigError } from '../config';
import { createCommandContext, type CommonOptions } from '../context';

export async function listCaseIds(options: CommonOptions, cwd?: string): Promise<number> {
  try {
    const { casesDir } = createCommandContext(options, cwd);
    const ids = await listCases(casesDir);

    if (ids.length === 0) {
      console.log(`No cases found in ${casesDir}`);
      return 0;
    }
    for (const id of ids) {
      console.log(id);
    }
    return 0;
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      return 2;
    }
    throw error;
  }
}

export const listCommand = new Command('list')
  .description('List the cases under the cases root')
  .option('--cases <dir>', 'Cases root directory (or set TESSERA_CASES_DIR)')
  .action(async (options: CommonOptions) => {
    try {
      process.exit(await listCaseIds(options));
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(2);
    }
  });
