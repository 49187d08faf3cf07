/**
 * tessera CLI - render template fixture cases
 */

import { Command } from 'commander';
import { checkCommand } from './commands/check';
import { listCommand } from './commands/list';
import { runCommand } from './commands/run';

const program = new Command();

program.name('tessera').description('Render and check template fixture cases').version('0.1.0');

// Register commands
program.addCommand(runCommand);
program.addCommand(listCommand);
program.addCommand(checkCommand);

// Parse arguments
await program.parseAsync();
