/**
 * Command tree of the capflow CLI
 */

import { Command } from 'commander';
import { registerCapabilitiesCommand } from './commands/capabilities.js';
import { registerRunCommand } from './commands/run.js';
import { registerValidateCommand } from './commands/validate.js';

export const CLI_VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('capflow')
    .description('Run flows of AI capabilities (speech recognition, chat, speech synthesis)')
    .version(CLI_VERSION, '-v, --version', 'Show version number')
    .helpOption('-h, --help', 'Show help');

  registerRunCommand(program);
  registerValidateCommand(program);
  registerCapabilitiesCommand(program);

  return program;
}
