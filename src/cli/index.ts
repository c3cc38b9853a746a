import { Command } from 'commander';
import { checkCommand } from './commands/check.js';
import { configureCommand } from './commands/configure.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name('lms-deadline-watch')
    .description('Watch a university LMS for assignments due soon')
    .version('1.0.0');

  program.addCommand(checkCommand);
  program.addCommand(configureCommand);

  return program;
}
