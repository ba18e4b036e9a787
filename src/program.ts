import { Command } from 'commander';
import { createListCommand } from './commands/list.js';
import { createFileCommand } from './commands/file.js';
import { createPathCommand } from './commands/path.js';
import { createDocCommand } from './commands/doc.js';
import { createInitCommand } from './commands/init.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('nsscan')
    .description('Find Clojure namespace declarations without loading any code')
    .version('0.1.0');

  program.addCommand(createInitCommand());
  program.addCommand(createListCommand());
  program.addCommand(createFileCommand());
  program.addCommand(createPathCommand());
  program.addCommand(createDocCommand());

  return program;
}
