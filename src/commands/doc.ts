import { Command } from 'commander';
import chalk from 'chalk';
import { exitCodeFor, formatError } from '../errors/index.js';
import { docFromNsForm } from '../namespace/index.js';
import { nsFormForFile } from '../scanners/index.js';

export function createDocCommand(): Command {
  return new Command('doc')
    .description('Print the docstring of the namespace declared in a file')
    .argument('<path>', 'A .clj or .cljc file')
    .action((path: string) => {
      try {
        const nsForm = nsFormForFile(path, { ignoreUnreadable: false });
        if (!nsForm) {
          console.error(chalk.yellow(`No namespace form found in ${path}`));
          process.exit(1);
        }

        const doc = docFromNsForm(nsForm);
        if (doc === undefined) {
          console.error(chalk.dim(`${nsForm.name} has no docstring`));
          return;
        }
        console.log(doc);
      } catch (error) {
        if (error instanceof Error) {
          console.error(chalk.red(formatError(error)));
          process.exit(exitCodeFor(error));
        }
        throw error;
      }
    });
}
