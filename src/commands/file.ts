import { Command } from 'commander';
import chalk from 'chalk';
import { exitCodeFor, formatError } from '../errors/index.js';
import { NamespaceForm, namespaceFormToForm } from '../namespace/index.js';
import { printForm } from '../reader/index.js';
import { nsFormForFile, nsFormsForFile } from '../scanners/index.js';

interface FileOptions {
  all?: boolean;
  strict?: boolean;
  json?: boolean;
}

export function createFileCommand(): Command {
  return new Command('file')
    .description('Print the namespace forms declared in one source file')
    .argument('<path>', 'A .clj or .cljc file')
    .option('--all', 'Every namespace form, not just the first')
    .option('--strict', 'Fail if the file cannot be read or parsed')
    .option('--json', 'Output as JSON')
    .action((path: string, options: FileOptions) => {
      try {
        const scanOptions = { ignoreUnreadable: !options.strict };
        let forms: NamespaceForm[] | undefined;
        if (options.all) {
          forms = nsFormsForFile(path, scanOptions);
        } else {
          const first = nsFormForFile(path, scanOptions);
          forms = first ? [first] : undefined;
        }

        if (options.json) {
          console.log(JSON.stringify((forms ?? []).map(form => ({
            kind: form.kind,
            name: form.name,
            form: printForm(namespaceFormToForm(form)),
          })), null, 2));
          return;
        }

        if (!forms || forms.length === 0) {
          console.error(chalk.yellow(`No namespace form found in ${path}`));
          return;
        }
        for (const form of forms) {
          console.log(printForm(namespaceFormToForm(form)));
        }
      } catch (error) {
        if (error instanceof Error) {
          console.error(chalk.red(formatError(error)));
          process.exit(exitCodeFor(error));
        }
        throw error;
      }
    });
}
