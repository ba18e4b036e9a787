import { Command } from 'commander';
import chalk from 'chalk';
import { resolve } from 'path';
import { namespaceFormsOnClasspath } from '../classpath/index.js';
import { loadConfig, scanOptionsFor } from '../config/index.js';
import { exitCodeFor, formatError } from '../errors/index.js';
import { namespaceFormToForm } from '../namespace/index.js';
import { printForm } from '../reader/index.js';
import { FileScanResult } from '../scanners/index.js';

interface ListOptions {
  prefix?: string;
  all?: boolean;
  forms?: boolean;
  strict?: boolean;
  json?: boolean;
  verbose?: boolean;
  dir?: string;
}

function logResult(result: FileScanResult): void {
  if (result.status === 'ok') {
    console.error(chalk.dim(`  Scanned: ${result.path}`));
  } else {
    console.error(chalk.yellow(`  Skipped: ${result.error.message}`));
  }
}

export function createListCommand(): Command {
  return new Command('list')
    .description('List namespaces found in classpath directories and jar files')
    .argument('[entries...]', 'Classpath entries (default: config classpath, then $CLASSPATH)')
    .option('--prefix <prefix>', 'Only namespaces starting with this prefix')
    .option('--all', 'Include every namespace form in each file, not just the first')
    .option('--forms', 'Print whole namespace forms instead of names')
    .option('--strict', 'Fail on unreadable files instead of skipping them')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Log each scanned file to stderr')
    .option('--dir <path>', 'Project directory holding .nsscan.yaml (default: current directory)')
    .action((entries: string[], options: ListOptions) => {
      try {
        const projectDir = resolve(options.dir ?? process.cwd());
        const config = loadConfig(projectDir);
        const scanOptions = scanOptionsFor(config);

        // Config entries are relative to the project, command line entries to the cwd
        let classpath: string[] | undefined;
        if (entries.length > 0) {
          classpath = entries;
        } else if (config.classpath.length > 0) {
          classpath = config.classpath.map(entry => resolve(projectDir, entry));
        }

        const forms = namespaceFormsOnClasspath({
          ...scanOptions,
          classpath,
          prefix: options.prefix ?? config.prefix ?? undefined,
          mode: options.all ? 'all' : scanOptions.mode,
          ignoreUnreadable: options.strict ? false : scanOptions.ignoreUnreadable,
          onResult: options.verbose ? logResult : undefined,
        });

        const lines = forms.map(form => options.forms ? printForm(namespaceFormToForm(form)) : form.name);

        if (options.json) {
          console.log(JSON.stringify(lines, null, 2));
          return;
        }

        for (const line of lines) {
          console.log(line);
        }
        if (options.verbose) {
          console.error(chalk.cyan(`\n${forms.length} namespace form(s) found`));
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
