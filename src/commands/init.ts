import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, writeFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { CONFIG_FILE } from '../config/index.js';

interface InitOptions {
  force?: boolean;
  dir?: string;
}

const DEFAULT_CONFIG = {
  version: '1.0.0',
  classpath: ['src'],
  prefix: null,
  ignore_unreadable: true,
  mode: 'first',
  scan: {
    exclude: [],
    archive_extensions: ['.jar'],
  },
};

/**
 * Helper to write file with error handling
 */
function writeConfigFile(filePath: string, content: string, displayName: string): boolean {
  try {
    writeFileSync(filePath, content);
    console.log(chalk.gray(`  Created ${displayName}`));
    return true;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`  Failed to create ${displayName}: ${message}`));
    return false;
  }
}

export function createInitCommand(): Command {
  return new Command('init')
    .description(`Write a default ${CONFIG_FILE}`)
    .option('--force', `Overwrite an existing ${CONFIG_FILE}`)
    .option('--dir <path>', 'Project directory (default: current directory)')
    .action((options: InitOptions) => {
      const configPath = join(options.dir ?? process.cwd(), CONFIG_FILE);

      if (existsSync(configPath) && !options.force) {
        console.error(chalk.red(`Error: ${CONFIG_FILE} already exists. Use --force to overwrite.`));
        process.exit(1);
      }

      if (!writeConfigFile(configPath, yaml.dump(DEFAULT_CONFIG, { lineWidth: 80 }), CONFIG_FILE)) {
        process.exit(1);
      }

      console.log(chalk.green('\n✓ nsscan initialized'));
      console.log(chalk.cyan('\nNext steps:'));
      console.log(`  1. Edit ${CONFIG_FILE} to list your source directories and jars`);
      console.log('  2. Run `nsscan list` to see the namespaces they declare');
    });
}
