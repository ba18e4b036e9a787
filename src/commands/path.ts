import { Command } from 'commander';
import { pathFor } from '../namespace/index.js';

interface PathOptions {
  ext: string;
}

export function createPathCommand(): Command {
  return new Command('path-for')
    .description('Print the classpath-relative file path of a namespace')
    .argument('<namespace>', 'Namespace name, e.g. my-app.core')
    .option('--ext <extension>', 'File extension', 'clj')
    .action((namespace: string, options: PathOptions) => {
      console.log(pathFor(namespace, options.ext.replace(/^\./, '')));
    });
}
