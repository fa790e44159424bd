import { Command, Option } from 'commander';
import { getPackageVersion } from '../utils/version.js';
import { generateCommand, type GenerateOptions } from './generate.js';

const EXAMPLES = `
examples:
  callflow --paths main.go > out.gv
  callflow --paths "cmd/**/*.go" --filter GLOBAL main > out.gv
  callflow --source out.gv --filter new > filtered.gv`;

/**
 * Build the callflow command. A fresh instance per parse: commander keeps
 * option values on the command object.
 */
export function createProgram(): Command {
  return new Command()
    .name('callflow')
    .description('Generate a Graphviz call graph for Go sources')
    .version(getPackageVersion(), '-v, --version', 'show version number and exit')
    .addOption(
      new Option('-s, --source <file>', 'read a gv formatted call graph from a file').conflicts('paths'),
    )
    .addOption(
      new Option('-p, --paths <files...>', 'construct a gv formatted call graph from 1 or more files'),
    )
    .option('-f, --filter <names...>', 'filter call graph to 1 or more function names')
    .option('-c, --config <path>', 'config file (defaults to ./.callflow.yml when present)')
    .option('--abort-on-error', 'stop the whole run on the first lexical error')
    .option('--strict', 'treat unterminated literals and comments as errors')
    .option('--verbose', 'show diagnostics and a run summary')
    .addHelpText('after', EXAMPLES)
    .showHelpAfterError()
    .action(async (options: GenerateOptions) => {
      process.exitCode = await generateCommand(options);
    });
}

export const program = createProgram();
