#!/usr/bin/env tsx
/**
 * Tallow CLI - run a script, a source string, or an interactive prompt
 */

import { Command } from 'commander';
import { consoleTrace, type VMOptions } from 'tallow-core';
import { EXIT_OK, repl, runFile, runSource } from './run.js';

interface CliOptions {
  trace?: boolean;
  eval?: string;
}

const program = new Command();

program
  .name('tallow')
  .description('Bytecode interpreter for the Tallow scripting language')
  .version('0.1.0')
  .option('--trace', 'Trace every executed instruction on stderr')
  .option('-e, --eval <source>', 'Run a source string')
  .argument('[script]', 'Script file')
  .action(async (script: string | undefined, options: CliOptions) => {
    const vmOptions: VMOptions = options.trace ? { trace: consoleTrace } : {};

    try {
      let code = EXIT_OK;
      if (options.eval !== undefined) {
        code = runSource(options.eval, vmOptions, '<eval>');
      } else if (script) {
        code = runFile(script, vmOptions);
      } else {
        await repl(vmOptions);
      }
      process.exit(code);
    } catch (error) {
      if (error instanceof Error) {
        console.error('Error:', error.message);
        if (process.env.DEBUG) {
          console.error(error.stack);
        }
      } else {
        console.error('Error:', String(error));
      }
      process.exit(1);
    }
  });

await program.parseAsync();
