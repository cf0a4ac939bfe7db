/**
 * Script runners behind the command line
 *
 * Each runner returns a process exit code: 65 for compile errors, 70 for
 * runtime errors and 74 when the script cannot be read.
 */

import * as readline from 'readline';
import { InterpretResult, VM, loadSource, type VMOptions } from 'tallow-core';

export const EXIT_OK = 0;
export const EXIT_COMPILE_ERROR = 65;
export const EXIT_RUNTIME_ERROR = 70;
export const EXIT_IO_ERROR = 74;

export function exitCodeFor(result: InterpretResult): number {
  switch (result) {
    case InterpretResult.OK:
      return EXIT_OK;
    case InterpretResult.COMPILE_ERROR:
      return EXIT_COMPILE_ERROR;
    case InterpretResult.RUNTIME_ERROR:
      return EXIT_RUNTIME_ERROR;
  }
}

export function runSource(text: string, options: VMOptions = {}, fname?: string): number {
  const vm = new VM(options);
  try {
    return exitCodeFor(vm.interpret(text, fname));
  } finally {
    vm.close();
  }
}

export function runFile(fname: string, options: VMOptions = {}): number {
  const source = loadSource(fname);
  if (source === null) {
    (options.stderr ?? process.stderr).write(`Could not open file "${fname}".\n`);
    return EXIT_IO_ERROR;
  }
  return runSource(source.text, options, source.fname);
}

/**
 * Read-eval-print loop. Every line is a separate program run against the
 * same globals; errors are reported and the loop carries on.
 */
export async function repl(
  options: VMOptions = {},
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<void> {
  const vm = new VM(options);
  const rl = readline.createInterface({ input, output, terminal: false });

  rl.setPrompt('> ');
  rl.prompt();
  try {
    for await (const line of rl) {
      if (line.trim() !== '') vm.interpret(line, '<repl>');
      rl.prompt();
    }
  } finally {
    rl.close();
    vm.close();
  }
}
