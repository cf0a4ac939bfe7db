/**
 * CLI runner tests - exit codes, file loading and the prompt loop
 */

import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Readable, Writable } from 'stream';
import type { OutputStream } from 'tallow-core';
import { EXIT_COMPILE_ERROR, EXIT_IO_ERROR, EXIT_OK, EXIT_RUNTIME_ERROR, repl, runFile, runSource } from './run.js';

class Capture implements OutputStream {
  public text = '';
  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}

describe('CLI - runSource', () => {
  it('should exit 0 on success', () => {
    const stdout = new Capture();
    expect(runSource('print "ok";', { stdout })).toBe(EXIT_OK);
    expect(stdout.text).toBe('ok\n');
  });

  it('should exit 65 on compile errors', () => {
    const stderr = new Capture();
    expect(runSource('print;', { stderr })).toBe(EXIT_COMPILE_ERROR);
    expect(stderr.text).toBe("[line 1] Error at ';': Expect expression.\n");
  });

  it('should exit 70 on runtime errors', () => {
    const stderr = new Capture();
    expect(runSource('print x;', { stderr }, '<eval>')).toBe(EXIT_RUNTIME_ERROR);
    expect(stderr.text).toBe("Error: Undefined variable 'x'.\n[<eval>:1:7] in script\n");
  });
});

describe('CLI - runFile', () => {
  it('should run a script from disk', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tallow-'));
    const fname = path.join(dir, 'main.tl');
    fs.writeFileSync(fname, 'fun square(n) { return n * n; }\nprint square(4);\n');

    const stdout = new Capture();
    try {
      expect(runFile(fname, { stdout })).toBe(EXIT_OK);
      expect(stdout.text).toBe('16\n');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should report the file name in runtime traces', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tallow-'));
    const fname = path.join(dir, 'bad.tl');
    fs.writeFileSync(fname, 'print 1;\nprint -nil;\n');

    const stdout = new Capture();
    const stderr = new Capture();
    try {
      expect(runFile(fname, { stdout, stderr })).toBe(EXIT_RUNTIME_ERROR);
      expect(stdout.text).toBe('1\n');
      expect(stderr.text).toBe(`Error: Operands must be a number/boolean.\n[${fname}:2:8] in script\n`);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should exit 74 when the file cannot be read', () => {
    const stderr = new Capture();
    expect(runFile('/nonexistent/main.tl', { stderr })).toBe(EXIT_IO_ERROR);
    expect(stderr.text).toBe('Could not open file "/nonexistent/main.tl".\n');
  });
});

describe('CLI - repl', () => {
  it('should run each line against shared globals', async () => {
    const stdout = new Capture();
    const stderr = new Capture();
    const prompts: string[] = [];
    const output = new Writable({
      write(chunk, _encoding, callback) {
        prompts.push(String(chunk));
        callback();
      },
    });

    await repl({ stdout, stderr }, Readable.from(['var a = 1;\n', 'print nil + a;\n', 'print a + 1;\n']), output);

    expect(stdout.text).toBe('2\n');
    expect(stderr.text).toBe('Error: Operands must be two numbers/booleans/strings.\n[<repl>:1:13] in script\n');
    expect(prompts.join('')).toBe('> > > > ');
  });
});
