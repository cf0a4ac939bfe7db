/**
 * Compiler tests - bytecode emitted for each construct, and diagnostics
 */

import { describe, it, expect } from 'vitest';
import { compile } from './compiler.js';
import type { OutputStream } from './config.js';
import { InterpretResult } from './errors.js';
import type { FunctionObj } from './object.js';
import { OpCode, instructionOffsets } from './opcode.js';
import { makeSource } from './source.js';
import { ValueType } from './value.js';
import { VM } from './vm.js';

class Capture implements OutputStream {
  public text = '';
  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}

function compileText(text: string): { vm: VM; fn: FunctionObj | null; errors: string } {
  const stderr = new Capture();
  const vm = new VM({ stdout: new Capture(), stderr });
  const fn = compile(vm, makeSource(text));
  return { vm, fn, errors: stderr.text };
}

function compileOk(text: string): FunctionObj {
  const { fn, errors } = compileText(text);
  if (fn === null) throw new Error(`compile failed: ${errors}`);
  return fn;
}

function opcodes(fn: FunctionObj): OpCode[] {
  const { code, count } = fn.chunk;
  return instructionOffsets(code, count).map((offset): OpCode => code[offset]);
}

function bytes(fn: FunctionObj): number[] {
  return Array.from(fn.chunk.code.subarray(0, fn.chunk.count));
}

describe('Compiler - expressions', () => {
  it('should respect precedence', () => {
    const fn = compileOk('print 1 + 2 * 3;');

    expect(opcodes(fn)).toEqual([
      OpCode.CONST,
      OpCode.CONST,
      OpCode.CONST,
      OpCode.MUL,
      OpCode.ADD,
      OpCode.PRINT,
      OpCode.NIL,
      OpCode.RET,
    ]);
  });

  it('should lower > and >= to negated comparisons', () => {
    expect(opcodes(compileOk('print 1 > 2;'))).toEqual([
      OpCode.CONST,
      OpCode.CONST,
      OpCode.LE,
      OpCode.NOT,
      OpCode.PRINT,
      OpCode.NIL,
      OpCode.RET,
    ]);
    expect(opcodes(compileOk('print 1 >= 2;'))).toContain(OpCode.LT);
    expect(opcodes(compileOk('print 1 != 2;')).slice(2, 4)).toEqual([OpCode.EQ, OpCode.NOT]);
  });

  it('should count print operands', () => {
    const fn = compileOk('print 1, 2, 3;');
    expect(bytes(fn).slice(6, 8)).toEqual([OpCode.PRINT, 3]);
  });

  it('should reference one interned object for equal string literals', () => {
    const fn = compileOk('print "x", "x";');
    const [a, b] = fn.chunk.constants;

    if (a.type !== ValueType.Obj || b.type !== ValueType.Obj) {
      throw new Error('expected string constants');
    }
    expect(a.value).toBe(b.value);
    expect(a.value.asString()?.chars).toBe('x');
  });
});

describe('Compiler - variables', () => {
  it('should use global opcodes at top level', () => {
    const fn = compileOk('var a = 1; a = 2; print a;');

    expect(opcodes(fn)).toEqual([
      OpCode.CONST,
      OpCode.DEF,
      OpCode.CONST,
      OpCode.GST,
      OpCode.POP,
      OpCode.GLD,
      OpCode.PRINT,
      OpCode.NIL,
      OpCode.RET,
    ]);
  });

  it('should use slot opcodes inside a block', () => {
    const fn = compileOk('{ var a = 1; a = 2; print a; }');

    expect(bytes(fn)).toEqual([
      OpCode.CONST, 0,
      OpCode.CONST, 1,
      OpCode.ST, 1,
      OpCode.POP,
      OpCode.LD, 1,
      OpCode.PRINT, 1,
      OpCode.POP,
      OpCode.NIL,
      OpCode.RET,
    ]);
  });

  it('should pop one slot per local when a scope closes', () => {
    const fn = compileOk('{ var a = 1; var b = 2; { var c = 3; } }');

    expect(opcodes(fn)).toEqual([
      OpCode.CONST,
      OpCode.CONST,
      OpCode.CONST,
      OpCode.POP,
      OpCode.POP,
      OpCode.POP,
      OpCode.NIL,
      OpCode.RET,
    ]);
  });

  it('should switch to long operands past 256 constants', () => {
    const statements = Array.from({ length: 300 }, (_, i) => `${i};`).join(' ');
    const fn = compileOk(`${statements} var x = 5; print x;`);
    const ops = opcodes(fn);

    // Numbers 256..299 plus the initializer 5.
    expect(ops.filter((op) => op === OpCode.CONSTL)).toHaveLength(45);
    expect(ops).toContain(OpCode.DEFL);
    expect(ops).toContain(OpCode.GLDL);
    expect(ops).not.toContain(OpCode.DEF);
  });
});

describe('Compiler - control flow', () => {
  it('should patch forward jumps for if/else', () => {
    const fn = compileOk('if (true) print 1; else print 2;');
    const code = bytes(fn);

    expect(code[1]).toBe(OpCode.JMPF);
    expect(code.slice(2, 4)).toEqual([0, 8]);
    expect(code[12]).toBe(OpCode.POP);
    expect(code[9]).toBe(OpCode.JMP);
    expect(code.slice(10, 12)).toEqual([0, 5]);
    expect(code[17]).toBe(OpCode.NIL);
  });

  it('should jump back to the condition with LOOP', () => {
    const fn = compileOk('while (false) print 1;');

    expect(bytes(fn)).toEqual([
      OpCode.FALSE,
      OpCode.JMPF, 0, 8,
      OpCode.POP,
      OpCode.CONST, 0,
      OpCode.PRINT, 1,
      OpCode.LOOP, 0, 12,
      OpCode.POP,
      OpCode.NIL,
      OpCode.RET,
    ]);
  });
});

describe('Compiler - functions and maps', () => {
  it('should compile a function into its own chunk', () => {
    const fn = compileOk('fun f(a, b) { return a; }');
    expect(opcodes(fn)).toEqual([OpCode.CONST, OpCode.DEF, OpCode.NIL, OpCode.RET]);

    const constant = fn.chunk.constants[1];
    if (constant.type !== ValueType.Obj) throw new Error('expected a function constant');
    const inner = constant.value.asFunction();
    if (inner === null) throw new Error('expected a function constant');

    expect(inner.arity).toBe(2);
    expect(inner.toString()).toBe('<fn f>');
    expect(opcodes(inner)).toEqual([OpCode.LD, OpCode.RET, OpCode.NIL, OpCode.RET]);
  });

  it('should emit key/value pairs for map literals', () => {
    const fn = compileOk('var m = {a: 1, 2: 3};');

    expect(opcodes(fn)).toEqual([
      OpCode.CONST,
      OpCode.CONST,
      OpCode.CONST,
      OpCode.CONST,
      OpCode.MAP,
      OpCode.DEF,
      OpCode.NIL,
      OpCode.RET,
    ]);
    expect(bytes(fn)[9]).toBe(2);
  });

  it('should emit SET for field assignment and GETI for indexing', () => {
    expect(opcodes(compileOk('m.x = 1;'))).toEqual([
      OpCode.GLD,
      OpCode.CONST,
      OpCode.SET,
      OpCode.POP,
      OpCode.NIL,
      OpCode.RET,
    ]);
    expect(opcodes(compileOk('print m[0];')).slice(0, 3)).toEqual([OpCode.GLD, OpCode.CONST, OpCode.GETI]);
  });
});

describe('Compiler - locations', () => {
  it('should tag each byte with the previous token position', () => {
    const { chunk } = compileOk('print 1;\n  print 2;');

    const locations = [0, 2, 4, 6, 8].map((offset) => [chunk.lineAt(offset), chunk.columnAt(offset)]);
    expect(locations).toEqual([
      [1, 7],
      [1, 8],
      [2, 9],
      [2, 10],
      [2, 11],
    ]);
  });
});

describe('Compiler - errors', () => {
  it('should reject a local read in its own initializer', () => {
    const { fn, errors } = compileText('{ var a = a; }');

    expect(fn).toBeNull();
    expect(errors).toBe("[line 1] Error at 'a': Cannot read local variable in its own initializer.\n");
  });

  it('should report a missing semicolon at end of input', () => {
    expect(compileText('print 1').errors).toBe("[line 1] Error at end: Expect ';' after value.\n");
  });

  it('should reject an invalid assignment target', () => {
    expect(compileText('1 = 2;').errors).toBe("[line 1] Error at '=': Invalid assignment target.\n");
  });

  it('should reject a duplicate local', () => {
    expect(compileText('{ var a = 1; var a = 2; }').errors).toBe(
      "[line 1] Error at 'a': Already a variable with this name in this scope.\n"
    );
  });

  it('should reject return at top level', () => {
    expect(compileText('return 1;').errors).toBe("[line 1] Error at 'return': Can't return from top-level code.\n");
  });

  it('should report lexical errors without a location token', () => {
    expect(compileText('print "abc').errors).toBe('[line 1] Error: Unterminated string.\n');
    expect(compileText('@').errors).toBe('[line 1] Error: Unexpected character.\n');
  });

  it('should report one error per statement', () => {
    expect(compileText('print 1 +; print;').errors).toBe(
      "[line 1] Error at ';': Expect expression.\n[line 1] Error at ';': Expect expression.\n"
    );
  });

  it('should limit locals per function', () => {
    const declarations = Array.from({ length: 256 }, (_, i) => `var v${i};`).join(' ');

    expect(compileText(`{ ${declarations} }`).errors).toBe(
      "[line 1] Error at 'v255': Too many local variables in function.\n"
    );
  });

  it('should limit constants per chunk', () => {
    const statements = Array.from({ length: 65537 }, (_, i) => `${i};`).join(' ');
    const { vm, fn, errors } = compileText(statements);

    expect(fn).toBeNull();
    expect(errors).toBe("[line 1] Error at '65536': Too many constants in one chunk.\n");
    expect(vm.interpret(statements)).toBe(InterpretResult.COMPILE_ERROR);
  });

  it('should reject a forward jump wider than 16 bits', () => {
    const body = 'nil; '.repeat(40000);
    expect(compileText(`if (true) { ${body}}`).errors).toBe("[line 1] Error at '}': Too much code to jump over.\n");
  });

  it('should reject a loop body wider than 16 bits', () => {
    const body = 'nil; '.repeat(40000);
    expect(compileText(`while (true) { ${body}}`).errors).toBe("[line 1] Error at '}': Loop body too large.\n");
  });

  it('should free every function of a failed compile', () => {
    const { vm, fn } = compileText('print 1;');
    expect(fn).not.toBeNull();
    const before = vm.heap.count;

    expect(compile(vm, makeSource('fun f() { print 1 +; }'))).toBeNull();
    // Only the interned name "f" survives.
    expect(vm.heap.count).toBe(before + 1);
  });
});
