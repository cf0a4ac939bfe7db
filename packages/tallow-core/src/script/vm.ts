/**
 * Virtual Machine
 *
 * Executes compiled chunks on a fixed-capacity value stack. Each active
 * function has a call frame holding its instruction pointer and the stack
 * index of its slot 0 (the callee itself, followed by its arguments and
 * locals).
 *
 * The interpreter loop keeps the hot frame state (ip, slot base, code and
 * constants) in local variables and writes ip back to the frame only when
 * control leaves the frame: on calls and on errors.
 */

import {
  type OutputStream,
  type ResolvedOptions,
  type VMOptions,
  resolveOptions,
} from './config.js';
import { compile, type CompileHost } from './compiler.js';
import { InterpretResult, RuntimeError, VMClosedError } from './errors.js';
import {
  type NativeFn,
  FunctionObj,
  Heap,
  MapObj,
  NativeFunctionObj,
  type StringObj,
  hashString,
  internString,
} from './object.js';
import { OpCode } from './opcode.js';
import { loadSource, makeSource, type Source } from './source.js';
import { Table } from './table.js';
import {
  type Value,
  ValueType,
  formatValue,
  isFalsey,
  makeBoolean,
  makeNumber,
  makeObject,
  rawBits,
  theFalseValue,
  theNilValue,
  theTrueValue,
  valuesEqual,
} from './value.js';
import { defineStandardNatives } from './natives.js';

/**
 * Runtime record for one active invocation
 */
export interface CallFrame {
  fn: FunctionObj;
  /** Offset of the next instruction in fn.chunk.code */
  ip: number;
  /** Stack index of slot 0 */
  slots: number;
}

/**
 * State a VM shares with its clones
 */
interface SharedState {
  heap: Heap;
  strings: Table;
  globals: Table;
}

function asStringObj(value: Value): StringObj | null {
  return value.type === ValueType.Obj ? value.value.asString() : null;
}

export class VM implements CompileHost {
  public readonly heap: Heap;
  /** Interned strings; values are unused */
  public readonly strings: Table;
  public readonly globals: Table;

  private readonly options: ResolvedOptions;
  private readonly stack: Value[];
  private top = 0;
  private readonly frames: CallFrame[] = [];
  private frameCount = 0;
  private lastResult: Value = theNilValue;

  /** False for clones: the heap and tables belong to the parent. */
  private readonly ownsShared: boolean;
  private closed = false;

  constructor(options: VMOptions = {}, shared?: SharedState) {
    this.options = resolveOptions(options);
    this.stack = new Array<Value>(this.options.stackMax).fill(theNilValue);

    if (shared) {
      this.heap = shared.heap;
      this.strings = shared.strings;
      this.globals = shared.globals;
      this.ownsShared = false;
    } else {
      this.heap = new Heap();
      this.strings = new Table();
      this.globals = new Table();
      this.ownsShared = true;
      defineStandardNatives(this);
    }
  }

  get stdout(): OutputStream {
    return this.options.stdout;
  }

  get stderr(): OutputStream {
    return this.options.stderr;
  }

  /**
   * New VM sharing this one's heap, strings and globals, with its own value
   * and frame stacks. Running a VM and its clones concurrently is not
   * supported.
   */
  clone(options: VMOptions = {}): VM {
    this.checkOpen();
    return new VM(
      {
        stdout: this.options.stdout,
        stderr: this.options.stderr,
        stackMax: this.options.stackMax,
        framesMax: this.options.framesMax,
        trace: this.options.trace ?? undefined,
        ...options,
      },
      { heap: this.heap, strings: this.strings, globals: this.globals }
    );
  }

  /**
   * Release the VM. The owner frees every heap object and both tables; a
   * clone only drops its own stacks.
   */
  close(): void {
    if (this.closed) return;
    this.resetStack();

    if (this.ownsShared) {
      this.globals.clear();
      this.strings.clear();
      this.heap.freeAll();
    }
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private checkOpen(): void {
    if (this.closed) throw new VMClosedError();
  }

  // Embedding API

  intern(chars: string): StringObj {
    return internString(this.heap, this.strings, chars);
  }

  /** Interned string as a value */
  copyString(chars: string): Value {
    return makeObject(this.intern(chars));
  }

  setGlobal(name: string, value: Value): void {
    this.checkOpen();
    this.globals.set(this.intern(name), value);
  }

  /** Looks the name up without interning it. */
  getGlobal(name: string): Value | undefined {
    this.checkOpen();
    const key = this.strings.findString(name, hashString(name));
    return key === null ? undefined : this.globals.get(key);
  }

  defineNative(name: string, fn: NativeFn): void {
    this.checkOpen();
    const native = this.heap.allocate(new NativeFunctionObj(name, fn));
    this.globals.set(this.intern(name), makeObject(native));
  }

  push(value: Value): void {
    if (this.top >= this.stack.length) {
      throw new RuntimeError('Stack overflow.');
    }
    this.stack[this.top++] = value;
  }

  pop(): Value {
    if (this.top === 0) {
      throw new Error('Stack underflow');
    }
    return this.stack[--this.top];
  }

  peek(distance: number): Value {
    return this.stack[this.top - 1 - distance];
  }

  /** Value returned by the outermost frame of the last `execute()` */
  result(): Value {
    return this.lastResult;
  }

  stackSize(): number {
    return this.top;
  }

  frameDepth(): number {
    return this.frameCount;
  }

  /**
   * Compile and run a source string.
   */
  interpret(text: string, fname?: string): InterpretResult {
    return this.interpretSource(makeSource(text, fname));
  }

  doFile(fname: string): InterpretResult {
    this.checkOpen();
    const source = loadSource(fname);
    if (source === null) {
      this.stderr.write(`Could not open file "${fname}".\n`);
      return InterpretResult.COMPILE_ERROR;
    }
    return this.interpretSource(source);
  }

  private interpretSource(source: Source): InterpretResult {
    this.checkOpen();

    const fn = compile(this, source);
    if (fn === null) return InterpretResult.COMPILE_ERROR;

    const script = makeObject(fn);
    this.push(script);
    if (!this.call(script, 0)) return InterpretResult.RUNTIME_ERROR;

    return this.execute();
  }

  /**
   * Set up a call to the value sitting `argc` slots below the top. Native
   * functions run to completion here; script functions get a new frame and
   * run on the next `execute()`.
   */
  call(callee: Value, argc: number): boolean {
    try {
      this.callValue(callee, argc);
      return true;
    } catch (error) {
      if (!(error instanceof RuntimeError)) throw error;
      this.runtimeError(error.message);
      return false;
    }
  }

  /**
   * Run until the frame stack empties.
   */
  execute(): InterpretResult {
    this.checkOpen();
    if (this.frameCount === 0) return InterpretResult.OK;
    this.lastResult = theNilValue;
    return this.run();
  }

  // Internals

  private resetStack(): void {
    this.top = 0;
    this.frameCount = 0;
  }

  private runtimeError(message: string): void {
    const lines = [`Error: ${message}`];

    for (let i = this.frameCount - 1; i >= 0; i--) {
      const frame = this.frames[i];
      const chunk = frame.fn.chunk;
      // ip already points past the failing instruction.
      const instruction = Math.max(frame.ip - 1, 0);
      const where = `${chunk.source.fname}:${chunk.lineAt(instruction)}:${chunk.columnAt(instruction)}`;
      const name = frame.fn.name ? `${frame.fn.name.chars}()` : 'script';
      lines.push(`[${where}] in ${name}`);
    }

    this.stderr.write(lines.join('\n') + '\n');
    this.resetStack();
  }

  private callValue(callee: Value, argc: number): void {
    if (callee.type === ValueType.Obj) {
      const fn = callee.value.asFunction();
      if (fn) {
        this.prepareCall(fn, argc);
        return;
      }

      const native = callee.value.asNative();
      if (native) {
        const args = this.stack.slice(this.top - argc, this.top);
        const result = native.fn(this, argc, args);
        this.top -= argc + 1;
        this.push(result);
        return;
      }
    }

    throw new RuntimeError('Can only call functions and classes.');
  }

  private prepareCall(fn: FunctionObj, argc: number): void {
    if (argc !== fn.arity) {
      throw new RuntimeError(`Expected ${fn.arity} arguments but got ${argc}.`);
    }
    if (this.frameCount === this.options.framesMax) {
      throw new RuntimeError('Stack overflow.');
    }

    const frame = this.frames[this.frameCount];
    if (frame) {
      frame.fn = fn;
      frame.ip = 0;
      frame.slots = this.top - argc - 1;
    } else {
      this.frames[this.frameCount] = { fn, ip: 0, slots: this.top - argc - 1 };
    }
    this.frameCount++;
  }

  /** Numeric view of an arithmetic operand; booleans count as 0 or 1. */
  private operand(value: Value): number | null {
    if (value.type === ValueType.Num) return value.value;
    if (value.type === ValueType.Bool) return value.value ? 1 : 0;
    return null;
  }

  private numericOperands(message: string): [number, number] {
    const b = this.operand(this.peek(0));
    const a = this.operand(this.peek(1));
    if (a === null || b === null) throw new RuntimeError(message);

    this.top -= 2;
    return [a, b];
  }

  private concatenate(a: StringObj, b: StringObj): void {
    this.top -= 2;
    this.push(this.copyString(a.chars + b.chars));
  }

  private mapOf(value: Value): MapObj {
    const map = value.type === ValueType.Obj ? value.value.asMap() : null;
    if (map === null) throw new RuntimeError('Operands must be a map.');
    return map;
  }

  private indexGet(map: MapObj, key: Value): Value {
    if (key.type === ValueType.Num) {
      return map.hash.get(rawBits(key)) ?? theNilValue;
    }
    const name = asStringObj(key);
    if (name === null) throw new RuntimeError('Operands must be a number or string.');
    return map.table.get(name) ?? theNilValue;
  }

  private indexSet(map: MapObj, key: Value, value: Value): void {
    if (key.type === ValueType.Num) {
      map.hash.set(rawBits(key), value);
      return;
    }
    const name = asStringObj(key);
    if (name === null) throw new RuntimeError('Operands must be a number or string.');
    map.table.set(name, value);
  }

  private run(): InterpretResult {
    let frame = this.frames[this.frameCount - 1];
    let code = frame.fn.chunk.code;
    let consts = frame.fn.chunk.constants;
    let base = frame.slots;
    let ip = frame.ip;

    const loadFrame = (): void => {
      frame = this.frames[this.frameCount - 1];
      code = frame.fn.chunk.code;
      consts = frame.fn.chunk.constants;
      base = frame.slots;
      ip = frame.ip;
    };

    const readByte = (): number => code[ip++];
    const readShort = (): number => {
      ip += 2;
      return (code[ip - 2] << 8) | code[ip - 1];
    };
    const readString = (long: boolean): StringObj => {
      const str = asStringObj(consts[long ? readShort() : readByte()]);
      if (str === null) throw new RuntimeError('Expected a string constant.');
      return str;
    };

    const trace = this.options.trace;

    try {
      for (;;) {
        const offset = ip;
        const depthBefore = this.top;
        const current = frame;
        const op: OpCode = readByte();

        switch (op) {
          case OpCode.PRINT: {
            const count = readByte();
            const parts: string[] = [];
            for (let i = count - 1; i >= 0; i--) {
              parts.push(formatValue(this.peek(i)));
            }
            this.stdout.write(parts.join('\t') + '\n');
            this.top -= count;
            break;
          }

          case OpCode.POP:
            this.pop();
            break;

          case OpCode.NIL:
            this.push(theNilValue);
            break;

          case OpCode.TRUE:
            this.push(theTrueValue);
            break;

          case OpCode.FALSE:
            this.push(theFalseValue);
            break;

          case OpCode.CONST:
            this.push(consts[readByte()]);
            break;

          case OpCode.CONSTL:
            this.push(consts[readShort()]);
            break;

          case OpCode.CALL: {
            const argc = readByte();
            frame.ip = ip;
            this.callValue(this.peek(argc), argc);
            loadFrame();
            break;
          }

          case OpCode.RET: {
            const result = this.pop();
            this.frameCount--;
            if (this.frameCount === 0) {
              // Drops the callee along with anything left in its slots.
              this.top = frame.slots;
              this.lastResult = result;
              trace?.({ op, offset, functionName: current.fn.name?.chars ?? 'script', depthBefore, depthAfter: this.top });
              return InterpretResult.OK;
            }

            this.top = frame.slots;
            this.push(result);
            loadFrame();
            break;
          }

          case OpCode.NOT:
            this.push(makeBoolean(isFalsey(this.pop())));
            break;

          case OpCode.NEG: {
            const value = this.peek(0);
            let negated: number;
            if (value.type === ValueType.Num) {
              negated = -value.value;
            } else if (value.type === ValueType.Bool) {
              // Integer negation: -false is +0, not -0.
              negated = value.value ? -1 : 0;
            } else {
              throw new RuntimeError('Operands must be a number/boolean.');
            }
            this.pop();
            this.push(makeNumber(negated));
            break;
          }

          case OpCode.EQ: {
            const b = this.pop();
            const a = this.pop();
            this.push(makeBoolean(valuesEqual(a, b)));
            break;
          }

          case OpCode.LT: {
            const [a, b] = this.numericOperands('Operands must be two numbers/booleans.');
            this.push(makeBoolean(a < b));
            break;
          }

          case OpCode.LE: {
            const [a, b] = this.numericOperands('Operands must be two numbers/booleans.');
            this.push(makeBoolean(a <= b));
            break;
          }

          case OpCode.ADD: {
            const right = asStringObj(this.peek(0));
            const left = asStringObj(this.peek(1));
            if (left !== null && right !== null) {
              this.concatenate(left, right);
              break;
            }
            const [a, b] = this.numericOperands('Operands must be two numbers/booleans/strings.');
            this.push(makeNumber(a + b));
            break;
          }

          case OpCode.SUB: {
            const [a, b] = this.numericOperands('Operands must be two numbers/booleans.');
            this.push(makeNumber(a - b));
            break;
          }

          case OpCode.MUL: {
            const [a, b] = this.numericOperands('Operands must be two numbers/booleans.');
            this.push(makeNumber(a * b));
            break;
          }

          case OpCode.DIV: {
            const [a, b] = this.numericOperands('Operands must be two numbers/booleans.');
            this.push(makeNumber(a / b));
            break;
          }

          case OpCode.DEF:
          case OpCode.DEFL: {
            const name = readString(op === OpCode.DEFL);
            this.globals.set(name, this.peek(0));
            this.pop();
            break;
          }

          case OpCode.GLD:
          case OpCode.GLDL: {
            const name = readString(op === OpCode.GLDL);
            const value = this.globals.get(name);
            if (value === undefined) {
              throw new RuntimeError(`Undefined variable '${name.chars}'.`);
            }
            this.push(value);
            break;
          }

          case OpCode.GST:
          case OpCode.GSTL: {
            const name = readString(op === OpCode.GSTL);
            if (this.globals.set(name, this.peek(0))) {
              this.globals.delete(name);
              throw new RuntimeError(`Undefined variable '${name.chars}'.`);
            }
            break;
          }

          case OpCode.LD:
            this.push(this.stack[base + readByte()]);
            break;

          case OpCode.LDL:
            this.push(this.stack[base + readShort()]);
            break;

          case OpCode.ST:
            this.stack[base + readByte()] = this.peek(0);
            break;

          case OpCode.STL:
            this.stack[base + readShort()] = this.peek(0);
            break;

          case OpCode.JMP: {
            const jump = readShort();
            ip += jump;
            break;
          }

          case OpCode.JMPF: {
            const jump = readShort();
            if (isFalsey(this.peek(0))) ip += jump;
            break;
          }

          case OpCode.LOOP: {
            const jump = readShort();
            ip -= jump;
            break;
          }

          case OpCode.MAP: {
            const count = readByte();
            const map = this.heap.allocate(new MapObj());
            const first = this.top - count * 2;

            // Reverse order: the first occurrence of a key is written last.
            for (let i = count - 1; i >= 0; i--) {
              const key = this.stack[first + i * 2];
              const value = this.stack[first + i * 2 + 1];
              const name = asStringObj(key);
              if (name !== null) {
                map.table.set(name, value);
              } else {
                map.hash.set(rawBits(key), value);
              }
            }

            this.top = first;
            this.push(makeObject(map));
            break;
          }

          case OpCode.GET:
          case OpCode.GETL: {
            const name = readString(op === OpCode.GETL);
            const map = this.mapOf(this.peek(0));
            const value = map.table.get(name) ?? theNilValue;
            this.pop();
            this.push(value);
            break;
          }

          case OpCode.SET:
          case OpCode.SETL: {
            const name = readString(op === OpCode.SETL);
            const map = this.mapOf(this.peek(1));
            const value = this.peek(0);
            map.table.set(name, value);
            this.top -= 2;
            this.push(value);
            break;
          }

          case OpCode.GETI: {
            const map = this.mapOf(this.peek(1));
            const value = this.indexGet(map, this.peek(0));
            this.top -= 2;
            this.push(value);
            break;
          }

          case OpCode.SETI: {
            const map = this.mapOf(this.peek(2));
            const value = this.peek(0);
            this.indexSet(map, this.peek(1), value);
            this.top -= 3;
            this.push(value);
            break;
          }

          default:
            throw new RuntimeError(`Bad opcode, got ${code[ip - 1]}!`);
        }

        trace?.({ op, offset, functionName: current.fn.name?.chars ?? 'script', depthBefore, depthAfter: this.top });
      }
    } catch (error) {
      if (!(error instanceof RuntimeError)) throw error;
      frame.ip = ip;
      this.runtimeError(error.message);
      return InterpretResult.RUNTIME_ERROR;
    }
  }
}
