/**
 * Tallow Core - bytecode compiler and virtual machine for the Tallow
 * scripting language
 *
 * This is the core library containing:
 * - Scanner and single-pass compiler
 * - Chunk and instruction set
 * - Value model, heap and hash tables
 * - Virtual machine and embedding API
 */

export { Scanner, tokenize } from './script/scanner.js';
export { TokenType, keywords } from './script/token.js';
export type { Token } from './script/token.js';
export { Compiler, Parser, Precedence, compile, UINT8_COUNT, MAX_CONSTANTS } from './script/compiler.js';
export type { CompileHost } from './script/compiler.js';
export { Chunk, CHUNK_CODEPAGE, packLocation, lineOf, columnOf } from './script/chunk.js';
export { OpCode, OPCODE_COUNT, operandWidth, longForm, opName, instructionOffsets } from './script/opcode.js';
export {
  ValueType,
  theNilValue,
  theTrueValue,
  theFalseValue,
  makeBoolean,
  makeNumber,
  makeObject,
  rawBits,
  isFalsey,
  valuesEqual,
  formatNumber,
  formatValue,
} from './script/value.js';
export type { Value, NilValue, BoolValue, NumValue, ObjValue } from './script/value.js';
export {
  Obj,
  ObjKind,
  StringObj,
  FunctionObj,
  NativeFunctionObj,
  MapObj,
  Heap,
  hashString,
  internString,
} from './script/object.js';
export type { NativeFn } from './script/object.js';
export { Table } from './script/table.js';
export { RawHash, hashRaw } from './script/hash.js';
export { makeSource, loadSource } from './script/source.js';
export type { Source } from './script/source.js';
export { InterpretResult, RuntimeError, VMClosedError } from './script/errors.js';
export {
  FRAMES_MAX,
  STACK_MAX,
  consoleTrace,
  formatTraceEvent,
  resolveOptions,
} from './script/config.js';
export type { OutputStream, TraceEvent, TraceHook, VMOptions, ResolvedOptions } from './script/config.js';
export { clockNative, defineStandardNatives } from './script/natives.js';
export { VM } from './script/vm.js';
export type { CallFrame } from './script/vm.js';
