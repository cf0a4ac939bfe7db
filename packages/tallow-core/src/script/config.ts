/**
 * VM configuration
 */

import type { OpCode } from './opcode.js';
import { opName } from './opcode.js';

/** Anything text can be written to (process.stdout qualifies). */
export interface OutputStream {
  write(chunk: string): unknown;
}

export interface TraceEvent {
  op: OpCode;
  /** Offset of the opcode byte in its chunk */
  offset: number;
  /** Function the instruction belongs to ("script" at top level) */
  functionName: string;
  depthBefore: number;
  depthAfter: number;
}

export type TraceHook = (event: TraceEvent) => void;

export interface VMOptions {
  stdout?: OutputStream;
  stderr?: OutputStream;
  /** Value stack capacity in slots */
  stackMax?: number;
  /** Maximum call depth */
  framesMax?: number;
  trace?: TraceHook;
}

export interface ResolvedOptions {
  stdout: OutputStream;
  stderr: OutputStream;
  stackMax: number;
  framesMax: number;
  trace: TraceHook | null;
}

export const FRAMES_MAX = 64;
export const STACK_MAX = 256 * 64;

export function formatTraceEvent(event: TraceEvent): string {
  const offset = String(event.offset).padStart(4, '0');
  return `[trace] ${event.functionName} ${offset} ${opName(event.op)} depth ${event.depthBefore} -> ${event.depthAfter}`;
}

export const consoleTrace: TraceHook = (event) => {
  console.error(formatTraceEvent(event));
};

export function resolveOptions(options: VMOptions = {}): ResolvedOptions {
  let trace = options.trace ?? null;
  if (trace === null && process.env.DEBUG_TRACE) {
    trace = consoleTrace;
  }

  return {
    stdout: options.stdout ?? process.stdout,
    stderr: options.stderr ?? process.stderr,
    stackMax: options.stackMax ?? STACK_MAX,
    framesMax: options.framesMax ?? FRAMES_MAX,
    trace,
  };
}
