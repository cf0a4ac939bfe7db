/**
 * Error types shared by the compiler and the VM
 */

export enum InterpretResult {
  OK = 'ok',
  COMPILE_ERROR = 'compile-error',
  RUNTIME_ERROR = 'runtime-error',
}

/**
 * Raised inside the interpreter loop (or by a native function) and turned
 * into a stack trace at the execute boundary.
 */
export class RuntimeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RuntimeError';
  }
}

export class VMClosedError extends Error {
  constructor() {
    super('VM has been closed');
    this.name = 'VMClosedError';
  }
}
