/**
 * Instruction set
 *
 * Operands follow the opcode byte. `L` variants take a 16-bit big-endian
 * operand in place of the single byte.
 */

export enum OpCode {
  PRINT,
  POP,
  NIL,
  TRUE,
  FALSE,
  CONST,
  CONSTL,
  CALL,
  RET,
  NOT,
  NEG,
  EQ,
  LT,
  LE,
  ADD,
  SUB,
  MUL,
  DIV,
  DEF,
  DEFL,
  GLD,
  GLDL,
  GST,
  GSTL,
  LD,
  LDL,
  ST,
  STL,
  JMP,
  JMPF,
  LOOP,
  MAP,
  GET,
  GETL,
  SET,
  SETL,
  GETI,
  SETI,
}

export const OPCODE_COUNT = OpCode.SETI + 1;

/** Operand bytes following each opcode */
export const operandWidth: Record<OpCode, number> = {
  [OpCode.PRINT]: 1,
  [OpCode.POP]: 0,
  [OpCode.NIL]: 0,
  [OpCode.TRUE]: 0,
  [OpCode.FALSE]: 0,
  [OpCode.CONST]: 1,
  [OpCode.CONSTL]: 2,
  [OpCode.CALL]: 1,
  [OpCode.RET]: 0,
  [OpCode.NOT]: 0,
  [OpCode.NEG]: 0,
  [OpCode.EQ]: 0,
  [OpCode.LT]: 0,
  [OpCode.LE]: 0,
  [OpCode.ADD]: 0,
  [OpCode.SUB]: 0,
  [OpCode.MUL]: 0,
  [OpCode.DIV]: 0,
  [OpCode.DEF]: 1,
  [OpCode.DEFL]: 2,
  [OpCode.GLD]: 1,
  [OpCode.GLDL]: 2,
  [OpCode.GST]: 1,
  [OpCode.GSTL]: 2,
  [OpCode.LD]: 1,
  [OpCode.LDL]: 2,
  [OpCode.ST]: 1,
  [OpCode.STL]: 2,
  [OpCode.JMP]: 2,
  [OpCode.JMPF]: 2,
  [OpCode.LOOP]: 2,
  [OpCode.MAP]: 1,
  [OpCode.GET]: 1,
  [OpCode.GETL]: 2,
  [OpCode.SET]: 1,
  [OpCode.SETL]: 2,
  [OpCode.GETI]: 0,
  [OpCode.SETI]: 0,
};

/** Long form of each opcode that has one */
export const longForm: Partial<Record<OpCode, OpCode>> = {
  [OpCode.CONST]: OpCode.CONSTL,
  [OpCode.DEF]: OpCode.DEFL,
  [OpCode.GLD]: OpCode.GLDL,
  [OpCode.GST]: OpCode.GSTL,
  [OpCode.LD]: OpCode.LDL,
  [OpCode.ST]: OpCode.STL,
  [OpCode.GET]: OpCode.GETL,
  [OpCode.SET]: OpCode.SETL,
};

export function opName(op: number): string {
  return OpCode[op] ?? `<bad ${op}>`;
}

/**
 * Split a chunk's code into instruction offsets. Stops at the first byte
 * that is not an opcode.
 */
export function instructionOffsets(code: Uint8Array, count: number): number[] {
  const offsets: number[] = [];
  let offset = 0;
  while (offset < count) {
    const op: OpCode = code[offset];
    if (op >= OPCODE_COUNT) break;
    offsets.push(offset);
    offset += 1 + operandWidth[op];
  }
  return offsets;
}
