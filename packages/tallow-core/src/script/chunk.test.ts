/**
 * Chunk tests - code buffer, location table and constant pool
 */

import { describe, it, expect } from 'vitest';
import { CHUNK_CODEPAGE, Chunk, columnOf, lineOf, packLocation } from './chunk.js';
import { OpCode } from './opcode.js';
import { makeSource } from './source.js';
import { makeNumber } from './value.js';

describe('Chunk', () => {
  it('should record a location for every byte', () => {
    const chunk = new Chunk(makeSource(''));
    chunk.emit(OpCode.NIL, 3, 14);
    chunk.emit(OpCode.RET, 4, 1);

    expect(chunk.count).toBe(2);
    expect(Array.from(chunk.code.subarray(0, chunk.count))).toEqual([OpCode.NIL, OpCode.RET]);
    expect(chunk.lineAt(0)).toBe(3);
    expect(chunk.columnAt(0)).toBe(14);
    expect(chunk.lineAt(1)).toBe(4);
    expect(chunk.columnAt(1)).toBe(1);
  });

  it('should grow one page at a time', () => {
    const chunk = new Chunk(makeSource(''));
    expect(chunk.capacity).toBe(0);

    chunk.emit(OpCode.NIL, 1, 1);
    expect(chunk.capacity).toBe(CHUNK_CODEPAGE);

    for (let i = 1; i <= CHUNK_CODEPAGE; i++) {
      chunk.emit(OpCode.POP, 1, i);
    }
    expect(chunk.count).toBe(CHUNK_CODEPAGE + 1);
    expect(chunk.capacity).toBe(CHUNK_CODEPAGE * 2);
    expect(chunk.code[0]).toBe(OpCode.NIL);
    expect(chunk.columnAt(CHUNK_CODEPAGE)).toBe(CHUNK_CODEPAGE);
  });

  it('should append constants without deduplication by default', () => {
    const chunk = new Chunk(makeSource(''));

    expect(chunk.addConstant(makeNumber(1))).toBe(0);
    expect(chunk.addConstant(makeNumber(1))).toBe(1);
    expect(chunk.addConstant(makeNumber(1), true)).toBe(0);
    expect(chunk.constants.length).toBe(2);
  });
});

describe('Chunk - locations', () => {
  it('should pack line and column into one word', () => {
    const packed = packLocation(120, 42);

    expect(lineOf(packed)).toBe(120);
    expect(columnOf(packed)).toBe(42);
    expect(packLocation(0xffff, 0xffff)).toBe(0xffffffff);
  });
});
