/**
 * Chunk - bytecode buffer
 *
 * `code` and `lines` grow together one page at a time, so every code byte
 * has a packed (line << 16 | column) entry at the same index. Constants are
 * append-only; an index stays valid for the lifetime of the chunk.
 */

import type { Source } from './source.js';
import { type Value, valuesEqual } from './value.js';

export const CHUNK_CODEPAGE = 256;

export function packLocation(line: number, column: number): number {
  return (((line & 0xffff) << 16) | (column & 0xffff)) >>> 0;
}

export function lineOf(packed: number): number {
  return packed >>> 16;
}

export function columnOf(packed: number): number {
  return packed & 0xffff;
}

export class Chunk {
  public count = 0;
  public code = new Uint8Array(0);
  public lines = new Uint32Array(0);
  public readonly constants: Value[] = [];

  constructor(public readonly source: Source) {}

  get capacity(): number {
    return this.code.length;
  }

  emit(byte: number, line: number, column: number): void {
    if (this.count >= this.code.length) {
      const capacity = this.code.length + CHUNK_CODEPAGE;

      const code = new Uint8Array(capacity);
      code.set(this.code);
      this.code = code;

      const lines = new Uint32Array(capacity);
      lines.set(this.lines);
      this.lines = lines;
    }

    this.code[this.count] = byte;
    this.lines[this.count] = packLocation(line, column);
    this.count++;
  }

  /**
   * Append a constant and return its index. With `dedup`, an equal constant
   * already in the pool is reused instead.
   */
  addConstant(value: Value, dedup: boolean = false): number {
    if (dedup) {
      const existing = this.constants.findIndex((constant) => valuesEqual(constant, value));
      if (existing !== -1) return existing;
    }

    this.constants.push(value);
    return this.constants.length - 1;
  }

  lineAt(offset: number): number {
    return lineOf(this.lines[offset]);
  }

  columnAt(offset: number): number {
    return columnOf(this.lines[offset]);
  }
}
