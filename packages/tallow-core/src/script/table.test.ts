/**
 * Table tests - string-keyed hash table and interning
 */

import { describe, it, expect } from 'vitest';
import { Table } from './table.js';
import { Heap, hashString, internString } from './object.js';
import { makeNumber } from './value.js';

describe('Table', () => {
  it('should report new keys on insert', () => {
    const heap = new Heap();
    const strings = new Table();
    const table = new Table();
    const key = internString(heap, strings, 'a');

    expect(table.set(key, makeNumber(1))).toBe(true);
    expect(table.set(key, makeNumber(2))).toBe(false);
    expect(table.get(key)).toEqual(makeNumber(2));
    expect(table.size).toBe(1);
  });

  it('should return undefined for missing keys', () => {
    const heap = new Heap();
    const strings = new Table();
    const table = new Table();

    expect(table.get(internString(heap, strings, 'missing'))).toBeUndefined();
  });

  it('should delete keys and reuse their slots', () => {
    const heap = new Heap();
    const strings = new Table();
    const table = new Table();
    const a = internString(heap, strings, 'a');
    const b = internString(heap, strings, 'b');

    table.set(a, makeNumber(1));
    table.set(b, makeNumber(2));
    expect(table.delete(a)).toBe(true);
    expect(table.delete(a)).toBe(false);
    expect(table.has(a)).toBe(false);
    expect(table.get(b)).toEqual(makeNumber(2));

    expect(table.set(a, makeNumber(3))).toBe(true);
    expect(table.get(a)).toEqual(makeNumber(3));
    expect(table.size).toBe(2);
  });

  it('should grow past its load factor', () => {
    const heap = new Heap();
    const strings = new Table();
    const table = new Table();

    for (let i = 0; i < 100; i++) {
      table.set(internString(heap, strings, `key${i}`), makeNumber(i));
    }

    expect(table.size).toBe(100);
    expect(table.capacity).toBe(256);
    for (let i = 0; i < 100; i++) {
      expect(table.get(internString(heap, strings, `key${i}`))).toEqual(makeNumber(i));
    }
  });
});

describe('Table - interning', () => {
  it('should return the same object for equal content', () => {
    const heap = new Heap();
    const strings = new Table();

    const first = internString(heap, strings, 'hello');
    const second = internString(heap, strings, 'hel' + 'lo');

    expect(second).toBe(first);
    expect(heap.count).toBe(1);
  });

  it('should find strings by content', () => {
    const heap = new Heap();
    const strings = new Table();
    const str = internString(heap, strings, 'abc');

    expect(strings.findString('abc', hashString('abc'))).toBe(str);
    expect(strings.findString('abd', hashString('abd'))).toBeNull();
  });

  it('should hash with FNV-1a', () => {
    expect(hashString('')).toBe(2166136261);
    expect(hashString('a')).toBe(0xe40c292c);
  });
});
