/**
 * String-keyed hash table
 *
 * Open addressing with linear probing and tombstones. Keys are interned
 * strings, so lookups compare by identity; `findString` is the one place
 * that compares content, and is what interning is built on.
 */

import type { StringObj } from './object.js';
import { type Value, theNilValue, theTrueValue } from './value.js';

const TABLE_MAX_LOAD = 0.75;
const TABLE_MIN_CAPACITY = 8;

interface Entry {
  key: StringObj | null;
  value: Value;
}

function emptyEntries(capacity: number): Entry[] {
  const entries: Entry[] = new Array(capacity);
  for (let i = 0; i < capacity; i++) {
    entries[i] = { key: null, value: theNilValue };
  }
  return entries;
}

// A tombstone is a keyless entry whose value is true.
function isTombstone(entry: Entry): boolean {
  return entry.key === null && entry.value === theTrueValue;
}

export class Table {
  /** Live entries plus tombstones */
  private count = 0;
  private live = 0;
  private entries: Entry[] = [];

  get size(): number {
    return this.live;
  }

  get capacity(): number {
    return this.entries.length;
  }

  private findEntry(entries: Entry[], key: StringObj): Entry {
    const mask = entries.length - 1;
    let index = key.hash & mask;
    let tombstone: Entry | null = null;

    for (;;) {
      const entry = entries[index];
      if (entry.key === null) {
        if (!isTombstone(entry)) return tombstone ?? entry;
        if (tombstone === null) tombstone = entry;
      } else if (entry.key === key) {
        return entry;
      }
      index = (index + 1) & mask;
    }
  }

  private adjustCapacity(capacity: number): void {
    const entries = emptyEntries(capacity);
    this.count = 0;

    for (const entry of this.entries) {
      if (entry.key === null) continue;
      const dest = this.findEntry(entries, entry.key);
      dest.key = entry.key;
      dest.value = entry.value;
      this.count++;
    }

    this.entries = entries;
  }

  get(key: StringObj): Value | undefined {
    if (this.live === 0) return undefined;
    const entry = this.findEntry(this.entries, key);
    return entry.key === null ? undefined : entry.value;
  }

  has(key: StringObj): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Insert or overwrite. Returns true when the key was not present before.
   */
  set(key: StringObj, value: Value): boolean {
    if (this.count + 1 > this.entries.length * TABLE_MAX_LOAD) {
      this.adjustCapacity(Math.max(TABLE_MIN_CAPACITY, this.entries.length * 2));
    }

    const entry = this.findEntry(this.entries, key);
    const isNewKey = entry.key === null;
    if (isNewKey) {
      this.live++;
      if (!isTombstone(entry)) this.count++;
    }

    entry.key = key;
    entry.value = value;
    return isNewKey;
  }

  delete(key: StringObj): boolean {
    if (this.live === 0) return false;

    const entry = this.findEntry(this.entries, key);
    if (entry.key === null) return false;

    entry.key = null;
    entry.value = theTrueValue;
    this.live--;
    return true;
  }

  /**
   * Content lookup used by interning.
   */
  findString(chars: string, hash: number): StringObj | null {
    if (this.live === 0) return null;

    const mask = this.entries.length - 1;
    let index = hash & mask;
    for (;;) {
      const entry = this.entries[index];
      if (entry.key === null) {
        if (!isTombstone(entry)) return null;
      } else if (entry.key.hash === hash && entry.key.chars === chars) {
        return entry.key;
      }
      index = (index + 1) & mask;
    }
  }

  clear(): void {
    this.entries = [];
    this.count = 0;
    this.live = 0;
  }
}
