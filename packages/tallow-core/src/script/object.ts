/**
 * Heap objects
 *
 * Every object carries a common header (kind and next-in-heap link) plus a
 * stable numeric handle. Objects are owned by a single Heap per VM;
 * tables and values refer to them, the heap list is what frees them.
 */

import { Chunk } from './chunk.js';
import type { Source } from './source.js';
import { Table } from './table.js';
import { RawHash } from './hash.js';
import { type Value, theNilValue } from './value.js';
import type { VM } from './vm.js';

export enum ObjKind {
  String = 'string',
  Function = 'function',
  NativeFunction = 'native',
  Map = 'map',
}

/**
 * Base class for all heap objects
 */
export abstract class Obj {
  abstract readonly kind: ObjKind;

  /** Stable handle, assigned by the heap; doubles as the raw payload. */
  public handle = 0;

  /** Next object in the heap list */
  public next: Obj | null = null;

  asString(): StringObj | null { return null; }
  asFunction(): FunctionObj | null { return null; }
  asNative(): NativeFunctionObj | null { return null; }
  asMap(): MapObj | null { return null; }

  abstract toString(): string;
}

/**
 * Interned string. Two strings with equal content inside one VM are always
 * the same object.
 */
export class StringObj extends Obj {
  readonly kind = ObjKind.String;

  constructor(
    public readonly chars: string,
    public readonly hash: number
  ) {
    super();
  }

  get length(): number {
    return this.chars.length;
  }

  asString(): StringObj { return this; }

  toString(): string {
    return this.chars;
  }
}

/**
 * Compiled function. The top-level script has arity 0 and no name.
 */
export class FunctionObj extends Obj {
  readonly kind = ObjKind.Function;
  public arity = 0;
  public readonly chunk: Chunk;

  constructor(
    source: Source,
    public name: StringObj | null = null
  ) {
    super();
    this.chunk = new Chunk(source);
  }

  asFunction(): FunctionObj { return this; }

  toString(): string {
    return this.name ? `<fn ${this.name.chars}>` : '<script>';
  }
}

/**
 * Host callback. `args` holds the `argc` arguments in call order.
 */
export type NativeFn = (vm: VM, argc: number, args: Value[]) => Value;

export class NativeFunctionObj extends Obj {
  readonly kind = ObjKind.NativeFunction;

  constructor(
    public readonly name: string,
    public readonly fn: NativeFn
  ) {
    super();
  }

  asNative(): NativeFunctionObj { return this; }

  toString(): string {
    return '<native fn>';
  }
}

/**
 * Map with two indices: string keys for field access, raw 64-bit payloads
 * for numeric keys.
 */
export class MapObj extends Obj {
  readonly kind = ObjKind.Map;
  public readonly table = new Table();
  public readonly hash = new RawHash();

  asMap(): MapObj { return this; }

  toString(): string {
    return '<map>';
  }
}

/**
 * Owning heap: a singly linked list of every allocated object.
 */
export class Heap {
  public head: Obj | null = null;
  public count = 0;
  private nextHandle = 1;

  allocate<T extends Obj>(obj: T): T {
    obj.handle = this.nextHandle++;
    obj.next = this.head;
    this.head = obj;
    this.count++;

    if (process.env.DEBUG_HEAP) {
      console.error(`[heap] allocate #${obj.handle} ${obj.kind}`);
    }
    return obj;
  }

  /** Unlink a single object from the heap list. */
  free(target: Obj): void {
    let prev: Obj | null = null;
    for (let obj = this.head; obj !== null; obj = obj.next) {
      if (obj === target) {
        if (prev === null) {
          this.head = obj.next;
        } else {
          prev.next = obj.next;
        }
        obj.next = null;
        this.count--;
        return;
      }
      prev = obj;
    }
  }

  /** Release every object. */
  freeAll(): void {
    let obj = this.head;
    while (obj !== null) {
      const next = obj.next;
      obj.next = null;
      obj = next;
    }
    this.head = null;
    this.count = 0;
  }
}

/**
 * FNV-1a over the UTF-8 bytes of a string.
 */
export function hashString(chars: string): number {
  let hash = 2166136261;
  for (const byte of Buffer.from(chars, 'utf8')) {
    hash ^= byte;
    hash = Math.imul(hash, 16777619) >>> 0;
  }
  return hash;
}

/**
 * Return the interned string for `chars`, allocating it on first use.
 */
export function internString(heap: Heap, strings: Table, chars: string): StringObj {
  const hash = hashString(chars);
  const interned = strings.findString(chars, hash);
  if (interned) return interned;

  const str = heap.allocate(new StringObj(chars, hash));
  strings.set(str, theNilValue);
  return str;
}
