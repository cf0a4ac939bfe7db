/**
 * Hash keyed by raw 64-bit payloads
 *
 * Backs the numeric side of maps. Linear probing like Table, with bigint
 * keys folded down to a 32-bit bucket hash. Map entries are never removed,
 * so there are no tombstones.
 */

import { type Value, theNilValue } from './value.js';

const HASH_MAX_LOAD = 0.75;
const HASH_MIN_CAPACITY = 8;

interface Slot {
  used: boolean;
  key: bigint;
  value: Value;
}

function emptySlots(capacity: number): Slot[] {
  const slots: Slot[] = new Array(capacity);
  for (let i = 0; i < capacity; i++) {
    slots[i] = { used: false, key: 0n, value: theNilValue };
  }
  return slots;
}

export function hashRaw(key: bigint): number {
  const folded = (key ^ (key >> 32n)) & 0xffffffffn;
  return Math.imul(Number(folded), 0x9e3779b1) >>> 0;
}

export class RawHash {
  private count = 0;
  private slots: Slot[] = [];

  get size(): number {
    return this.count;
  }

  private findSlot(slots: Slot[], key: bigint): Slot {
    const mask = slots.length - 1;
    let index = hashRaw(key) & mask;

    for (;;) {
      const slot = slots[index];
      if (!slot.used || slot.key === key) return slot;
      index = (index + 1) & mask;
    }
  }

  private grow(): void {
    const slots = emptySlots(Math.max(HASH_MIN_CAPACITY, this.slots.length * 2));

    for (const slot of this.slots) {
      if (!slot.used) continue;
      const dest = this.findSlot(slots, slot.key);
      dest.used = true;
      dest.key = slot.key;
      dest.value = slot.value;
    }

    this.slots = slots;
  }

  get(key: bigint): Value | undefined {
    if (this.count === 0) return undefined;
    const slot = this.findSlot(this.slots, key);
    return slot.used ? slot.value : undefined;
  }

  /** Returns true when the key is new. */
  set(key: bigint, value: Value): boolean {
    if (this.count + 1 > this.slots.length * HASH_MAX_LOAD) this.grow();

    const slot = this.findSlot(this.slots, key);
    const isNewKey = !slot.used;
    if (isNewKey) this.count++;

    slot.used = true;
    slot.key = key;
    slot.value = value;
    return isNewKey;
  }
}
