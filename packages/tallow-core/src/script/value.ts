/**
 * Value system
 *
 * A value is a tagged union over nil, boolean, double and a reference to a
 * heap object. Every value also has a "raw" 64-bit view of its payload,
 * which drives truthiness and keys the numeric side of maps.
 */

import type { Obj } from './object.js';

export enum ValueType {
  Nil = 'nil',
  Bool = 'bool',
  Num = 'num',
  Obj = 'obj',
}

export interface NilValue {
  readonly type: ValueType.Nil;
}

export interface BoolValue {
  readonly type: ValueType.Bool;
  readonly value: boolean;
}

export interface NumValue {
  readonly type: ValueType.Num;
  readonly value: number;
}

export interface ObjValue {
  readonly type: ValueType.Obj;
  readonly value: Obj;
}

export type Value = NilValue | BoolValue | NumValue | ObjValue;

export const theNilValue: NilValue = { type: ValueType.Nil };
export const theTrueValue: BoolValue = { type: ValueType.Bool, value: true };
export const theFalseValue: BoolValue = { type: ValueType.Bool, value: false };

export function makeBoolean(value: boolean): BoolValue {
  return value ? theTrueValue : theFalseValue;
}

export function makeNumber(value: number): NumValue {
  return { type: ValueType.Num, value };
}

export function makeObject(value: Obj): ObjValue {
  return { type: ValueType.Obj, value };
}

// Shared scratch buffer for reinterpreting a double as its 64 bits.
const scratch = new DataView(new ArrayBuffer(8));

/**
 * Raw 64-bit payload of a value.
 *
 * nil and false are 0, true is 1, numbers are their IEEE-754 bits and objects
 * are their heap handle (never 0).
 */
export function rawBits(value: Value): bigint {
  switch (value.type) {
    case ValueType.Nil:
      return 0n;
    case ValueType.Bool:
      return value.value ? 1n : 0n;
    case ValueType.Num:
      scratch.setFloat64(0, value.value);
      return scratch.getBigUint64(0);
    case ValueType.Obj:
      return BigInt(value.value.handle);
  }
}

/** nil, false and +0.0 are falsey; everything else is truthy. */
export function isFalsey(value: Value): boolean {
  return rawBits(value) === 0n;
}

export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.type) {
    case ValueType.Nil:
      return b.type === ValueType.Nil;
    case ValueType.Bool:
      return b.type === ValueType.Bool && a.value === b.value;
    case ValueType.Num:
      return b.type === ValueType.Num && a.value === b.value;
    case ValueType.Obj:
      // Strings are interned, so identity covers them too.
      return b.type === ValueType.Obj && a.value === b.value;
  }
}

/**
 * Format a number the way printf's `%g` does: six significant digits, trailing
 * zeros dropped, exponent form outside [1e-4, 1e6).
 */
export function formatNumber(n: number): string {
  if (Number.isNaN(n)) return 'nan';
  if (n === Infinity) return 'inf';
  if (n === -Infinity) return '-inf';
  if (n === 0) return Object.is(n, -0) ? '-0' : '0';

  const [mantissa, exponentText] = n.toExponential(5).split('e');
  const exponent = Number(exponentText);

  if (exponent < -4 || exponent >= 6) {
    const sign = exponent < 0 ? '-' : '+';
    const digits = String(Math.abs(exponent)).padStart(2, '0');
    return `${stripZeros(mantissa)}e${sign}${digits}`;
  }

  return stripZeros(n.toFixed(5 - exponent));
}

function stripZeros(text: string): string {
  if (!text.includes('.')) return text;
  return text.replace(/0+$/, '').replace(/\.$/, '');
}

export function formatValue(value: Value): string {
  switch (value.type) {
    case ValueType.Nil:
      return 'nil';
    case ValueType.Bool:
      return value.value ? 'true' : 'false';
    case ValueType.Num:
      return formatNumber(value.value);
    case ValueType.Obj:
      return value.value.toString();
  }
}
