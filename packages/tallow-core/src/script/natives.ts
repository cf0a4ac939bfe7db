/**
 * Native functions installed in every new VM
 */

import type { NativeFn } from './object.js';
import { makeNumber } from './value.js';
import type { VM } from './vm.js';

/** Processor time used so far, in seconds. */
export const clockNative: NativeFn = () => {
  const usage = process.cpuUsage();
  return makeNumber((usage.user + usage.system) / 1e6);
};

export const standardNatives: ReadonlyArray<[string, NativeFn]> = [
  ['clock', clockNative],
];

export function defineStandardNatives(vm: VM): void {
  for (const [name, fn] of standardNatives) {
    vm.defineNative(name, fn);
  }
}
