/**
 * Approximate memory accounting
 *
 * The meter does not measure the heap. Callers charge a conservative
 * estimate for every value and node they keep alive and release it when
 * the owner drops it; the running total must stay under the limit.
 */

import { SandboxError } from '../common/errors';
import type { Value } from '../value/value';
import { MEMORY_LIMIT_BYTES } from './limits';

const OBJECT_OVERHEAD = 16;
const ENTRY_OVERHEAD = 32;
const NODE_OVERHEAD = 96;

export function sizeOfString(s: string): number {
  return OBJECT_OVERHEAD + s.length * 2;
}

export function sizeOfValue(v: Value): number {
  switch (v.kind) {
    case 'int':
    case 'float':
      return OBJECT_OVERHEAD + 8;
    case 'str':
      return OBJECT_OVERHEAD + sizeOfString(v.value);
    case 'bool':
    case 'null':
      return OBJECT_OVERHEAD;
  }
}

/** A named slot in a map: key, value and bucket bookkeeping. */
export function sizeOfEntry(name: string, value: Value): number {
  return ENTRY_OVERHEAD + sizeOfString(name) + sizeOfValue(value);
}

/** Fixed cost of one materialized node before its facets are counted. */
export function sizeOfNodeShell(childCount: number): number {
  return NODE_OVERHEAD + childCount * 8;
}

export class MemoryMeter {
  readonly limit: number;
  private used = 0;
  private high = 0;

  constructor(limit: number = MEMORY_LIMIT_BYTES) {
    this.limit = limit;
  }

  /** Charge `bytes`; throws MEMORY_EXCEEDED without charging if over. */
  allocate(bytes: number, what = 'allocation'): void {
    const next = this.used + bytes;
    if (next > this.limit) {
      throw new SandboxError(
        'MEMORY_EXCEEDED',
        `Memory limit of ${this.limit} bytes exceeded by ${what} ` +
          `(${this.used} in use, ${bytes} requested)`
      );
    }
    this.used = next;
    if (next > this.high) this.high = next;
  }

  release(bytes: number): void {
    this.used = Math.max(0, this.used - bytes);
  }

  get usage(): number {
    return this.used;
  }

  /** High-water mark; never decreases. */
  get peak(): number {
    return this.high;
  }
}
