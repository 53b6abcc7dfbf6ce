/**
 * Fixed-size binary region contract shared by every header structure.
 */
import { PupError } from '../errors.js';

/** Largest value a u64 field can hold. */
export const U64_MAX = 0xffff_ffff_ffff_ffffn;

/**
 * Codec for a structure with an exact encoded size.
 * `decode` reads at most `size` bytes; `encode` returns exactly `size` bytes.
 */
export interface RegionCodec<T> {
  readonly size: number;
  decode(window: Buffer): T;
  encode(value: T): Buffer;
}

/**
 * Returns the first `size` bytes of `window`.
 * @throws {PupError} With reason `undersized` if the window is too short
 */
export function takeWindow(window: Buffer, size: number): Buffer {
  if (window.length < size) {
    throw new PupError({ kind: 'undersized' });
  }
  return window.subarray(0, size);
}

/**
 * Adds two u64 values. Leaving the u64 range means the package cannot be laid out at all,
 * so this throws a RangeError rather than a PupError.
 */
export function checkedAddU64(a: bigint, b: bigint): bigint {
  const sum = a + b;
  if (sum > U64_MAX) {
    throw new RangeError(`u64 overflow: ${a} + ${b}`);
  }
  return sum;
}
