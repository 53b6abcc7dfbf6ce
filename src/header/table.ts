/**
 * Tightly packed sequences of fixed-size entries.
 */
import { PupError } from '../errors.js';
import { RegionCodec } from './region.js';

/**
 * Splits `bytes` into `codec.size` windows and decodes each in order.
 *
 * @param codec - Entry codec
 * @param bytes - Table bytes; the caller sizes them from the segment count
 * @returns Decoded entries in table order
 * @throws {PupError} With reason `undersized` if the length is not a whole number of entries
 */
export function decodeTable<T>(codec: RegionCodec<T>, bytes: Buffer): T[] {
  if (bytes.length % codec.size !== 0) {
    throw new PupError({ kind: 'undersized' });
  }

  const entries: T[] = [];
  for (let offset = 0; offset < bytes.length; offset += codec.size) {
    entries.push(codec.decode(bytes.subarray(offset, offset + codec.size)));
  }
  return entries;
}

/**
 * Concatenates the fixed-size encoding of each entry, in order.
 *
 * @param codec - Entry codec
 * @param entries - Entries to encode
 * @returns Buffer of exactly `entries.length * codec.size` bytes
 */
export function encodeTable<T>(codec: RegionCodec<T>, entries: readonly T[]): Buffer {
  return Buffer.concat(entries.map((entry) => codec.encode(entry)), entries.length * codec.size);
}
