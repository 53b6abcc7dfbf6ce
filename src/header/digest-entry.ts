/**
 * Digest table entry. `segIndex` is a back-reference and need not match the entry's position.
 */
import { DIGEST_SIZE } from '../types/segment.js';
import { RegionCodec, takeWindow } from './region.js';

export const DIGEST_ENTRY_SIZE = 0x20;

export interface DigestEntry {
  readonly segIndex: bigint;
  readonly digest: Buffer;
}

function decode(window: Buffer): DigestEntry {
  const data = takeWindow(window, DIGEST_ENTRY_SIZE);
  return {
    segIndex: data.readBigUInt64BE(0x00),
    digest: Buffer.from(data.subarray(0x08, 0x08 + DIGEST_SIZE))
  };
}

/**
 * @throws {RangeError} If the digest is not exactly `DIGEST_SIZE` bytes
 */
function encode(entry: DigestEntry): Buffer {
  if (entry.digest.length !== DIGEST_SIZE) {
    throw new RangeError(`Digest for segment ${entry.segIndex} is ${entry.digest.length} bytes, expected ${DIGEST_SIZE}`);
  }
  const data: Buffer = Buffer.alloc(DIGEST_ENTRY_SIZE);
  data.writeBigUInt64BE(entry.segIndex, 0x00);
  entry.digest.copy(data, 0x08);
  // 0x1c..0x20 reserved
  return data;
}

export const digestEntryCodec: RegionCodec<DigestEntry> = { size: DIGEST_ENTRY_SIZE, decode, encode };
