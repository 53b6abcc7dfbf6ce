/**
 * Fixed 0x30-byte metadata preamble of an update package.
 */
import { PupError } from '../errors.js';
import { DIGEST_SIZE, Segment } from '../types/segment.js';
import { checkedAddU64, RegionCodec, takeWindow } from './region.js';
import { DIGEST_ENTRY_SIZE } from './digest-entry.js';
import { LOCATION_ENTRY_SIZE } from './location-entry.js';

export const PUP_MAGIC: Buffer = Buffer.from('SCEUF\0\0\0', 'latin1');
export const PACKAGE_VERSION = 1n;
export const METADATA_SIZE = 0x30;
const HEADER_ALIGNMENT = 0x10n;

const MAGIC_OFFSET = 0x00;
const PACKAGE_VERSION_OFFSET = 0x08;
const IMAGE_VERSION_OFFSET = 0x10;
const SEGMENT_COUNT_OFFSET = 0x18;
const HEADER_SIZE_OFFSET = 0x20;
const DATA_SIZE_OFFSET = 0x28;

export interface Metadata {
  readonly imageVersion: bigint;
  readonly segCount: bigint;
  /** Metadata, both tables and the header digest, padded to 16 bytes. */
  readonly headerSize: bigint;
  /** Sum of all segment payload lengths. */
  readonly dataSize: bigint;
}

function decode(window: Buffer): Metadata {
  const data = takeWindow(window, METADATA_SIZE);

  const magic = data.subarray(MAGIC_OFFSET, MAGIC_OFFSET + PUP_MAGIC.length);
  if (!magic.equals(PUP_MAGIC)) {
    throw new PupError({ kind: 'invalid-magic', magic: Buffer.from(magic) });
  }

  const version = data.readBigUInt64BE(PACKAGE_VERSION_OFFSET);
  if (version !== PACKAGE_VERSION) {
    throw new PupError({ kind: 'unsupported-package-version', version });
  }

  return {
    imageVersion: data.readBigUInt64BE(IMAGE_VERSION_OFFSET),
    segCount: data.readBigUInt64BE(SEGMENT_COUNT_OFFSET),
    headerSize: data.readBigUInt64BE(HEADER_SIZE_OFFSET),
    dataSize: data.readBigUInt64BE(DATA_SIZE_OFFSET)
  };
}

function encode(meta: Metadata): Buffer {
  const data = Buffer.alloc(METADATA_SIZE);
  PUP_MAGIC.copy(data, MAGIC_OFFSET);
  data.writeBigUInt64BE(PACKAGE_VERSION, PACKAGE_VERSION_OFFSET);
  data.writeBigUInt64BE(meta.imageVersion, IMAGE_VERSION_OFFSET);
  data.writeBigUInt64BE(meta.segCount, SEGMENT_COUNT_OFFSET);
  data.writeBigUInt64BE(meta.headerSize, HEADER_SIZE_OFFSET);
  data.writeBigUInt64BE(meta.dataSize, DATA_SIZE_OFFSET);
  return data;
}

export const metadataCodec: RegionCodec<Metadata> = { size: METADATA_SIZE, decode, encode };

/**
 * Header size for a package with `segCount` segments, rounded up to a 16-byte boundary.
 */
export function headerSizeFor(segCount: bigint): bigint {
  let size = BigInt(METADATA_SIZE);
  size = checkedAddU64(size, segCount * BigInt(LOCATION_ENTRY_SIZE));
  size = checkedAddU64(size, segCount * BigInt(DIGEST_ENTRY_SIZE));
  size = checkedAddU64(size, BigInt(DIGEST_SIZE));
  const remainder = size % HEADER_ALIGNMENT;
  return remainder === 0n ? size : checkedAddU64(size, HEADER_ALIGNMENT - remainder);
}

/**
 * Computes the metadata describing `segments` laid out after the header.
 * @throws {RangeError} If a size leaves the u64 range
 */
export function deriveMetadata(segments: readonly Segment[], imageVersion: bigint): Metadata {
  const segCount = BigInt(segments.length);
  const dataSize = segments.reduce((total, segment) => checkedAddU64(total, BigInt(segment.data.length)), 0n);
  return { imageVersion, segCount, headerSize: headerSizeFor(segCount), dataSize };
}
