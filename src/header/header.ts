/**
 * Header assembly: metadata, location table, digest table and header digest.
 * The header is rebuilt from the segments on every encode and never edited in place.
 */
import { PupError } from '../errors.js';
import type { Pup } from '../types/pup.js';
import { DIGEST_SIZE } from '../types/segment.js';
import { DigestEntry, DIGEST_ENTRY_SIZE, digestEntryCodec } from './digest-entry.js';
import { LocationEntry, LOCATION_ENTRY_SIZE, locationEntryCodec } from './location-entry.js';
import { deriveMetadata, Metadata, metadataCodec, METADATA_SIZE } from './metadata.js';
import { checkedAddU64 } from './region.js';
import { decodeTable, encodeTable } from './table.js';

export interface Header {
  readonly meta: Metadata;
  readonly segTable: LocationEntry[];
  readonly digestTable: DigestEntry[];
  /** Opaque; stored and written back but never verified. */
  readonly headerDigest: Buffer;
}

/**
 * Sequential reader over the header bytes. Every slice is bounds-checked.
 */
class HeaderReader {
  private offset = 0;

  constructor(private readonly buffer: Buffer) {}

  take(length: bigint): Buffer {
    const end = BigInt(this.offset) + length;
    if (end > BigInt(this.buffer.length)) {
      throw new PupError({ kind: 'undersized' });
    }
    const slice = this.buffer.subarray(this.offset, Number(end));
    this.offset = Number(end);
    return slice;
  }
}

/**
 * Parses the header at the start of `buffer`.
 * @throws {PupError} If any region runs past the end of the buffer or fails to decode
 */
export function decodeHeader(buffer: Buffer): Header {
  const reader = new HeaderReader(buffer);

  const meta = metadataCodec.decode(reader.take(BigInt(METADATA_SIZE)));
  const segTable = decodeTable(locationEntryCodec, reader.take(meta.segCount * BigInt(LOCATION_ENTRY_SIZE)));
  const digestTable = decodeTable(digestEntryCodec, reader.take(meta.segCount * BigInt(DIGEST_ENTRY_SIZE)));
  const headerDigest = Buffer.from(reader.take(BigInt(DIGEST_SIZE)));

  return { meta, segTable, digestTable, headerDigest };
}

/**
 * Builds the header describing `pup`, with segment payloads laid out contiguously in
 * index order right after the header.
 * @throws {RangeError} If an offset leaves the u64 range
 */
export function deriveHeader(pup: Pup): Header {
  const meta = deriveMetadata(pup.segments, pup.imageVersion);

  let offset = meta.headerSize;
  const segTable: LocationEntry[] = pup.segments.map((segment) => {
    const size = BigInt(segment.data.length);
    const entry: LocationEntry = { id: segment.id, offset, size, sigKind: segment.sigKind };
    offset = checkedAddU64(offset, size);
    return entry;
  });

  const digestTable: DigestEntry[] = pup.segments.map((segment, index) => ({
    segIndex: BigInt(index),
    digest: segment.digest
  }));

  return { meta, segTable, digestTable, headerDigest: Buffer.alloc(DIGEST_SIZE) };
}

/**
 * Serializes `header`, zero-padded to `meta.headerSize`.
 */
export function encodeHeader(header: Header): Buffer {
  const parts = [
    metadataCodec.encode(header.meta),
    encodeTable(locationEntryCodec, header.segTable),
    encodeTable(digestEntryCodec, header.digestTable),
    header.headerDigest.subarray(0, DIGEST_SIZE)
  ];
  const unpadded = parts.reduce((total, part) => total + part.length, 0);
  if (BigInt(unpadded) > header.meta.headerSize) {
    throw new Error(`Header content (${unpadded} bytes) exceeds declared header size ${header.meta.headerSize}`);
  }

  const buffer = Buffer.alloc(Number(header.meta.headerSize));
  let offset = 0;
  for (const part of parts) {
    part.copy(buffer, offset);
    offset += part.length;
  }
  return buffer;
}
