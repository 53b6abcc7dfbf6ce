/**
 * Segment location table entry: where a segment's payload lives in the package.
 */
import { SignatureKind, signatureKindFromCode, signatureKindToCode } from '../types/signature-kind.js';
import { RegionCodec, takeWindow } from './region.js';

export const LOCATION_ENTRY_SIZE = 0x20;

export interface LocationEntry {
  readonly id: bigint;
  /** Absolute offset from the start of the package. */
  readonly offset: bigint;
  readonly size: bigint;
  readonly sigKind: SignatureKind;
}

function decode(window: Buffer): LocationEntry {
  const data = takeWindow(window, LOCATION_ENTRY_SIZE);
  return {
    id: data.readBigUInt64BE(0x00),
    offset: data.readBigUInt64BE(0x08),
    size: data.readBigUInt64BE(0x10),
    sigKind: signatureKindFromCode(data.readUInt32BE(0x18))
  };
}

function encode(entry: LocationEntry): Buffer {
  const data = Buffer.alloc(LOCATION_ENTRY_SIZE);
  data.writeBigUInt64BE(entry.id, 0x00);
  data.writeBigUInt64BE(entry.offset, 0x08);
  data.writeBigUInt64BE(entry.size, 0x10);
  data.writeUInt32BE(signatureKindToCode(entry.sigKind), 0x18);
  // 0x1c..0x20 reserved
  return data;
}

export const locationEntryCodec: RegionCodec<LocationEntry> = { size: LOCATION_ENTRY_SIZE, decode, encode };
