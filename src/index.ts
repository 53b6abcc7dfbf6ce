/**
 * pupkit - Main entry point
 *
 * Byte-exact codec for PS3 update packages (PUP).
 */

// Package codec
export { PupBinary } from './pup-binary.js';
export { PupError, SegmentIndexError, PupCommandError } from './errors.js';
export type { PupErrorReason } from './errors.js';

// Header regions
export { decodeHeader, deriveHeader, encodeHeader } from './header/header.js';
export type { Header } from './header/header.js';
export { metadataCodec, deriveMetadata, headerSizeFor, PUP_MAGIC, PACKAGE_VERSION, METADATA_SIZE } from './header/metadata.js';
export type { Metadata } from './header/metadata.js';
export { locationEntryCodec, LOCATION_ENTRY_SIZE } from './header/location-entry.js';
export type { LocationEntry } from './header/location-entry.js';
export { digestEntryCodec, DIGEST_ENTRY_SIZE } from './header/digest-entry.js';
export type { DigestEntry } from './header/digest-entry.js';
export { decodeTable, encodeTable } from './header/table.js';
export type { RegionCodec } from './header/region.js';

// Values
export { createPup } from './types/pup.js';
export type { Pup } from './types/pup.js';
export { createSegment, DIGEST_SIZE } from './types/segment.js';
export type { Segment } from './types/segment.js';
export { SignatureKind, signatureKindFromCode, signatureKindToCode } from './types/signature-kind.js';

// Segment IDs, editing and rendering
export { SEGMENT_FILE_NAMES, segmentFileName, segmentIdFromFileName } from './constants/segment-ids.js';
export { insertSegment, removeSegment, extractSegment, parseSegmentIndex, parseSegmentId, parseU64 } from './segments.js';
export { renderPup, toPupSummary } from './print.js';
export type { PupSummary, SegmentSummary } from './print.js';
