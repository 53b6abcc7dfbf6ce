/**
 * Segment editing operations and option parsing for segment commands.
 */
import { basename, extname } from 'node:path';
import { segmentIdFromFileName } from './constants/segment-ids.js';
import { PupCommandError, SegmentIndexError } from './errors.js';
import type { Pup } from './types/pup.js';
import type { Segment } from './types/segment.js';

/**
 * Inserts `segment` before position `index`; `index === segments.length` appends.
 * @throws {SegmentIndexError} If `index` is past the end
 */
export function insertSegment(pup: Pup, index: number, segment: Segment): void {
  if (index < 0 || index > pup.segments.length) {
    throw new SegmentIndexError(`index '${index}' is out-of-bounds`);
  }
  pup.segments.splice(index, 0, segment);
}

/**
 * Removes the segment at `index`, clamping to the last segment when `index` is past the end.
 * @throws {SegmentIndexError} If the package has no segments
 */
export function removeSegment(pup: Pup, index: number): Segment {
  if (pup.segments.length === 0) {
    throw new SegmentIndexError('PUP has no segments');
  }
  const target = Math.min(index, pup.segments.length - 1);
  const [removed] = pup.segments.splice(target, 1);
  if (!removed) {
    throw new SegmentIndexError(`index '${index}' is out-of-bounds`);
  }
  return removed;
}

/**
 * @throws {SegmentIndexError} If there is no segment at `index`
 */
export function extractSegment(pup: Pup, index: number): Buffer {
  const segment = pup.segments[index];
  if (!segment) {
    throw new SegmentIndexError(`index '${index}' is out-of-bounds`);
  }
  return segment.data;
}

/**
 * Parses a `--index` value. Missing means 0.
 */
export function parseSegmentIndex(text: string | undefined): number {
  if (text === undefined) {
    return 0;
  }
  if (!/^\d+$/.test(text)) {
    throw new PupCommandError(`failed to parse segment index: '${text}' is not a non-negative integer`);
  }
  return Number.parseInt(text, 10);
}

/**
 * Parses an unsigned 64-bit option value, decimal or `0x` hexadecimal.
 */
export function parseU64(text: string, label: string): bigint {
  if (!/^(?:\d+|0[xX][0-9a-fA-F]+)$/.test(text)) {
    throw new PupCommandError(`failed to parse ${label}: '${text}' is not an unsigned integer`);
  }
  const value = BigInt(text);
  if (value > 0xffff_ffff_ffff_ffffn) {
    throw new PupCommandError(`failed to parse ${label}: '${text}' does not fit in 64 bits`);
  }
  return value;
}

/**
 * Resolves the ID for an inserted segment. Without `--id`, the segment file's stem is
 * looked up in the known IDs, falling back to 0.
 */
export function parseSegmentId(text: string | undefined, segmentPath: string): bigint {
  if (text !== undefined) {
    return parseU64(text, 'segment ID');
  }
  const stem = basename(segmentPath, extname(segmentPath));
  return segmentIdFromFileName(stem) ?? 0n;
}
