/**
 * Human-readable and JSON renderings of a decoded package.
 */
import { segmentFileName } from './constants/segment-ids.js';
import type { Pup } from './types/pup.js';
import type { SignatureKind } from './types/signature-kind.js';

/**
 * JSON-serializable segment summary. u64 values are encoded as `0x` hex strings.
 */
export interface SegmentSummary {
  readonly index: number;
  readonly id: string;
  readonly name: string | null;
  readonly size: number;
  readonly digest: string;
  readonly sigKind: SignatureKind;
}

export interface PupSummary {
  readonly imageVersion: string;
  readonly segments: readonly SegmentSummary[];
}

function hex(value: bigint): string {
  return `0x${value.toString(16)}`;
}

/**
 * Builds a JSON-serializable summary of a package.
 *
 * @param pup - Decoded package
 * @returns Summary with u64 values and digests as hex strings
 */
export function toPupSummary(pup: Pup): PupSummary {
  return {
    imageVersion: hex(pup.imageVersion),
    segments: pup.segments.map((segment, index) => ({
      index,
      id: hex(segment.id),
      name: segmentFileName(segment.id),
      size: segment.data.length,
      digest: segment.digest.toString('hex'),
      sigKind: segment.sigKind
    }))
  };
}

/**
 * Renders a package as text, one array element per output line.
 * Segments with a known ID are shown by file name, others by `ID: 0x…`.
 *
 * @param pup - Decoded package
 * @returns Lines to print
 */
export function renderPup(pup: Pup): string[] {
  const lines: string[] = [`Image version: ${hex(pup.imageVersion)}`, '[Segments]'];
  for (const segment of pup.segments) {
    lines.push(`  [${segmentFileName(segment.id) ?? `ID: ${hex(segment.id)}`}]`);
    lines.push(`    Size: ${segment.data.length} bytes`);
    lines.push(`    Hash digest: ${segment.digest.toString('hex')} (${segment.sigKind})`);
  }
  return lines;
}
