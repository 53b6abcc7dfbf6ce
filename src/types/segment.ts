/**
 * In-memory segment of an update package.
 */
import { SignatureKind } from './signature-kind.js';

/** Size in bytes of a segment digest and of the header digest. */
export const DIGEST_SIZE = 0x14;

export interface Segment {
  /** Segment ID. Usually maps to a file name, see `segmentFileName`. */
  readonly id: bigint;
  readonly sigKind: SignatureKind;
  /** Stored 20-byte digest. Carried verbatim, never computed here. */
  readonly digest: Buffer;
  readonly data: Buffer;
}

/**
 * Builds a fresh segment. The digest stays zeroed until a signing tool fills it in.
 */
export function createSegment({ id, data, sigKind = SignatureKind.HmacSha1 }: { readonly id: bigint; readonly data: Buffer; readonly sigKind?: SignatureKind }): Segment {
  return { id, sigKind, digest: Buffer.alloc(DIGEST_SIZE), data };
}
