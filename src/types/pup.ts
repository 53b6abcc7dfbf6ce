/**
 * Decoded update package: ordered segments plus the image version.
 */
import { Segment } from './segment.js';

export interface Pup {
  /** Segment order is the segment index used by both header tables. */
  readonly segments: Segment[];
  readonly imageVersion: bigint;
}

/**
 * Allocates an empty package.
 */
export function createPup({ imageVersion = 0n }: { readonly imageVersion?: bigint } = {}): Pup {
  return { segments: [], imageVersion };
}
