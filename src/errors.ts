/**
 * Error types raised while decoding and editing update packages.
 */

export type PupErrorReason =
  | { readonly kind: 'undersized' }
  | { readonly kind: 'invalid-magic'; readonly magic: Buffer }
  | { readonly kind: 'unsupported-package-version'; readonly version: bigint }
  | { readonly kind: 'invalid-signature-kind'; readonly code: number }
  | { readonly kind: 'missing-digest'; readonly index: number }
  | { readonly kind: 'missing-data'; readonly index: number };

function describe(reason: PupErrorReason): string {
  switch (reason.kind) {
    case 'undersized':
      return 'PUP is too small';
    case 'invalid-magic':
      return `magic '${reason.magic.toString('latin1').replace(/\0+$/, '')}' is invalid`;
    case 'unsupported-package-version':
      return `package version '${reason.version}' is unsupported`;
    case 'invalid-signature-kind':
      return `signature kind '${reason.code}' is invalid`;
    case 'missing-digest':
      return `digest for segment ${reason.index} is missing`;
    case 'missing-data':
      return `data for segment ${reason.index} is missing`;
  }
}

/**
 * Malformed package data. Decoding stops at the first violation.
 */
export class PupError extends Error {
  readonly reason: PupErrorReason;

  constructor(reason: PupErrorReason) {
    super(describe(reason));
    this.name = 'PupError';
    this.reason = reason;
  }
}

/**
 * Segment index outside the range an edit accepts.
 */
export class SegmentIndexError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SegmentIndexError';
  }
}

/**
 * Command-level failure: bad option values or unreadable/unwritable files.
 */
export class PupCommandError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'PupCommandError';
  }
}

/**
 * Formats a failure the way the CLI reports it.
 *
 * @param error - Anything thrown by a command
 * @returns `error: <message>`
 */
export function formatCliError(error: unknown): string {
  return `error: ${error instanceof Error ? error.message : String(error)}`;
}
