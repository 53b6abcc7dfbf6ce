/**
 * Signature kind recorded for each segment in the location table.
 */
import { PupError } from '../errors.js';

export const SignatureKind = {
  HmacSha1: 'HMAC-SHA1',
  HmacSha256: 'HMAC-SHA256'
} as const;

export type SignatureKind = (typeof SignatureKind)[keyof typeof SignatureKind];

const SIGNATURE_KIND_CODES: ReadonlyMap<number, SignatureKind> = new Map([
  [0, SignatureKind.HmacSha1],
  [2, SignatureKind.HmacSha256]
]);

/**
 * Maps an on-disk u32 code to its signature kind.
 * @throws {PupError} With reason `invalid-signature-kind` for unknown codes
 */
export function signatureKindFromCode(code: number): SignatureKind {
  const kind = SIGNATURE_KIND_CODES.get(code);
  if (kind === undefined) {
    throw new PupError({ kind: 'invalid-signature-kind', code });
  }
  return kind;
}

export function signatureKindToCode(sigKind: SignatureKind): number {
  return sigKind === SignatureKind.HmacSha1 ? 0 : 2;
}
