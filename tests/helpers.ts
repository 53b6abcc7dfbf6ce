import { PupError, type PupErrorReason } from "../src/errors.js";

/**
 * Runs `action` and returns the reason of the PupError it throws.
 */
export function pupErrorReason(action: () => unknown): PupErrorReason {
  try {
    action();
  } catch (error) {
    if (error instanceof PupError) {
      return error.reason;
    }
    throw error;
  }
  throw new Error("expected a PupError");
}

export function filledDigest(byte: number): Buffer {
  return Buffer.alloc(0x14, byte);
}
