import { describe, expect, it } from "vitest";
import { formatCliError, PupCommandError, PupError } from "../src/errors.js";

describe("errors", () => {
  it("describes each decode failure", () => {
    expect(new PupError({ kind: "undersized" }).message).toBe("PUP is too small");
    expect(new PupError({ kind: "invalid-magic", magic: Buffer.from("XXXXX\0\0\0", "latin1") }).message).toBe(
      "magic 'XXXXX' is invalid",
    );
    expect(new PupError({ kind: "unsupported-package-version", version: 2n }).message).toBe(
      "package version '2' is unsupported",
    );
    expect(new PupError({ kind: "missing-digest", index: 1 }).message).toBe("digest for segment 1 is missing");
  });

  it("formats CLI failures as the bare message", () => {
    expect(formatCliError(new PupCommandError("failed to read from '/x.pup': gone"))).toBe(
      "error: failed to read from '/x.pup': gone",
    );
    expect(formatCliError("plain")).toBe("error: plain");
  });
});
