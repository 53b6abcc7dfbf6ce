import { describe, expect, it } from "vitest";
import { renderPup, toPupSummary } from "../src/print.js";
import { createPup, type Pup } from "../src/types/pup.js";
import { createSegment } from "../src/types/segment.js";
import { SignatureKind } from "../src/types/signature-kind.js";
import { filledDigest } from "./helpers.js";

function samplePup(): Pup {
  const pup = createPup({ imageVersion: 0x10n });
  pup.segments.push(
    createSegment({ id: 0x100n, data: Buffer.from("hello") }),
    { id: 0x999n, sigKind: SignatureKind.HmacSha256, digest: filledDigest(0x01), data: Buffer.alloc(2) },
  );
  return pup;
}

describe("print", () => {
  it("renders known and unknown segments", () => {
    expect(renderPup(samplePup())).toEqual([
      "Image version: 0x10",
      "[Segments]",
      "  [version.txt]",
      "    Size: 5 bytes",
      `    Hash digest: ${"00".repeat(20)} (HMAC-SHA1)`,
      "  [ID: 0x999]",
      "    Size: 2 bytes",
      `    Hash digest: ${"01".repeat(20)} (HMAC-SHA256)`,
    ]);
  });

  it("renders an empty package", () => {
    expect(renderPup(createPup())).toEqual(["Image version: 0x0", "[Segments]"]);
  });

  it("summarizes a package as JSON-safe values", () => {
    expect(toPupSummary(samplePup())).toEqual({
      imageVersion: "0x10",
      segments: [
        { index: 0, id: "0x100", name: "version.txt", size: 5, digest: "00".repeat(20), sigKind: "HMAC-SHA1" },
        { index: 1, id: "0x999", name: null, size: 2, digest: "01".repeat(20), sigKind: "HMAC-SHA256" },
      ],
    });
  });
});
