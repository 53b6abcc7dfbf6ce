import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  createPupFile,
  extractSegmentFile,
  insertSegmentFile,
  printPupFile,
  removeSegmentFile,
} from "../src/commands.js";
import { PupCommandError, SegmentIndexError } from "../src/errors.js";

describe("commands", () => {
  let dir: string;
  let pupPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pupkit-"));
    pupPath = join(dir, "update.pup");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates an empty package file", async () => {
    await createPupFile({ pupPath, imageVersion: 0x20n });

    const data = await readFile(pupPath);
    expect(data.length).toBe(0x50);
    expect(data.readBigUInt64BE(0x10)).toBe(0x20n);
  });

  it("inserts, prints, extracts and removes a segment", async () => {
    const segmentPath = join(dir, "version.txt");
    await writeFile(segmentPath, "4.90\n");
    await createPupFile({ pupPath, imageVersion: 1n });

    const inserted = await insertSegmentFile({ pupPath, index: 0, segmentPath, id: 0x100n });
    expect(inserted.segments).toHaveLength(1);
    expect((await readFile(pupPath)).length).toBe(0x90 + 5);

    expect(await printPupFile({ pupPath })).toEqual([
      "Image version: 0x1",
      "[Segments]",
      "  [version.txt]",
      "    Size: 5 bytes",
      `    Hash digest: ${"00".repeat(20)} (HMAC-SHA1)`,
    ]);

    const outPath = join(dir, "out.txt");
    expect(await extractSegmentFile({ pupPath, index: 0, segmentPath: outPath })).toBe(5);
    expect(await readFile(outPath, "utf8")).toBe("4.90\n");

    const removed = await removeSegmentFile({ pupPath, index: 0 });
    expect(removed.segments).toHaveLength(0);
    expect((await readFile(pupPath)).length).toBe(0x50);
  });

  it("prints a JSON summary", async () => {
    await createPupFile({ pupPath, imageVersion: 0xffn });

    const [json] = await printPupFile({ pupPath, json: true });
    expect(JSON.parse(json ?? "")).toEqual({ imageVersion: "0xff", segments: [] });
  });

  it("leaves a corrupt package untouched", async () => {
    const corrupt = Buffer.alloc(0x50, 0x41);
    await writeFile(pupPath, corrupt);

    await expect(removeSegmentFile({ pupPath, index: 0 })).rejects.toThrow(PupCommandError);
    expect((await readFile(pupPath)).equals(corrupt)).toBe(true);
  });

  it("does not write when the edit fails", async () => {
    await createPupFile({ pupPath, imageVersion: 1n });
    const before = await readFile(pupPath);

    await expect(removeSegmentFile({ pupPath, index: 0 })).rejects.toThrow(SegmentIndexError);
    expect((await readFile(pupPath)).equals(before)).toBe(true);
  });

  it("reports an unreadable package path", async () => {
    await expect(printPupFile({ pupPath: join(dir, "missing.pup") })).rejects.toThrow("failed to read from");
  });
});
