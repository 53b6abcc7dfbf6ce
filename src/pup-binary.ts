/**
 * Update package (PUP) binary codec and file helpers.
 */
import { readFile, writeFile } from 'node:fs/promises';
import { PupCommandError, PupError } from './errors.js';
import { decodeHeader, deriveHeader, encodeHeader, Header } from './header/header.js';
import type { DigestEntry } from './header/digest-entry.js';
import type { LocationEntry } from './header/location-entry.js';
import type { Pup } from './types/pup.js';
import type { Segment } from './types/segment.js';

function findDigest(digestTable: readonly DigestEntry[], index: number): Buffer {
  // Digest entries are not guaranteed to be stored in segment order.
  const match = digestTable.find((entry) => entry.segIndex === BigInt(index));
  if (!match) {
    throw new PupError({ kind: 'missing-digest', index });
  }
  return match.digest;
}

/**
 * Copies a segment payload out of `buffer` so the package does not keep the input alive.
 */
function sliceSegmentData(buffer: Buffer, entry: LocationEntry, index: number): Buffer {
  const end = entry.offset + entry.size;
  if (end > BigInt(buffer.length)) {
    throw new PupError({ kind: 'missing-data', index });
  }
  return Buffer.from(buffer.subarray(Number(entry.offset), Number(end)));
}

function buildSegments(buffer: Buffer, header: Header): Segment[] {
  return header.segTable.map((entry, index) => ({
    id: entry.id,
    sigKind: entry.sigKind,
    digest: findDigest(header.digestTable, index),
    data: sliceSegmentData(buffer, entry, index)
  }));
}

/**
 * PUP (update package) binary processing.
 * Decoding and encoding are pure; `read` and `write` add the file layer on top.
 */
export class PupBinary {
  /** Error class for malformed package data. */
  static readonly Error: typeof PupError = PupError;

  /**
   * Parses a complete package buffer.
   *
   * @param buffer - Package bytes
   * @returns Decoded package with segments in location-table order
   * @throws {PupError} On the first violated format invariant; no partial package is returned
   */
  static decode({ buffer }: { readonly buffer: Buffer }): Pup {
    const header = decodeHeader(buffer);
    return {
      segments: buildSegments(buffer, header),
      imageVersion: header.meta.imageVersion
    };
  }

  /**
   * Serializes a package. The header is derived from the current segments, so the
   * output always has contiguous payloads starting at the header size.
   *
   * @param pup - Package to serialize
   * @returns Fresh buffer of exactly `headerSize + dataSize` bytes
   * @throws {RangeError} If the package cannot be laid out within u64 sizes, or a digest is not 20 bytes
   */
  static encode({ pup }: { readonly pup: Pup }): Buffer {
    const header = deriveHeader(pup);
    const buffer = Buffer.alloc(Number(header.meta.headerSize + header.meta.dataSize));

    encodeHeader(header).copy(buffer, 0);
    // segTable was derived from pup.segments, so entries and segments line up by index.
    header.segTable.forEach((entry: LocationEntry, index: number) => {
      pup.segments[index].data.copy(buffer, Number(entry.offset));
    });
    return buffer;
  }

  /**
   * Reads and decodes a package file.
   *
   * @throws {PupCommandError} If the file cannot be read or parsed
   */
  static async read({ filePath }: { readonly filePath: string }): Promise<Pup> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (error) {
      throw new PupCommandError(`failed to read from '${filePath}': ${error instanceof Error ? error.message : String(error)}`, error);
    }

    try {
      return PupBinary.decode({ buffer });
    } catch (error) {
      if (error instanceof PupError) {
        throw new PupCommandError(`failed to parse PUP at '${filePath}': ${error.message}`, error);
      }
      throw error;
    }
  }

  /**
   * Encodes a package and writes it to disk.
   *
   * @throws {PupCommandError} If the file cannot be written
   */
  static async write({ pup, outputPath }: { readonly pup: Pup; readonly outputPath: string }): Promise<void> {
    const buffer = PupBinary.encode({ pup });
    try {
      await writeFile(outputPath, buffer);
    } catch (error) {
      throw new PupCommandError(`failed to write to '${outputPath}': ${error instanceof Error ? error.message : String(error)}`, error);
    }
  }
}
