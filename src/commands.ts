/**
 * File-level package commands used by the CLI.
 * Edits read and decode the package first; nothing is written unless the edit succeeds.
 */
import { readFile, writeFile } from 'node:fs/promises';
import { PupCommandError } from './errors.js';
import { PupBinary } from './pup-binary.js';
import { renderPup, toPupSummary } from './print.js';
import { extractSegment, insertSegment, removeSegment } from './segments.js';
import { createPup, Pup } from './types/pup.js';
import { createSegment } from './types/segment.js';

async function readSegmentFile(segmentPath: string): Promise<Buffer> {
  try {
    return await readFile(segmentPath);
  } catch (error) {
    throw new PupCommandError(`failed to read from '${segmentPath}': ${error instanceof Error ? error.message : String(error)}`, error);
  }
}

async function modifyPupAtPath(pupPath: string, edit: (pup: Pup) => Promise<void> | void): Promise<Pup> {
  const pup = await PupBinary.read({ filePath: pupPath });
  await edit(pup);
  await PupBinary.write({ pup, outputPath: pupPath });
  return pup;
}

export async function createPupFile({ pupPath, imageVersion }: { readonly pupPath: string; readonly imageVersion: bigint }): Promise<void> {
  await PupBinary.write({ pup: createPup({ imageVersion }), outputPath: pupPath });
}

/**
 * Returns the lines to print for the package at `pupPath`.
 */
export async function printPupFile({ pupPath, json = false }: { readonly pupPath: string; readonly json?: boolean }): Promise<string[]> {
  const pup = await PupBinary.read({ filePath: pupPath });
  return json ? [JSON.stringify(toPupSummary(pup), null, 2)] : renderPup(pup);
}

export async function extractSegmentFile({ pupPath, index, segmentPath }: { readonly pupPath: string; readonly index: number; readonly segmentPath: string }): Promise<number> {
  const pup = await PupBinary.read({ filePath: pupPath });
  const data = extractSegment(pup, index);
  try {
    await writeFile(segmentPath, data);
  } catch (error) {
    throw new PupCommandError(`failed to write to '${segmentPath}': ${error instanceof Error ? error.message : String(error)}`, error);
  }
  return data.length;
}

export async function insertSegmentFile({ pupPath, index, segmentPath, id }: { readonly pupPath: string; readonly index: number; readonly segmentPath: string; readonly id: bigint }): Promise<Pup> {
  return modifyPupAtPath(pupPath, async (pup) => {
    insertSegment(pup, index, createSegment({ id, data: await readSegmentFile(segmentPath) }));
  });
}

export async function removeSegmentFile({ pupPath, index }: { readonly pupPath: string; readonly index: number }): Promise<Pup> {
  return modifyPupAtPath(pupPath, (pup) => {
    removeSegment(pup, index);
  });
}
