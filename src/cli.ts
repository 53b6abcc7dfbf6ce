#!/usr/bin/env node
/**
 * pupkit - CLI Interface
 *
 * Command-line interface for creating, inspecting and editing update packages.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { formatCliError } from './errors.js';
import { createPupFile, extractSegmentFile, insertSegmentFile, printPupFile, removeSegmentFile } from './commands.js';
import { parseSegmentId, parseSegmentIndex, parseU64 } from './segments.js';

const program = new Command();

// Version is set at build time
const version = '0.1.0';

program
  .name('pupkit')
  .description('Create, inspect and edit PS3 update packages (PUP)')
  .version(version)
  .requiredOption('-f, --file <pup>', 'PUP file path');

function pupPath(): string {
  return resolve(program.opts<{ file: string }>().file);
}

async function run(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    console.error(formatCliError(error));
    process.exit(1);
  }
}

program
  .command('create')
  .description('Creates an empty PUP')
  .option('-g, --image-version <version>', 'PUP image version', '0')
  .action(async (options: { imageVersion: string }) => {
    await run(async () => {
      const imageVersion = parseU64(options.imageVersion, 'image version');
      await createPupFile({ pupPath: pupPath(), imageVersion });
      console.log(`Created empty PUP at: ${pupPath()}`);
    });
  });

program
  .command('print')
  .description('Prints a textual representation of a PUP')
  .option('--json', 'Print a JSON summary instead of text')
  .action(async (options: { json?: boolean }) => {
    await run(async () => {
      const lines = await printPupFile({ pupPath: pupPath(), json: options.json === true });
      for (const line of lines) {
        console.log(line);
      }
    });
  });

const segment = program
  .command('segment')
  .description('Segment-related subcommands')
  .option('-n, --index <index>', 'Segment index (default: 0)');

function segmentIndex(): number {
  return parseSegmentIndex(segment.opts<{ index?: string }>().index);
}

segment
  .command('extract')
  .description('Extracts a segment from a PUP')
  .requiredOption('-s, --segment <path>', 'Segment file path')
  .action(async (options: { segment: string }) => {
    await run(async () => {
      const segmentPath = resolve(options.segment);
      const size = await extractSegmentFile({ pupPath: pupPath(), index: segmentIndex(), segmentPath });
      console.log(`Extracted ${size} bytes to: ${segmentPath}`);
    });
  });

segment
  .command('insert')
  .description('Inserts a segment into a PUP')
  .requiredOption('-s, --segment <path>', 'Segment file path')
  .option('-x, --id <id>', 'Segment ID (default: looked up from the file name, else 0)')
  .action(async (options: { segment: string; id?: string }) => {
    await run(async () => {
      const segmentPath = resolve(options.segment);
      const id = parseSegmentId(options.id, segmentPath);
      const pup = await insertSegmentFile({ pupPath: pupPath(), index: segmentIndex(), segmentPath, id });
      console.log(`Inserted segment 0x${id.toString(16)}; PUP now has ${pup.segments.length} segments`);
    });
  });

segment
  .command('remove')
  .description('Removes a segment from a PUP')
  .action(async () => {
    await run(async () => {
      const pup = await removeSegmentFile({ pupPath: pupPath(), index: segmentIndex() });
      console.log(`Removed segment; PUP now has ${pup.segments.length} segments`);
    });
  });

await program.parseAsync();
