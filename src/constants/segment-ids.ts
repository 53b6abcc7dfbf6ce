/**
 * Known segment IDs and the file names they stand for.
 * Display-only: the codec never consults this table.
 */
export const SEGMENT_FILE_NAMES: ReadonlyMap<bigint, string> = new Map([
  [0x100n, 'version.txt'],
  [0x101n, 'license.xml'],
  [0x102n, 'promo_flags.txt'],
  [0x103n, 'update_flags.txt'],
  [0x104n, 'patch_build.txt'],
  [0x200n, 'ps3swu.self'],
  [0x201n, 'vsh.tar'],
  [0x202n, 'dots.txt'],
  [0x203n, 'patch_data.pkg'],
  [0x300n, 'update_files.tar'],
  [0x501n, 'spkg_hdr.tar'],
  [0x601n, 'ps3swu2.self']
]);

/**
 * Translates a segment ID to its known file name.
 *
 * @param id - Segment ID
 * @returns File name, or null if the ID is not a known one
 */
export function segmentFileName(id: bigint): string | null {
  return SEGMENT_FILE_NAMES.get(id) ?? null;
}

/**
 * Reverse lookup, matching either the full file name or its stem (`vsh` or `vsh.tar`).
 */
export function segmentIdFromFileName(name: string): bigint | null {
  for (const [id, fileName] of SEGMENT_FILE_NAMES) {
    if (fileName === name || fileName.slice(0, fileName.lastIndexOf('.')) === name) {
      return id;
    }
  }
  return null;
}
