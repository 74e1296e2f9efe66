/**
 * IMG/DIR archive reader (version 1).
 *
 * A version 1 archive is a pair of files:
 *   .dir  a flat table of 32-byte entries
 *   .img  the file data, addressed in 2048-byte sectors
 *
 * Directory entry:
 *   [0..3]    Data offset in sectors (little-endian uint32)
 *   [4..7]    Data size in sectors (little-endian uint32)
 *   [8..31]   NUL-padded ASCII file name
 */

import { isAbsolute, relative, resolve, sep } from 'node:path';

export interface ImgFileEntry {
  /** File name as stored in the directory */
  name: string;
  /** Byte offset of file data within the .img */
  offset: number;
  /** Byte size of the file data (whole sectors) */
  size: number;
}

export interface ImgArchive {
  entries: ImgFileEntry[];
}

export const IMG_SECTOR_SIZE = 2048;
export const DIR_ENTRY_SIZE = 32;
const NAME_LENGTH = 24;

export class ImgArchiveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ImgArchiveError';
  }
}

export class ImgArchiveReader {
  /**
   * Parse a .dir file into its entry table.
   */
  static parseDirectory(buffer: ArrayBuffer | Uint8Array): ImgArchive {
    const bytes = buffer instanceof Uint8Array ? buffer : new Uint8Array(buffer);
    if (bytes.byteLength % DIR_ENTRY_SIZE !== 0) {
      throw new ImgArchiveError(
        `Directory size ${bytes.byteLength} is not a multiple of ${DIR_ENTRY_SIZE}`,
      );
    }

    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const decoder = new TextDecoder('ascii');
    const entries: ImgFileEntry[] = [];

    for (let cursor = 0; cursor < bytes.byteLength; cursor += DIR_ENTRY_SIZE) {
      const offsetSectors = view.getUint32(cursor, true);
      const sizeSectors = view.getUint32(cursor + 4, true);

      const nameBytes = bytes.subarray(cursor + 8, cursor + 8 + NAME_LENGTH);
      const end = nameBytes.indexOf(0);
      const name = decoder.decode(end === -1 ? nameBytes : nameBytes.subarray(0, end));

      entries.push({
        name,
        offset: offsetSectors * IMG_SECTOR_SIZE,
        size: sizeSectors * IMG_SECTOR_SIZE,
      });
    }

    return { entries };
  }

  /**
   * Extract the raw bytes for a single entry from the .img buffer.
   */
  static extractFile(img: ArrayBuffer | Uint8Array, entry: ImgFileEntry): Uint8Array {
    const bytes = img instanceof Uint8Array ? img : new Uint8Array(img);
    if (entry.offset + entry.size > bytes.byteLength) {
      throw new ImgArchiveError(
        `Entry "${entry.name}" extends beyond image: ` +
          `offset=${entry.offset}, size=${entry.size}, imageLength=${bytes.byteLength}`,
      );
    }
    return bytes.subarray(entry.offset, entry.offset + entry.size);
  }

  /**
   * Path an entry extracts to under `outputDir`.
   * Names that would resolve outside `outputDir` are rejected.
   */
  static outputPath(outputDir: string, entry: ImgFileEntry): string {
    const root = resolve(outputDir);
    const target = resolve(root, entry.name);
    const rel = relative(root, target);
    if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new ImgArchiveError(`Entry "${entry.name}" resolves outside ${root}`);
    }
    return target;
  }

  /**
   * Find an entry by name (case-insensitive).
   */
  static findEntry(archive: ImgArchive, name: string): ImgFileEntry | undefined {
    const lower = name.toLowerCase();
    return archive.entries.find((e) => e.name.toLowerCase() === lower);
  }

  /**
   * List all entries whose name ends with the given extension (case-insensitive).
   * The extension should include the dot, e.g. ".dff".
   */
  static listByExtension(archive: ImgArchive, ext: string): ImgFileEntry[] {
    const lowerExt = ext.toLowerCase();
    return archive.entries.filter((e) => e.name.toLowerCase().endsWith(lowerExt));
  }
}
