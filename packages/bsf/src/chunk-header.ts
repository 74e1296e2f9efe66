import type { BsfReader } from './binary-reader.js';
import { unpackLibraryId } from './version.js';

/** Size of every chunk header in bytes. */
export const CHUNK_HEADER_SIZE = 12;

export interface BsfChunkHeader {
  /** Chunk type id (see BsfChunkType); unknown values are legal. */
  type: number;
  /** Exact payload size in bytes, excluding this header. */
  size: number;
  /** Packed library id as stored. */
  libraryId: number;
  /** Format version unpacked from `libraryId`. */
  version: number;
  /** Build number unpacked from `libraryId` (0 for old-style ids). */
  build: number;
  /** Absolute byte offset of the header in the decoded buffer. */
  offset: number;
}

/** Read a 12-byte chunk header. The payload is not bounds-checked here. */
export function readChunkHeader(reader: BsfReader): BsfChunkHeader {
  const offset = reader.absolutePosition;
  const type = reader.readUint32();
  const size = reader.readUint32();
  const libraryId = reader.readUint32();
  const { version, build } = unpackLibraryId(libraryId);
  return { type, size, libraryId, version, build, offset };
}
