/**
 * Recursive chunk tree decoder.
 *
 * A chunk is a 12-byte header followed by exactly `size` payload bytes. The
 * payload of a container tag is a back-to-back run of child chunks; any other
 * payload is decoded by the content dispatcher.
 *
 * Containers are decoded in two ordered passes:
 *   1. every child chunk is framed and decoded;
 *   2. if the first child is a STRUCT, its payload is decoded again using the
 *      container's own tag and version. That STRUCT holds the container's
 *      typed data; the remaining children are extensions and sub-resources.
 */

import { BsfReader } from './binary-reader.js';
import { CHUNK_HEADER_SIZE, readChunkHeader, type BsfChunkHeader } from './chunk-header.js';
import { BsfChunkType, hasChildren } from './chunk-types.js';
import { decodeChunkContent, type ChunkContent } from './content.js';
import { BoundsError } from './errors.js';

export interface BsfChunk {
  header: BsfChunkHeader;
  content: ChunkContent;
  children: BsfChunk[];
}

export interface DecodedChunk {
  chunk: BsfChunk;
  /** Always CHUNK_HEADER_SIZE + header.size. */
  bytesConsumed: number;
}

/** Decode one chunk at the reader's position and advance past it. */
export function parseChunk(reader: BsfReader): BsfChunk {
  const header = readChunkHeader(reader);
  if (header.size > reader.remaining) {
    throw new BoundsError(header.offset, header.type, header.size, reader.remaining);
  }
  const payload = reader.slice(header.size);

  if (!hasChildren(header.type)) {
    return {
      header,
      content: decodeChunkContent(header.type, header.version, payload),
      children: [],
    };
  }

  // Pass 1: children.
  const children = parseChunks(payload);

  // Pass 2: the leading STRUCT child carries the container's own data.
  const first = children[0];
  let content: ChunkContent = { kind: 'marker', type: header.type };
  if (first && first.header.type === BsfChunkType.STRUCT && first.content.kind === 'struct') {
    const structReader = new BsfReader(first.content.bytes, first.header.offset + CHUNK_HEADER_SIZE);
    content = decodeChunkContent(header.type, header.version, structReader);
  }

  return { header, content, children };
}

/** Decode sibling chunks until the reader is exhausted. */
export function parseChunks(reader: BsfReader): BsfChunk[] {
  const chunks: BsfChunk[] = [];
  while (!reader.isAtEnd) {
    chunks.push(parseChunk(reader));
  }
  return chunks;
}

/** Decode the chunk at the start of `bytes` and report how much of it was used. */
export function decodeChunk(bytes: ArrayBuffer | Uint8Array): DecodedChunk {
  const reader = BsfReader.from(bytes);
  const chunk = parseChunk(reader);
  return { chunk, bytesConsumed: reader.position };
}

export class BsfParser {
  /**
   * Parse the root chunk of a file (a clump, texture dictionary or world).
   * Bytes after the root chunk are ignored.
   */
  static parse(buffer: ArrayBuffer | Uint8Array): BsfChunk {
    return decodeChunk(buffer).chunk;
  }

  /** Parse every root-level chunk in the buffer. */
  static parseAll(buffer: ArrayBuffer | Uint8Array): BsfChunk[] {
    return parseChunks(BsfReader.from(buffer));
  }
}
