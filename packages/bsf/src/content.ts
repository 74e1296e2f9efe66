/**
 * Chunk content union and the (type, version) -> decoder mapping.
 */

import { BsfReader, decodeText } from './binary-reader.js';
import { BsfChunkType, hasChildren, isKnownChunkType } from './chunk-types.js';
import { decodeGeometry, type BsfGeometry } from './geometry.js';
import { decodeMaterial, type BsfMaterial } from './material.js';
import { decodeRaster, type BsfRaster } from './raster.js';
import { decodeTexture, type BsfTexture } from './texture.js';

export type ChunkContent =
  /** Unknown tag, or a known leaf tag that is not parsed further. */
  | { kind: 'opaque'; tag: number; bytes: Uint8Array }
  /** Raw STRUCT payload (a STRUCT leaf, or a container's leading STRUCT child). */
  | { kind: 'struct'; bytes: Uint8Array }
  | { kind: 'text'; value: string }
  | { kind: 'geometry'; geometry: BsfGeometry }
  | { kind: 'material'; material: BsfMaterial }
  | { kind: 'texture'; texture: BsfTexture }
  | { kind: 'raster'; raster: BsfRaster }
  /** Container without a leading STRUCT child; everything lives in its children. */
  | { kind: 'marker'; type: number };

export type ChunkContentKind = ChunkContent['kind'];

/**
 * Decode a payload according to its chunk tag.
 *
 * For container tags the payload handed in is the raw payload of the
 * container's leading STRUCT child. `payload` may also be a reader already
 * positioned on that region so error offsets stay absolute.
 */
export function decodeChunkContent(
  type: number,
  version: number,
  payload: Uint8Array | BsfReader,
): ChunkContent {
  const reader = payload instanceof BsfReader ? payload : new BsfReader(payload);

  switch (type) {
    case BsfChunkType.STRING:
    case BsfChunkType.FRAME:
      return { kind: 'text', value: decodeText(reader.readRemaining()) };

    case BsfChunkType.STRUCT:
      return { kind: 'struct', bytes: reader.readRemaining() };

    case BsfChunkType.GEOMETRY:
      return { kind: 'geometry', geometry: decodeGeometry(reader, version) };

    case BsfChunkType.MATERIAL:
      return { kind: 'material', material: decodeMaterial(reader, version) };

    case BsfChunkType.TEXTURE:
      return { kind: 'texture', texture: decodeTexture(reader) };

    case BsfChunkType.TEXTURE_NATIVE:
      return { kind: 'raster', raster: decodeRaster(reader, version) };

    default:
      break;
  }

  if (isKnownChunkType(type) && hasChildren(type)) {
    return { kind: 'struct', bytes: reader.readRemaining() };
  }
  return { kind: 'opaque', tag: type, bytes: reader.readRemaining() };
}

export type ContentOfKind<K extends ChunkContentKind> = Extract<ChunkContent, { kind: K }>;

export function isContentKind<K extends ChunkContentKind>(
  content: ChunkContent,
  kind: K,
): content is ContentOfKind<K> {
  return content.kind === kind;
}
