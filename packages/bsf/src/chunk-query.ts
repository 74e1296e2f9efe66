/**
 * Read-only helpers for navigating a decoded chunk tree.
 */

import type { BsfChunk } from './chunk-tree.js';
import { BsfChunkType } from './chunk-types.js';
import { isContentKind, type ChunkContentKind, type ContentOfKind } from './content.js';
import type { BsfGeometry } from './geometry.js';
import type { BsfMaterial } from './material.js';

export interface WalkedChunk {
  chunk: BsfChunk;
  depth: number;
}

/** Pre-order, depth-first traversal starting at (and including) `root`. */
export function* walkChunks(root: BsfChunk, depth = 0): Generator<WalkedChunk> {
  yield { chunk: root, depth };
  for (const child of root.children) {
    yield* walkChunks(child, depth + 1);
  }
}

/** A chunk's content when it is of the given kind. */
export function contentOf<K extends ChunkContentKind>(
  chunk: BsfChunk | undefined,
  kind: K,
): ContentOfKind<K> | undefined {
  if (chunk && isContentKind(chunk.content, kind)) return chunk.content;
  return undefined;
}

export function findChild(chunk: BsfChunk, type: number): BsfChunk | undefined {
  return chunk.children.find((c) => c.header.type === type);
}

export function findChildren(chunk: BsfChunk, type: number): BsfChunk[] {
  return chunk.children.filter((c) => c.header.type === type);
}

/** Materials listed by a GEOMETRY chunk's MATERIAL_LIST, in file order. */
export function materialsOf(geometryChunk: BsfChunk): BsfMaterial[] {
  const list = findChild(geometryChunk, BsfChunkType.MATERIAL_LIST);
  if (!list) return [];
  const materials: BsfMaterial[] = [];
  for (const child of findChildren(list, BsfChunkType.MATERIAL)) {
    if (child.content.kind === 'material') materials.push(child.content.material);
  }
  return materials;
}

export interface GeometryEntry {
  chunk: BsfChunk;
  geometry: BsfGeometry;
  materials: BsfMaterial[];
}

/** Every decoded geometry under `root`'s GEOMETRY_LIST, in file order. */
export function collectGeometries(root: BsfChunk): GeometryEntry[] {
  const list = findChild(root, BsfChunkType.GEOMETRY_LIST);
  if (!list) return [];
  const out: GeometryEntry[] = [];
  for (const chunk of findChildren(list, BsfChunkType.GEOMETRY)) {
    if (chunk.content.kind === 'geometry') {
      out.push({ chunk, geometry: chunk.content.geometry, materials: materialsOf(chunk) });
    }
  }
  return out;
}

/** Every decoded raster under `root` (a texture dictionary), in file order. */
export function collectRasters(root: BsfChunk): BsfChunk[] {
  return findChildren(root, BsfChunkType.TEXTURE_NATIVE).filter((c) => c.content.kind === 'raster');
}
