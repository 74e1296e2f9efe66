/**
 * Chunk type identifiers.
 * Every chunk begins with a 12-byte header:
 *   - uint32 ChunkType (little-endian)
 *   - uint32 ChunkSize (little-endian, payload bytes only)
 *   - uint32 LibraryId (packed format version + build, see version.ts)
 */
export const BsfChunkType = {
  // ---- Core ----
  STRUCT: 0x00000001,
  STRING: 0x00000002,
  EXTENSION: 0x00000003,
  CAMERA: 0x00000005,
  TEXTURE: 0x00000006,
  MATERIAL: 0x00000007,
  MATERIAL_LIST: 0x00000008,
  ATOMIC_SECTION: 0x00000009,
  PLANE_SECTION: 0x0000000a,
  WORLD: 0x0000000b,
  FRAME_LIST: 0x0000000e,
  GEOMETRY: 0x0000000f,
  CLUMP: 0x00000010,
  LIGHT: 0x00000012,
  ATOMIC: 0x00000014,
  TEXTURE_NATIVE: 0x00000015,
  TEXTURE_DICTIONARY: 0x00000016,
  GEOMETRY_LIST: 0x0000001a,
  RIGHT_TO_RENDER: 0x0000001f,

  // ---- Plugins ----
  MORPH_PLG: 0x00000105,
  SKIN_PLG: 0x00000116,
  PARTICLES_PLG: 0x00000118,
  HANIM_PLG: 0x0000011e,
  MATERIAL_EFFECTS_PLG: 0x00000120,
  BIN_MESH_PLG: 0x0000050e,
  FRAME: 0x0253f2fe,
} as const;

export type BsfChunkTypeValue = (typeof BsfChunkType)[keyof typeof BsfChunkType];

/** Known tags whose payload is leaf data rather than a run of child chunks. */
const LEAF_TYPES: ReadonlySet<number> = new Set<number>([
  BsfChunkType.STRUCT,
  BsfChunkType.STRING,
  BsfChunkType.FRAME,
  BsfChunkType.RIGHT_TO_RENDER,
  BsfChunkType.MORPH_PLG,
  BsfChunkType.SKIN_PLG,
  BsfChunkType.PARTICLES_PLG,
  BsfChunkType.HANIM_PLG,
  BsfChunkType.MATERIAL_EFFECTS_PLG,
  BsfChunkType.BIN_MESH_PLG,
]);

/** Reverse lookup: chunk id number -> human-readable name */
const _nameMap = new Map<number, string>();
for (const [key, value] of Object.entries(BsfChunkType)) {
  _nameMap.set(value, key);
}

export function isKnownChunkType(type: number): type is BsfChunkTypeValue {
  return _nameMap.has(type);
}

/**
 * Whether a chunk's payload is a sequence of child chunks.
 * Unknown tags are always treated as leaves.
 */
export function hasChildren(type: number): boolean {
  return isKnownChunkType(type) && !LEAF_TYPES.has(type);
}

export function chunkTypeName(type: number): string {
  return _nameMap.get(type) ?? `UNKNOWN_0x${type.toString(16).padStart(8, '0')}`;
}
