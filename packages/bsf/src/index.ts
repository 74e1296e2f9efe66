export * from './errors.js';
export { BsfReader, decodeText } from './binary-reader.js';
export { BsfChunkType, chunkTypeName, hasChildren, isKnownChunkType } from './chunk-types.js';
export type { BsfChunkTypeValue } from './chunk-types.js';
export { unpackLibraryId, isModernLibraryId, formatVersion } from './version.js';
export type { LibraryVersion } from './version.js';
export { CHUNK_HEADER_SIZE, readChunkHeader } from './chunk-header.js';
export type { BsfChunkHeader } from './chunk-header.js';
export { BsfParser, parseChunk, parseChunks, decodeChunk } from './chunk-tree.js';
export type { BsfChunk, DecodedChunk } from './chunk-tree.js';
export { decodeChunkContent, isContentKind } from './content.js';
export type { ChunkContent, ChunkContentKind, ContentOfKind } from './content.js';
export {
  GeometryFormat,
  GEOMETRY_SURFACE_PROPS_VERSION,
  decodeGeometry,
  geometryChannelCount,
  isTriStrip,
  triangleIndices,
  groupTrianglesByMaterial,
} from './geometry.js';
export type { BsfGeometry, BsfTriangle, BoundingSphere, MaterialTriangleGroup } from './geometry.js';
export { MATERIAL_SURFACE_PROPS_VERSION, decodeMaterial } from './material.js';
export type { BsfMaterial, RgbaColor, SurfaceProperties } from './material.js';
export {
  TextureFilterMode,
  TextureAddressMode,
  decodeTexture,
  unpackAddressing,
} from './texture.js';
export type {
  BsfTexture,
  TextureAddressing,
  TextureAddressModeValue,
  TextureFilterModeValue,
} from './texture.js';
export { RASTER_D3D_FORMAT_VERSION, RasterFlag, decodeRaster, hasRasterFlag } from './raster.js';
export type { BsfRaster } from './raster.js';
export {
  walkChunks,
  contentOf,
  findChild,
  findChildren,
  materialsOf,
  collectGeometries,
  collectRasters,
} from './chunk-query.js';
export type { WalkedChunk, GeometryEntry } from './chunk-query.js';
