/**
 * GEOMETRY struct grammar.
 *
 * Layout:
 *   uint32 Format            flag bits below; bits 16-23 = texture channel count
 *   uint32 NumTriangles
 *   uint32 NumVertices
 *   uint32 NumMorphTargets
 *   float32[3] SurfaceProps  only when version < 0x34000
 *   -- skipped entirely when Format has NATIVE set --
 *   uint8[4]  PrelitColor × NumVertices        (if PRELIT)
 *   float32[2] TexCoord × NumVertices × NumChannels
 *   Triangle × NumTriangles (see TRIANGLE_RECORD_SIZE)
 *   -- first morph target --
 *   float32[4] BoundingSphere  (center xyz, radius)
 *   uint32 HasVertices
 *   uint32 HasNormals
 *   float32[3] Vertex × NumVertices            (if HasVertices)
 *   float32[3] Normal × NumVertices            (if HasNormals)
 */

import type { BsfReader } from './binary-reader.js';
import { readSurfaceProperties, type SurfaceProperties } from './material.js';

export const GeometryFormat = {
  TRISTRIP: 0x00000001,
  POSITIONS: 0x00000002,
  TEXTURED: 0x00000004,
  PRELIT: 0x00000008,
  NORMALS: 0x00000010,
  LIGHT: 0x00000020,
  MODULATE_MATERIAL_COLOR: 0x00000040,
  TEXTURED2: 0x00000080,
  NATIVE: 0x01000000,
} as const;

const CHANNEL_COUNT_SHIFT = 16;
const CHANNEL_COUNT_MASK = 0xff;

/** Geometry written before this version stores surface properties itself. */
export const GEOMETRY_SURFACE_PROPS_VERSION = 0x34000;

/**
 * Size in bytes of one Triangle record:
 *   uint16 vertexB
 *   uint16 vertexA
 *   uint16 materialId
 *   uint16 vertexC
 * The first two fields are swapped relative to winding order.
 */
export const TRIANGLE_RECORD_SIZE = 8;

export interface BsfTriangle {
  vertices: [number, number, number];
  materialId: number;
}

export interface BoundingSphere {
  center: [number, number, number];
  radius: number;
}

export interface BsfGeometry {
  format: number;
  triangleCount: number;
  vertexCount: number;
  morphTargetCount: number;
  surfaceProperties?: SurfaceProperties;
  prelitColors: Uint8Array;    // RGBA × vertexCount, or empty
  texCoords: Float32Array[];   // one flat [u,v, u,v, …] per channel
  triangles: BsfTriangle[];
  boundingSphere: BoundingSphere;
  vertices: Float32Array;      // flat [x,y,z, …], or empty
  normals: Float32Array;       // flat [x,y,z, …], or empty
}

/** Number of texture coordinate sets a geometry with this format carries. */
export function geometryChannelCount(format: number): number {
  const explicit = (format >>> CHANNEL_COUNT_SHIFT) & CHANNEL_COUNT_MASK;
  if (explicit !== 0) return explicit;
  if (format & GeometryFormat.TEXTURED2) return 2;
  if (format & GeometryFormat.TEXTURED) return 1;
  return 0;
}

export function decodeGeometry(reader: BsfReader, version: number): BsfGeometry {
  const format = reader.readUint32();
  const triangleCount = reader.readUint32();
  const vertexCount = reader.readUint32();
  const morphTargetCount = reader.readUint32();
  const channelCount = geometryChannelCount(format);

  const surfaceProperties =
    version < GEOMETRY_SURFACE_PROPS_VERSION ? readSurfaceProperties(reader) : undefined;

  let prelitColors: Uint8Array = new Uint8Array(0);
  const texCoords: Float32Array[] = [];
  const triangles: BsfTriangle[] = [];

  // Native geometry keeps this section in a platform-specific plugin.
  if ((format & GeometryFormat.NATIVE) === 0) {
    if (format & GeometryFormat.PRELIT) {
      prelitColors = reader.readBytes(vertexCount * 4);
    }
    for (let channel = 0; channel < channelCount; channel++) {
      texCoords.push(reader.readFloat32Array(vertexCount * 2));
    }
    for (let i = 0; i < triangleCount; i++) {
      const b = reader.readUint16();
      const a = reader.readUint16();
      const materialId = reader.readUint16();
      const c = reader.readUint16();
      triangles.push({ vertices: [a, b, c], materialId });
    }
  }

  // TODO: decode morph targets beyond the first once a consumer needs them.
  const cx = reader.readFloat32();
  const cy = reader.readFloat32();
  const cz = reader.readFloat32();
  const radius = reader.readFloat32();

  const hasVertices = reader.readUint32() !== 0;
  const hasNormals = reader.readUint32() !== 0;
  const vertices = hasVertices ? reader.readFloat32Array(vertexCount * 3) : new Float32Array(0);
  const normals = hasNormals ? reader.readFloat32Array(vertexCount * 3) : new Float32Array(0);

  const geometry: BsfGeometry = {
    format,
    triangleCount,
    vertexCount,
    morphTargetCount,
    prelitColors,
    texCoords,
    triangles,
    boundingSphere: { center: [cx, cy, cz], radius },
    vertices,
    normals,
  };
  if (surfaceProperties) geometry.surfaceProperties = surfaceProperties;
  return geometry;
}

/* ------------------------------------------------------------------ */
/*  Helpers                                                            */
/* ------------------------------------------------------------------ */

export function isTriStrip(geometry: BsfGeometry): boolean {
  return (geometry.format & GeometryFormat.TRISTRIP) !== 0;
}

/** Flat triangle-list indices [a,b,c, a,b,c, …]. */
export function triangleIndices(geometry: BsfGeometry): Uint16Array {
  const out = new Uint16Array(geometry.triangles.length * 3);
  geometry.triangles.forEach((tri, i) => {
    out.set(tri.vertices, i * 3);
  });
  return out;
}

export interface MaterialTriangleGroup {
  materialId: number;
  /** Flat [a,b,c, …] indices of the triangles using `materialId`. */
  indices: Uint16Array;
}

/** Triangle indices bucketed by material id, ascending. */
export function groupTrianglesByMaterial(geometry: BsfGeometry): MaterialTriangleGroup[] {
  const buckets = new Map<number, number[]>();
  for (const tri of geometry.triangles) {
    let bucket = buckets.get(tri.materialId);
    if (!bucket) {
      bucket = [];
      buckets.set(tri.materialId, bucket);
    }
    bucket.push(...tri.vertices);
  }
  return [...buckets.entries()]
    .sort(([a], [b]) => a - b)
    .map(([materialId, indices]) => ({ materialId, indices: Uint16Array.from(indices) }));
}
