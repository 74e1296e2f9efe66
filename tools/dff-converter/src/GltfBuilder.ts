/**
 * Converts a decoded clump into a glTF 2.0 GLB (binary) file.
 *
 * GLB structure:
 *   12-byte header: magic(0x46546C67) + version(2) + totalLength
 *   JSON chunk:  chunkLength + chunkType(0x4E4F534A) + padded JSON
 *   BIN  chunk:  chunkLength + chunkType(0x004E4942) + binary data
 */

import {
  collectGeometries,
  groupTrianglesByMaterial,
  type BsfChunk,
  type BsfGeometry,
  type BsfMaterial,
} from '@rwkit/bsf';

/* ------------------------------------------------------------------ */
/*  glTF JSON type helpers (minimal)                                   */
/* ------------------------------------------------------------------ */

interface GltfAccessor {
  bufferView: number;
  componentType: number;
  count: number;
  type: string;
  normalized?: boolean;
  max?: number[];
  min?: number[];
}

interface GltfBufferView {
  buffer: number;
  byteOffset: number;
  byteLength: number;
  target?: number;
}

interface GltfMeshPrimitive {
  attributes: Record<string, number>;
  indices?: number;
  material?: number;
  mode?: number;
}

interface GltfNode {
  name?: string;
  mesh?: number;
}

interface GltfMaterial {
  name?: string;
  pbrMetallicRoughness: { baseColorFactor: number[]; metallicFactor: number; roughnessFactor: number };
  alphaMode?: 'OPAQUE' | 'BLEND';
  doubleSided?: boolean;
}

export interface GltfDocument {
  asset: { version: string; generator: string };
  scene: number;
  scenes: Array<{ nodes: number[] }>;
  nodes: GltfNode[];
  meshes: Array<{ name?: string; primitives: GltfMeshPrimitive[] }>;
  materials?: GltfMaterial[];
  accessors: GltfAccessor[];
  bufferViews: GltfBufferView[];
  buffers: Array<{ byteLength: number }>;
}

/* ------------------------------------------------------------------ */
/*  Constants                                                          */
/* ------------------------------------------------------------------ */

const FLOAT = 5126;   // GL_FLOAT
const UBYTE = 5121;   // GL_UNSIGNED_BYTE
const USHORT = 5123;  // GL_UNSIGNED_SHORT
const ARRAY_BUFFER = 34962;
const ELEMENT_ARRAY_BUFFER = 34963;
const TRIANGLES = 4;

export const GLB_MAGIC = 0x46546c67;
export const GLB_CHUNK_JSON = 0x4e4f534a;
export const GLB_CHUNK_BIN = 0x004e4942;

/* ------------------------------------------------------------------ */
/*  Binary data accumulator                                            */
/* ------------------------------------------------------------------ */

class BinaryAccumulator {
  private parts: Uint8Array[] = [];
  private _byteLength = 0;

  get byteLength(): number {
    return this._byteLength;
  }

  /** Append typed-array data, aligning to 4 bytes. Returns the byte offset. */
  append(data: ArrayBufferView): number {
    const offset = this._byteLength;
    this.parts.push(new Uint8Array(data.buffer, data.byteOffset, data.byteLength));
    this._byteLength += data.byteLength;
    const pad = (4 - (data.byteLength % 4)) % 4;
    if (pad > 0) {
      this.parts.push(new Uint8Array(pad));
      this._byteLength += pad;
    }
    return offset;
  }

  toUint8Array(): Uint8Array {
    const out = new Uint8Array(this._byteLength);
    let pos = 0;
    for (const part of this.parts) {
      out.set(part, pos);
      pos += part.byteLength;
    }
    return out;
  }
}

/* ------------------------------------------------------------------ */
/*  Builder                                                            */
/* ------------------------------------------------------------------ */

export class GltfBuilder {
  /**
   * Build a GLB from a clump tree.
   *
   * Every geometry in the clump's GEOMETRY_LIST becomes a mesh plus a node.
   * Vertex attributes are shared by the mesh's primitives; each material id
   * used by the triangles gets its own primitive and index accessor.
   */
  static buildGlb(root: BsfChunk): ArrayBuffer {
    const document = GltfBuilder.buildDocument(root);
    return packGlb(document.gltf, document.bin);
  }

  static buildDocument(root: BsfChunk): { gltf: GltfDocument; bin: Uint8Array } {
    const bin = new BinaryAccumulator();
    const accessors: GltfAccessor[] = [];
    const bufferViews: GltfBufferView[] = [];
    const nodes: GltfNode[] = [];
    const meshes: GltfDocument['meshes'] = [];
    const materials: GltfMaterial[] = [];

    function addAccessor(
      data: ArrayBufferView,
      componentType: number,
      count: number,
      type: string,
      target: number,
      extra: Partial<GltfAccessor> = {},
    ): number {
      const byteOffset = bin.append(data);
      const bvIdx = bufferViews.length;
      bufferViews.push({ buffer: 0, byteOffset, byteLength: data.byteLength, target });
      accessors.push({ bufferView: bvIdx, componentType, count, type, ...extra });
      return accessors.length - 1;
    }

    collectGeometries(root).forEach((entry, index) => {
      const name = `geometry_${index}`;
      const attributes = buildAttributes(entry.geometry, addAccessor);

      const materialBase = materials.length;
      entry.materials.forEach((material, i) => {
        materials.push(toGltfMaterial(material, `${name}_material_${i}`));
      });

      const primitives: GltfMeshPrimitive[] = [];
      for (const { materialId, indices } of groupTrianglesByMaterial(entry.geometry)) {
        const primitive: GltfMeshPrimitive = {
          attributes,
          indices: addAccessor(indices, USHORT, indices.length, 'SCALAR', ELEMENT_ARRAY_BUFFER),
          mode: TRIANGLES,
        };
        if (materialId < entry.materials.length) primitive.material = materialBase + materialId;
        primitives.push(primitive);
      }
      if (primitives.length === 0) {
        primitives.push({ attributes, mode: TRIANGLES });
      }

      meshes.push({ name, primitives });
      nodes.push({ name, mesh: meshes.length - 1 });
    });

    const binBytes = bin.toUint8Array();
    const gltf: GltfDocument = {
      asset: { version: '2.0', generator: 'rwkit-dff-converter' },
      scene: 0,
      scenes: [{ nodes: nodes.map((_, i) => i) }],
      nodes,
      meshes,
      accessors,
      bufferViews,
      buffers: [{ byteLength: binBytes.byteLength }],
    };
    if (materials.length > 0) gltf.materials = materials;

    return { gltf, bin: binBytes };
  }
}

/* ------------------------------------------------------------------ */
/*  Geometry helpers                                                   */
/* ------------------------------------------------------------------ */

type AddAccessor = (
  data: ArrayBufferView,
  componentType: number,
  count: number,
  type: string,
  target: number,
  extra?: Partial<GltfAccessor>,
) => number;

function buildAttributes(geometry: BsfGeometry, addAccessor: AddAccessor): Record<string, number> {
  const attributes: Record<string, number> = {};
  const vertexCount = geometry.vertexCount;

  if (geometry.vertices.length > 0) {
    const min = [Infinity, Infinity, Infinity];
    const max = [-Infinity, -Infinity, -Infinity];
    for (let i = 0; i < geometry.vertices.length; i += 3) {
      for (let c = 0; c < 3; c++) {
        const v = geometry.vertices[i + c] ?? 0;
        if (v < (min[c] ?? Infinity)) min[c] = v;
        if (v > (max[c] ?? -Infinity)) max[c] = v;
      }
    }
    attributes['POSITION'] = addAccessor(geometry.vertices, FLOAT, vertexCount, 'VEC3', ARRAY_BUFFER, { min, max });
  }

  if (geometry.normals.length > 0) {
    attributes['NORMAL'] = addAccessor(geometry.normals, FLOAT, vertexCount, 'VEC3', ARRAY_BUFFER);
  }

  geometry.texCoords.forEach((channel, i) => {
    attributes[`TEXCOORD_${i}`] = addAccessor(channel, FLOAT, vertexCount, 'VEC2', ARRAY_BUFFER);
  });

  if (geometry.prelitColors.length > 0) {
    attributes['COLOR_0'] = addAccessor(geometry.prelitColors, UBYTE, vertexCount, 'VEC4', ARRAY_BUFFER, {
      normalized: true,
    });
  }

  return attributes;
}

function toGltfMaterial(material: BsfMaterial, name: string): GltfMaterial {
  const { r, g, b, a } = material.color;
  const result: GltfMaterial = {
    name,
    pbrMetallicRoughness: {
      baseColorFactor: [r / 255, g / 255, b / 255, a / 255],
      metallicFactor: 0,
      roughnessFactor: 1,
    },
  };
  if (a < 255) result.alphaMode = 'BLEND';
  return result;
}

/* ------------------------------------------------------------------ */
/*  GLB packing                                                        */
/* ------------------------------------------------------------------ */

function packGlb(gltf: GltfDocument, binBytes: Uint8Array): ArrayBuffer {
  // JSON chunk is padded with spaces, BIN chunk with zeros.
  const jsonBytes = new TextEncoder().encode(JSON.stringify(gltf));
  const jsonPadLen = (4 - (jsonBytes.byteLength % 4)) % 4;
  const jsonChunkLength = jsonBytes.byteLength + jsonPadLen;

  const binPadLen = (4 - (binBytes.byteLength % 4)) % 4;
  const binChunkLength = binBytes.byteLength + binPadLen;

  const totalLength = 12 + 8 + jsonChunkLength + 8 + binChunkLength;

  const glb = new ArrayBuffer(totalLength);
  const view = new DataView(glb);
  const bytes = new Uint8Array(glb);
  let offset = 0;

  view.setUint32(offset, GLB_MAGIC, true); offset += 4;
  view.setUint32(offset, 2, true); offset += 4;
  view.setUint32(offset, totalLength, true); offset += 4;

  view.setUint32(offset, jsonChunkLength, true); offset += 4;
  view.setUint32(offset, GLB_CHUNK_JSON, true); offset += 4;
  bytes.set(jsonBytes, offset); offset += jsonBytes.byteLength;
  for (let i = 0; i < jsonPadLen; i++) {
    bytes[offset++] = 0x20;
  }

  view.setUint32(offset, binChunkLength, true); offset += 4;
  view.setUint32(offset, GLB_CHUNK_BIN, true); offset += 4;
  bytes.set(binBytes, offset);

  return glb;
}
