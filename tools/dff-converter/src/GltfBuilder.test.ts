import { describe, it, expect } from 'vitest';
import { BsfChunkType, BsfParser } from '@rwkit/bsf';
import { BsfWriter, LIB_ID_3_6_0_3, buildQuadClump } from '@rwkit/bsf/test-helpers';
import { GLB_CHUNK_BIN, GLB_CHUNK_JSON, GLB_MAGIC, GltfBuilder } from './GltfBuilder.js';

function readJsonChunk(glb: ArrayBuffer): unknown {
  const view = new DataView(glb);
  const length = view.getUint32(12, true);
  return JSON.parse(new TextDecoder().decode(new Uint8Array(glb, 20, length)));
}

describe('GltfBuilder', () => {
  const root = BsfParser.parse(buildQuadClump());

  it('writes a valid GLB header and chunk layout', () => {
    const glb = GltfBuilder.buildGlb(root);
    const view = new DataView(glb);
    expect(view.getUint32(0, true)).toBe(GLB_MAGIC);
    expect(view.getUint32(4, true)).toBe(2);
    expect(view.getUint32(8, true)).toBe(glb.byteLength);

    const jsonLength = view.getUint32(12, true);
    expect(jsonLength % 4).toBe(0);
    expect(view.getUint32(16, true)).toBe(GLB_CHUNK_JSON);

    const binHeader = 20 + jsonLength;
    expect(view.getUint32(binHeader, true)).toBe(160);
    expect(view.getUint32(binHeader + 4, true)).toBe(GLB_CHUNK_BIN);
    expect(glb.byteLength).toBe(binHeader + 8 + 160);
  });

  it('emits one primitive per material id', () => {
    const { gltf } = GltfBuilder.buildDocument(root);
    expect(gltf.meshes).toHaveLength(1);
    expect(gltf.nodes).toEqual([{ name: 'geometry_0', mesh: 0 }]);
    expect(gltf.scenes).toEqual([{ nodes: [0] }]);

    const primitives = gltf.meshes[0]!.primitives;
    expect(primitives.map((p) => p.material)).toEqual([0, 1]);
    expect(primitives.map((p) => p.indices)).toEqual([4, 5]);
    expect(primitives[0]!.attributes).toEqual({ POSITION: 0, NORMAL: 1, TEXCOORD_0: 2, COLOR_0: 3 });
  });

  it('records position bounds and normalized colors', () => {
    const { gltf, bin } = GltfBuilder.buildDocument(root);
    expect(gltf.accessors[0]).toMatchObject({ count: 4, type: 'VEC3', min: [0, 0, 0], max: [1, 1, 0] });
    expect(gltf.accessors[3]).toMatchObject({ componentType: 5121, type: 'VEC4', normalized: true });
    expect(gltf.accessors[4]).toMatchObject({ componentType: 5123, count: 3, type: 'SCALAR' });
    expect(bin.byteLength).toBe(160);
    expect(gltf.buffers).toEqual([{ byteLength: 160 }]);

    const second = gltf.bufferViews[5]!;
    expect(Array.from(new Uint16Array(bin.slice(second.byteOffset, second.byteOffset + 6).buffer))).toEqual([0, 2, 3]);
  });

  it('maps material colors to base color factors', () => {
    const { gltf } = GltfBuilder.buildDocument(root);
    expect(gltf.materials?.map((m) => m.pbrMetallicRoughness.baseColorFactor)).toEqual([
      [1, 0, 0, 1],
      [0, 0, 1, 1],
    ]);
    expect(gltf.materials?.[0]?.alphaMode).toBeUndefined();
  });

  it('matches the JSON chunk to the built document', () => {
    const glb = GltfBuilder.buildGlb(root);
    expect(readJsonChunk(glb)).toEqual(JSON.parse(JSON.stringify(GltfBuilder.buildDocument(root).gltf)));
  });

  it('produces an empty scene for a clump without geometry', () => {
    const bytes = new BsfWriter()
      .chunk(BsfChunkType.CLUMP, LIB_ID_3_6_0_3, (clump) => {
        clump.chunk(BsfChunkType.STRUCT, LIB_ID_3_6_0_3, (s) => {
          s.writeUint32(0).writeUint32(0).writeUint32(0);
        });
      })
      .toUint8Array();
    const { gltf } = GltfBuilder.buildDocument(BsfParser.parse(bytes));
    expect(gltf.meshes).toEqual([]);
    expect(gltf.scenes).toEqual([{ nodes: [] }]);
    expect(gltf.materials).toBeUndefined();
  });
});
