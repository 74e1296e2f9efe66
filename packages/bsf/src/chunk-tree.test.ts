/**
 * Tests for the chunk tree decoder using synthetically built chunk streams.
 */

import { describe, it, expect } from 'vitest';
import { BsfReader } from './binary-reader.js';
import { contentOf } from './chunk-query.js';
import { readChunkHeader } from './chunk-header.js';
import { BsfParser, decodeChunk, type BsfChunk } from './chunk-tree.js';
import { BsfChunkType, chunkTypeName, hasChildren } from './chunk-types.js';
import { BoundsError, TruncatedInputError } from './errors.js';
import { BsfWriter, LIB_ID_3_6_0_3, buildQuadClump, catchError } from './test-helpers.js';

const UNKNOWN_TAG = 0xdeadbeef;

function childTypes(chunk: BsfChunk): number[] {
  return chunk.children.map((c) => c.header.type);
}

/** Assert every container's children exactly fill its payload. */
function expectChildrenFillPayload(chunk: BsfChunk): void {
  if (!hasChildren(chunk.header.type)) return;
  const used = chunk.children.reduce((sum, c) => sum + 12 + c.header.size, 0);
  expect(used).toBe(chunk.header.size);
  chunk.children.forEach(expectChildrenFillPayload);
}

describe('readChunkHeader', () => {
  it('reads type, size and library id and unpacks the version', () => {
    const w = new BsfWriter();
    w.writeUint32(BsfChunkType.CLUMP).writeUint32(0x1234).writeUint32(LIB_ID_3_6_0_3);
    const header = readChunkHeader(BsfReader.from(w.toUint8Array()));
    expect(header).toEqual({
      type: BsfChunkType.CLUMP,
      size: 0x1234,
      libraryId: LIB_ID_3_6_0_3,
      version: 0x36003,
      build: 0xffff,
      offset: 0,
    });
  });

  it('needs 12 bytes', () => {
    const err = catchError(() => readChunkHeader(BsfReader.from(new Uint8Array(8))));
    expect(err).toBeInstanceOf(TruncatedInputError);
    expect(err).toMatchObject({ offset: 8, needed: 4, available: 0 });
  });
});

describe('chunk types', () => {
  it('treats known non-leaf tags as containers', () => {
    expect(hasChildren(BsfChunkType.CLUMP)).toBe(true);
    expect(hasChildren(BsfChunkType.EXTENSION)).toBe(true);
    expect(hasChildren(BsfChunkType.TEXTURE_NATIVE)).toBe(true);
  });

  it('treats leaf tags and unknown tags as leaves', () => {
    expect(hasChildren(BsfChunkType.STRUCT)).toBe(false);
    expect(hasChildren(BsfChunkType.BIN_MESH_PLG)).toBe(false);
    expect(hasChildren(UNKNOWN_TAG)).toBe(false);
  });

  it('names chunk tags', () => {
    expect(chunkTypeName(BsfChunkType.GEOMETRY_LIST)).toBe('GEOMETRY_LIST');
    expect(chunkTypeName(UNKNOWN_TAG)).toBe('UNKNOWN_0xdeadbeef');
  });
});

describe('decodeChunk', () => {
  it('decodes a STRING leaf and trims NUL padding', () => {
    const bytes = new Uint8Array([2, 0, 0, 0, 5, 0, 0, 0, 0, 0, 0, 0, 0x61, 0x62, 0x63, 0, 0]);
    const { chunk, bytesConsumed } = decodeChunk(bytes);
    expect(chunk.content).toEqual({ kind: 'text', value: 'abc' });
    expect(chunk.children).toEqual([]);
    expect(bytesConsumed).toBe(17);
  });

  it('keeps unknown tags as opaque payloads', () => {
    const bytes = new Uint8Array([0xef, 0xbe, 0xad, 0xde, 3, 0, 0, 0, 0, 0, 0, 0, 1, 2, 3]);
    const { chunk, bytesConsumed } = decodeChunk(bytes);
    const opaque = contentOf(chunk, 'opaque');
    expect(opaque?.tag).toBe(UNKNOWN_TAG);
    expect(Array.from(opaque?.bytes ?? [])).toEqual([1, 2, 3]);
    expect(chunk.children).toEqual([]);
    expect(bytesConsumed).toBe(15);
  });

  it('continues past unknown siblings inside a container', () => {
    const w = new BsfWriter();
    w.chunk(BsfChunkType.CLUMP, 0, (c) => {
      c.chunk(BsfChunkType.STRING, 0, (s) => s.writeString('a', 4));
      c.chunk(UNKNOWN_TAG, 0, (s) => s.writeBytes([1, 2, 3]));
      c.chunk(BsfChunkType.STRING, 0, (s) => s.writeString('b', 4));
    });
    const { chunk } = decodeChunk(w.toUint8Array());
    expect(childTypes(chunk)).toEqual([BsfChunkType.STRING, UNKNOWN_TAG, BsfChunkType.STRING]);
    expect(chunk.children[0]?.content).toEqual({ kind: 'text', value: 'a' });
    expect(chunk.children[1]?.content.kind).toBe('opaque');
    expect(chunk.children[2]?.content).toEqual({ kind: 'text', value: 'b' });
  });

  it('consumes exactly header + size and leaves no slack between siblings', () => {
    const bytes = buildQuadClump();
    const { chunk, bytesConsumed } = decodeChunk(bytes);
    expect(bytesConsumed).toBe(bytes.byteLength);
    expect(bytesConsumed).toBe(12 + chunk.header.size);
    expectChildrenFillPayload(chunk);
  });

  it('ignores bytes after the root chunk', () => {
    const w = new BsfWriter();
    w.chunk(BsfChunkType.STRING, 0, (s) => s.writeString('x', 4));
    w.writeBytes([9, 9, 9]);
    const { bytesConsumed } = decodeChunk(w.toArrayBuffer());
    expect(bytesConsumed).toBe(16);
  });
});

describe('container content', () => {
  it('decodes the leading STRUCT with the container grammar', () => {
    const w = new BsfWriter();
    w.chunk(BsfChunkType.TEXTURE, LIB_ID_3_6_0_3, (t) => {
      t.chunk(BsfChunkType.STRUCT, LIB_ID_3_6_0_3, (s) => s.writeBytes([2, 0x13, 1, 0]));
      t.chunk(BsfChunkType.STRING, LIB_ID_3_6_0_3, (s) => s.writeString('grass', 8));
      t.chunk(BsfChunkType.STRING, LIB_ID_3_6_0_3, (s) => s.writeString('', 4));
      t.chunk(BsfChunkType.EXTENSION, LIB_ID_3_6_0_3, () => {});
    });
    const chunk = BsfParser.parse(w.toArrayBuffer());

    expect(chunk.content).toEqual({
      kind: 'texture',
      texture: { filtering: 2, addressing: [1, 3], hasMipmaps: true },
    });
    expect(childTypes(chunk)).toEqual([
      BsfChunkType.STRUCT,
      BsfChunkType.STRING,
      BsfChunkType.STRING,
      BsfChunkType.EXTENSION,
    ]);
    expect(chunk.children[0]?.content.kind).toBe('struct');
    expect(chunk.children[1]?.content).toEqual({ kind: 'text', value: 'grass' });
    expect(chunk.children[2]?.content).toEqual({ kind: 'text', value: '' });
  });

  it('exposes the STRUCT payload of containers without a dedicated grammar', () => {
    const chunk = BsfParser.parse(buildQuadClump());
    const struct = contentOf(chunk, 'struct');
    expect(Array.from(struct?.bytes ?? [])).toEqual([1, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0]);
  });

  it('marks containers without a leading STRUCT', () => {
    const w = new BsfWriter();
    w.chunk(BsfChunkType.EXTENSION, 0, (e) => {
      e.chunk(BsfChunkType.BIN_MESH_PLG, 0, (p) => p.writeUint32(7));
    });
    const chunk = BsfParser.parse(w.toUint8Array());
    expect(chunk.content).toEqual({ kind: 'marker', type: BsfChunkType.EXTENSION });
    const plugin = contentOf(chunk.children[0], 'opaque');
    expect(plugin?.tag).toBe(BsfChunkType.BIN_MESH_PLG);
    expect(Array.from(plugin?.bytes ?? [])).toEqual([7, 0, 0, 0]);
  });

  it('marks empty containers', () => {
    const w = new BsfWriter();
    w.chunk(BsfChunkType.EXTENSION, 0, () => {});
    const { chunk, bytesConsumed } = decodeChunk(w.toUint8Array());
    expect(chunk.content).toEqual({ kind: 'marker', type: BsfChunkType.EXTENSION });
    expect(chunk.children).toEqual([]);
    expect(bytesConsumed).toBe(12);
  });

  it('decodes frame name plugins as text', () => {
    const w = new BsfWriter();
    w.chunk(BsfChunkType.FRAME, 0, (f) => f.writeBytes([0x52, 0x6f, 0x6f, 0x74]));
    expect(BsfParser.parse(w.toUint8Array()).content).toEqual({ kind: 'text', value: 'Root' });
  });
});

describe('errors', () => {
  it('rejects a declared size larger than the buffer', () => {
    const bytes = new Uint8Array([2, 0, 0, 0, 100, 0, 0, 0, 0, 0, 0, 0, 1, 2, 3]);
    const err = catchError(() => decodeChunk(bytes));
    expect(err).toBeInstanceOf(BoundsError);
    expect(err).toMatchObject({ offset: 0, chunkType: 2, declaredSize: 100, available: 3 });
  });

  it('bounds children by their parent payload, not the whole buffer', () => {
    const w = new BsfWriter();
    w.chunk(BsfChunkType.CLUMP, 0, (c) => {
      c.writeUint32(BsfChunkType.STRING).writeUint32(50).writeUint32(0);
      c.writeBytes([1, 2]);
    });
    w.writeBytes(new Array<number>(100).fill(0));
    const err = catchError(() => decodeChunk(w.toUint8Array()));
    expect(err).toBeInstanceOf(BoundsError);
    expect(err).toMatchObject({ offset: 12, chunkType: BsfChunkType.STRING, declaredSize: 50, available: 2 });
  });

  it('fails on a container tail too short for a header', () => {
    const w = new BsfWriter();
    w.chunk(BsfChunkType.CLUMP, 0, (c) => {
      c.chunk(BsfChunkType.STRING, 0, () => {});
      c.writeBytes([1, 2, 3, 4, 5]);
    });
    const err = catchError(() => decodeChunk(w.toUint8Array()));
    expect(err).toBeInstanceOf(TruncatedInputError);
    expect(err).toMatchObject({ offset: 28, needed: 4, available: 1 });
  });

  it('reports leaf grammar failures at their absolute offset', () => {
    const w = new BsfWriter();
    w.chunk(BsfChunkType.GEOMETRY, LIB_ID_3_6_0_3, (g) => {
      g.chunk(BsfChunkType.STRUCT, LIB_ID_3_6_0_3, (s) => {
        s.writeUint32(0).writeUint32(0).writeUint32(0).writeUint32(1);
      });
    });
    const err = catchError(() => decodeChunk(w.toUint8Array()));
    expect(err).toBeInstanceOf(TruncatedInputError);
    expect(err).toMatchObject({ offset: 40, needed: 4, available: 0 });
  });
});

describe('BsfParser.parseAll', () => {
  it('decodes every root-level chunk', () => {
    const w = new BsfWriter();
    w.chunk(BsfChunkType.STRING, 0, (s) => s.writeString('a', 2));
    w.chunk(UNKNOWN_TAG, 0, (s) => s.writeBytes([1]));
    const roots = BsfParser.parseAll(w.toUint8Array());
    expect(roots.map((r) => r.header.type)).toEqual([BsfChunkType.STRING, UNKNOWN_TAG]);
  });
});
