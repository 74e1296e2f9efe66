/**
 * In-memory chunk stream builder for tests.
 */

import { BsfChunkType } from './chunk-types.js';
import { GeometryFormat } from './geometry.js';

/** Library id for version 0x36003 build 0xFFFF (new-style packing). */
export const LIB_ID_3_6_0_3 = 0x1803ffff;

/** Old-style library id for a version whose low byte is zero. */
export function legacyLibraryId(version: number): number {
  return version >>> 8;
}

/** Growable binary buffer writer (little-endian). */
export class BsfWriter {
  private buf: ArrayBuffer;
  private view: DataView;
  private pos = 0;

  constructor(initialSize = 256) {
    this.buf = new ArrayBuffer(initialSize);
    this.view = new DataView(this.buf);
  }

  private ensure(bytes: number): void {
    while (this.pos + bytes > this.buf.byteLength) {
      const next = new ArrayBuffer(this.buf.byteLength * 2);
      new Uint8Array(next).set(new Uint8Array(this.buf));
      this.buf = next;
      this.view = new DataView(this.buf);
    }
  }

  get offset(): number {
    return this.pos;
  }

  writeUint32(v: number): this {
    this.ensure(4);
    this.view.setUint32(this.pos, v >>> 0, true);
    this.pos += 4;
    return this;
  }

  writeUint16(v: number): this {
    this.ensure(2);
    this.view.setUint16(this.pos, v, true);
    this.pos += 2;
    return this;
  }

  writeUint8(v: number): this {
    this.ensure(1);
    this.view.setUint8(this.pos, v);
    this.pos += 1;
    return this;
  }

  writeFloat32(...values: number[]): this {
    for (const v of values) {
      this.ensure(4);
      this.view.setFloat32(this.pos, v, true);
      this.pos += 4;
    }
    return this;
  }

  writeBytes(bytes: ArrayLike<number>): this {
    this.ensure(bytes.length);
    new Uint8Array(this.buf).set(Array.from(bytes), this.pos);
    this.pos += bytes.length;
    return this;
  }

  /** Write a NUL-padded string into a fixed-width field. */
  writeString(s: string, len: number): this {
    this.ensure(len);
    const bytes = new TextEncoder().encode(s).subarray(0, len);
    const out = new Uint8Array(this.buf);
    out.set(bytes, this.pos);
    out.fill(0, this.pos + bytes.length, this.pos + len);
    this.pos += len;
    return this;
  }

  /** Write a chunk header with a placeholder size. Returns the size field's offset. */
  beginChunk(type: number, libraryId = 0): number {
    this.writeUint32(type);
    const sizeOffset = this.pos;
    this.writeUint32(0);
    this.writeUint32(libraryId);
    return sizeOffset;
  }

  /** Patch a chunk's size to cover everything written since its header. */
  endChunk(sizeOffset: number): this {
    const payloadSize = this.pos - sizeOffset - 8;
    this.view.setUint32(sizeOffset, payloadSize, true);
    return this;
  }

  /** Write a complete chunk whose payload is produced by `body`. */
  chunk(type: number, libraryId: number, body: (w: this) => void): this {
    const sizeOffset = this.beginChunk(type, libraryId);
    body(this);
    return this.endChunk(sizeOffset);
  }

  toUint8Array(): Uint8Array {
    return new Uint8Array(this.buf.slice(0, this.pos));
  }

  toArrayBuffer(): ArrayBuffer {
    return this.buf.slice(0, this.pos);
  }
}

/* ------------------------------------------------------------------ */
/*  Fixtures                                                           */
/* ------------------------------------------------------------------ */


/**
 * Unit quad in the XY plane as a GEOMETRY struct payload:
 *   4 vertices, white prelit colours, one UV channel, +Z normals,
 *   triangle 0 = [0,1,2] with material 0, triangle 1 = [0,2,3] with material 1.
 */
export function writeQuadGeometryStruct(w: BsfWriter): void {
  w.writeUint32(
    GeometryFormat.POSITIONS | GeometryFormat.TEXTURED | GeometryFormat.PRELIT | GeometryFormat.NORMALS,
  );
  w.writeUint32(2); // triangles
  w.writeUint32(4); // vertices
  w.writeUint32(1); // morph targets
  for (let i = 0; i < 4; i++) w.writeBytes([255, 255, 255, 255]);
  w.writeFloat32(0, 0, 1, 0, 1, 1, 0, 1);
  // b, a, materialId, c
  w.writeUint16(1).writeUint16(0).writeUint16(0).writeUint16(2);
  w.writeUint16(2).writeUint16(0).writeUint16(1).writeUint16(3);
  w.writeFloat32(0.5, 0.5, 0, 0.75);
  w.writeUint32(1); // has vertices
  w.writeUint32(1); // has normals
  w.writeFloat32(0, 0, 0, 1, 0, 0, 1, 1, 0, 0, 1, 0);
  w.writeFloat32(0, 0, 1, 0, 0, 1, 0, 0, 1, 0, 0, 1);
}

/** MATERIAL container with the given RGBA and surface properties (1, 1, 1). */
export function writeMaterial(w: BsfWriter, libraryId: number, rgba: [number, number, number, number]): void {
  w.chunk(BsfChunkType.MATERIAL, libraryId, (m) => {
    m.chunk(BsfChunkType.STRUCT, libraryId, (s) => {
      s.writeUint32(0).writeBytes(rgba).writeUint32(0).writeUint32(0).writeFloat32(1, 1, 1);
    });
    m.chunk(BsfChunkType.EXTENSION, libraryId, () => {});
  });
}

/**
 * A clump holding one quad geometry with a red and a blue material:
 *
 *   CLUMP
 *     STRUCT
 *     FRAME_LIST
 *       STRUCT
 *     GEOMETRY_LIST
 *       STRUCT
 *       GEOMETRY
 *         STRUCT            (writeQuadGeometryStruct)
 *         MATERIAL_LIST
 *           STRUCT
 *           MATERIAL        (255, 0, 0, 255)
 *           MATERIAL        (0, 0, 255, 255)
 *         EXTENSION
 *     EXTENSION
 */
export function buildQuadClump(libraryId = LIB_ID_3_6_0_3): Uint8Array {
  const w = new BsfWriter();
  w.chunk(BsfChunkType.CLUMP, libraryId, (clump) => {
    clump.chunk(BsfChunkType.STRUCT, libraryId, (s) => {
      s.writeUint32(1).writeUint32(0).writeUint32(0);
    });
    clump.chunk(BsfChunkType.FRAME_LIST, libraryId, (frames) => {
      frames.chunk(BsfChunkType.STRUCT, libraryId, (s) => {
        s.writeUint32(0);
      });
    });
    clump.chunk(BsfChunkType.GEOMETRY_LIST, libraryId, (list) => {
      list.chunk(BsfChunkType.STRUCT, libraryId, (s) => {
        s.writeUint32(1);
      });
      list.chunk(BsfChunkType.GEOMETRY, libraryId, (geo) => {
        geo.chunk(BsfChunkType.STRUCT, libraryId, writeQuadGeometryStruct);
        geo.chunk(BsfChunkType.MATERIAL_LIST, libraryId, (mats) => {
          mats.chunk(BsfChunkType.STRUCT, libraryId, (s) => {
            s.writeUint32(2).writeUint32(0xffffffff).writeUint32(0xffffffff);
          });
          writeMaterial(mats, libraryId, [255, 0, 0, 255]);
          writeMaterial(mats, libraryId, [0, 0, 255, 255]);
        });
        geo.chunk(BsfChunkType.EXTENSION, libraryId, () => {});
      });
    });
    clump.chunk(BsfChunkType.EXTENSION, libraryId, () => {});
  });
  return w.toUint8Array();
}

/** Run `fn` and return what it threw (undefined when it returned normally). */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}
