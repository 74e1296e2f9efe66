/**
 * Bounded little-endian cursor over one region of a chunk stream.
 *
 * A reader never looks outside the bytes it was created over. Sub-readers
 * created with `slice()` share the underlying memory and report error offsets
 * relative to the start of the root buffer.
 */

import { TruncatedInputError } from './errors.js';

export class BsfReader {
  private readonly view: DataView;
  private pos = 0;

  constructor(
    private readonly bytes: Uint8Array,
    /** Absolute offset of `bytes[0]` within the root buffer. */
    readonly baseOffset = 0,
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  static from(data: ArrayBuffer | Uint8Array): BsfReader {
    return new BsfReader(data instanceof Uint8Array ? data : new Uint8Array(data));
  }

  /* ------------------------------------------------------------------ */
  /*  Position                                                           */
  /* ------------------------------------------------------------------ */

  get byteLength(): number {
    return this.bytes.byteLength;
  }

  get position(): number {
    return this.pos;
  }

  /** Absolute offset of the cursor within the root buffer. */
  get absolutePosition(): number {
    return this.baseOffset + this.pos;
  }

  get remaining(): number {
    return this.bytes.byteLength - this.pos;
  }

  get isAtEnd(): boolean {
    return this.pos >= this.bytes.byteLength;
  }

  private require(count: number): void {
    if (count > this.remaining) {
      throw new TruncatedInputError(this.absolutePosition, count, this.remaining);
    }
  }

  /* ------------------------------------------------------------------ */
  /*  Primitive readers                                                  */
  /* ------------------------------------------------------------------ */

  readUint8(): number {
    this.require(1);
    const value = this.view.getUint8(this.pos);
    this.pos += 1;
    return value;
  }

  readUint16(): number {
    this.require(2);
    const value = this.view.getUint16(this.pos, true);
    this.pos += 2;
    return value;
  }

  readUint32(): number {
    this.require(4);
    const value = this.view.getUint32(this.pos, true);
    this.pos += 4;
    return value;
  }

  readFloat32(): number {
    this.require(4);
    const value = this.view.getFloat32(this.pos, true);
    this.pos += 4;
    return value;
  }

  /** Copies `count` floats; the source is not guaranteed to be 4-byte aligned. */
  readFloat32Array(count: number): Float32Array {
    this.require(count * 4);
    const arr = new Float32Array(count);
    for (let i = 0; i < count; i++) {
      arr[i] = this.view.getFloat32(this.pos + i * 4, true);
    }
    this.pos += count * 4;
    return arr;
  }

  /** Zero-copy view of the next `count` bytes. */
  readBytes(count: number): Uint8Array {
    this.require(count);
    const out = this.bytes.subarray(this.pos, this.pos + count);
    this.pos += count;
    return out;
  }

  /** Zero-copy view of everything left in this region. */
  readRemaining(): Uint8Array {
    return this.readBytes(this.remaining);
  }

  /** Read a fixed-width field and strip everything from the first NUL on. */
  readFixedString(length: number): string {
    return decodeText(this.readBytes(length));
  }

  /**
   * Consume `length` bytes and return a reader confined to them.
   * The caller is responsible for bounds-checking `length` first when a
   * more specific error than TruncatedInputError is wanted.
   */
  slice(length: number): BsfReader {
    const start = this.absolutePosition;
    return new BsfReader(this.readBytes(length), start);
  }
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** NUL-trimmed text; malformed UTF-8 yields an empty string. */
export function decodeText(bytes: Uint8Array): string {
  let end = 0;
  while (end < bytes.length && bytes[end] !== 0) end++;
  try {
    return utf8.decode(bytes.subarray(0, end));
  } catch {
    return '';
  }
}
