/**
 * Collision file reader (COLL version 1).
 *
 * A .col file is a sequence of records, each:
 *   "COLL" marker + uint32 size of the rest of the record
 *   name[22] (NUL-padded), model id (uint16)
 *   bounds: radius, center, min, max
 *   spheres, lines (always empty), boxes, vertices, faces
 *     each section is a uint32 count followed by fixed-size items
 *
 * All values are little-endian.
 */

import { BsfDecodeError, BsfReader } from '@rwkit/bsf';

export type ColVector = [number, number, number];

export interface ColSurface {
  material: number;
  flag: number;
  brightness: number;
  light: number;
}

export interface ColBounds {
  radius: number;
  center: ColVector;
  min: ColVector;
  max: ColVector;
}

export interface ColSphere {
  radius: number;
  center: ColVector;
  surface: ColSurface;
}

export interface ColBox {
  min: ColVector;
  max: ColVector;
  surface: ColSurface;
}

export interface ColFace {
  vertices: [number, number, number];
  surface: ColSurface;
}

export interface ColModel {
  name: string;
  modelId: number;
  bounds: ColBounds;
  spheres: ColSphere[];
  boxes: ColBox[];
  vertices: ColVector[];
  faces: ColFace[];
  /** Absolute offset of the record's marker */
  offset: number;
}

export const COL_MARKER = 'COLL';
const MODEL_NAME_LENGTH = 22;

export class ColFormatError extends BsfDecodeError {
  constructor(message: string, offset: number) {
    super(message, offset);
    this.name = 'ColFormatError';
  }
}

export class ColFileReader {
  /**
   * Parse every collision record in the buffer.
   */
  static parse(buffer: ArrayBuffer | Uint8Array): ColModel[] {
    const reader = BsfReader.from(buffer);
    const models: ColModel[] = [];
    while (!reader.isAtEnd) {
      models.push(ColFileReader.parseRecord(reader));
    }
    return models;
  }

  /**
   * Parse one record at the reader's position and advance past it.
   */
  static parseRecord(reader: BsfReader): ColModel {
    const offset = reader.absolutePosition;
    const marker = String.fromCharCode(...reader.readBytes(4));
    if (marker !== COL_MARKER) {
      throw new ColFormatError(`Invalid collision marker "${marker}" at offset ${offset}`, offset);
    }

    const body = reader.slice(reader.readUint32());
    const name = body.readFixedString(MODEL_NAME_LENGTH);
    const modelId = body.readUint16();
    const bounds: ColBounds = {
      radius: body.readFloat32(),
      center: readVector(body),
      min: readVector(body),
      max: readVector(body),
    };

    const spheres = readList(body, () => ({
      radius: body.readFloat32(),
      center: readVector(body),
      surface: readSurface(body),
    }));

    const lineOffset = body.absolutePosition;
    const lineCount = body.readUint32();
    if (lineCount !== 0) {
      throw new ColFormatError(`Unsupported line section with ${lineCount} entries at offset ${lineOffset}`, lineOffset);
    }

    const boxes = readList(body, () => ({
      min: readVector(body),
      max: readVector(body),
      surface: readSurface(body),
    }));

    const vertices = readList(body, () => readVector(body));

    const faces = readList(body, (): ColFace => ({
      vertices: [body.readUint32(), body.readUint32(), body.readUint32()],
      surface: readSurface(body),
    }));

    return { name, modelId, bounds, spheres, boxes, vertices, faces, offset };
  }
}

/* ------------------------------------------------------------------ */
/*  Field readers                                                      */
/* ------------------------------------------------------------------ */

function readVector(reader: BsfReader): ColVector {
  return [reader.readFloat32(), reader.readFloat32(), reader.readFloat32()];
}

function readSurface(reader: BsfReader): ColSurface {
  return {
    material: reader.readUint8(),
    flag: reader.readUint8(),
    brightness: reader.readUint8(),
    light: reader.readUint8(),
  };
}

function readList<T>(reader: BsfReader, readItem: () => T): T[] {
  const count = reader.readUint32();
  const items: T[] = [];
  for (let i = 0; i < count; i++) {
    items.push(readItem());
  }
  return items;
}
