/**
 * MATERIAL struct grammar.
 *
 * Layout:
 *   uint32 Flags        (ignored)
 *   uint8  Color[4]     RGBA
 *   uint32 Unused
 *   uint32 IsTextured   (ignored; the TEXTURE child says the same)
 *   float32 Ambient, Specular, Diffuse   only when version > 0x30400
 */

import type { BsfReader } from './binary-reader.js';

export interface RgbaColor {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface SurfaceProperties {
  ambient: number;
  specular: number;
  diffuse: number;
}

export interface BsfMaterial {
  color: RgbaColor;
  surfaceProperties?: SurfaceProperties;
}

/** Materials written after this version carry their own surface properties. */
export const MATERIAL_SURFACE_PROPS_VERSION = 0x30400;

export function readRgba(reader: BsfReader): RgbaColor {
  const r = reader.readUint8();
  const g = reader.readUint8();
  const b = reader.readUint8();
  const a = reader.readUint8();
  return { r, g, b, a };
}

export function readSurfaceProperties(reader: BsfReader): SurfaceProperties {
  const ambient = reader.readFloat32();
  const specular = reader.readFloat32();
  const diffuse = reader.readFloat32();
  return { ambient, specular, diffuse };
}

export function decodeMaterial(reader: BsfReader, version: number): BsfMaterial {
  reader.readUint32(); // flags
  const color = readRgba(reader);
  reader.readUint32(); // unused
  reader.readUint32(); // isTextured

  if (version > MATERIAL_SURFACE_PROPS_VERSION) {
    return { color, surfaceProperties: readSurfaceProperties(reader) };
  }
  return { color };
}
