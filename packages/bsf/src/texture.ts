/**
 * Texture sampling state and the TEXTURE struct grammar.
 *
 * TEXTURE struct layout (4 bytes):
 *   uint8  FilterMode
 *   uint8  Addressing   (high nibble = U axis, low nibble = V axis)
 *   uint16 HasMipmaps   (non-zero = true)
 */

import type { BsfReader } from './binary-reader.js';
import { InvalidEnumValueError } from './errors.js';

export const TextureFilterMode = {
  NONE: 0,
  NEAREST: 1,
  LINEAR: 2,
  MIP_NEAREST: 3,
  MIP_LINEAR: 4,
  LINEAR_MIP_NEAREST: 5,
  LINEAR_MIP_LINEAR: 6,
} as const;

export type TextureFilterModeValue = (typeof TextureFilterMode)[keyof typeof TextureFilterMode];

export const TextureAddressMode = {
  NONE: 0,
  WRAP: 1,
  MIRROR: 2,
  CLAMP: 3,
  BORDER: 4,
} as const;

export type TextureAddressModeValue = (typeof TextureAddressMode)[keyof typeof TextureAddressMode];

/** Addressing mode per axis: [U, V]. */
export type TextureAddressing = readonly [TextureAddressModeValue, TextureAddressModeValue];

export interface BsfTexture {
  filtering: TextureFilterModeValue;
  addressing: TextureAddressing;
  hasMipmaps: boolean;
}

const FILTER_MODES: readonly number[] = Object.values(TextureFilterMode);
const ADDRESS_MODES: readonly number[] = Object.values(TextureAddressMode);

function isFilterMode(value: number): value is TextureFilterModeValue {
  return FILTER_MODES.includes(value);
}

function isAddressMode(value: number): value is TextureAddressModeValue {
  return ADDRESS_MODES.includes(value);
}

export function toFilterMode(value: number, offset: number): TextureFilterModeValue {
  if (!isFilterMode(value)) throw new InvalidEnumValueError(offset, 'TextureFilterMode', value);
  return value;
}

export function toAddressMode(value: number, offset: number): TextureAddressModeValue {
  if (!isAddressMode(value)) throw new InvalidEnumValueError(offset, 'TextureAddressMode', value);
  return value;
}

const ADDRESS_U_SHIFT = 4;
const ADDRESS_NIBBLE_MASK = 0x0f;

/** Split a packed addressing byte into its U (high nibble) and V (low nibble) modes. */
export function unpackAddressing(packed: number, offset: number): TextureAddressing {
  const u = (packed >>> ADDRESS_U_SHIFT) & ADDRESS_NIBBLE_MASK;
  const v = packed & ADDRESS_NIBBLE_MASK;
  return [toAddressMode(u, offset), toAddressMode(v, offset)];
}

export function decodeTexture(reader: BsfReader): BsfTexture {
  const filterOffset = reader.absolutePosition;
  const filtering = toFilterMode(reader.readUint8(), filterOffset);
  const addressOffset = reader.absolutePosition;
  const addressing = unpackAddressing(reader.readUint8(), addressOffset);
  const hasMipmaps = reader.readUint16() !== 0;
  return { filtering, addressing, hasMipmaps };
}
