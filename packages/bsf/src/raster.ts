/**
 * TEXTURE_NATIVE struct grammar (raster header + pixel payload).
 *
 * Layout:
 *   uint32 PlatformId
 *   uint32 FilterFlags     bits 24-31 = filter mode, bits 16-23 = packed addressing
 *   char   Name[32]        NUL-padded
 *   char   MaskName[32]    NUL-padded
 *   uint32 RasterFormat
 *   uint32 HasAlpha (version < 0x36003) | D3DFormat (otherwise)
 *   uint16 Width
 *   uint16 Height
 *   uint8  Depth
 *   uint8  NumLevels
 *   uint8  RasterType
 *   uint8  Compression (version < 0x36003) | Flags (otherwise, see RasterFlag)
 *   ...    pixel data (rest of the payload)
 */

import type { BsfReader } from './binary-reader.js';
import {
  toFilterMode,
  unpackAddressing,
  type TextureAddressing,
  type TextureFilterModeValue,
} from './texture.js';

/** First version whose raster header carries a D3D format and a flag byte. */
export const RASTER_D3D_FORMAT_VERSION = 0x36003;

export const RASTER_NAME_LENGTH = 32;

const FILTER_MODE_SHIFT = 24;
const ADDRESSING_SHIFT = 16;
const BYTE_MASK = 0xff;

/** Bit positions in the trailing flag byte of a modern raster header. */
export const RasterFlag = {
  HAS_ALPHA: 1 << 7,
  CUBE_TEXTURE: 1 << 6,
  AUTO_MIPMAPS: 1 << 5,
  COMPRESSED: 1 << 4,
} as const;

export interface BsfRaster {
  platformId: number;
  filtering: TextureFilterModeValue;
  addressing: TextureAddressing;
  name: string;
  maskName: string;
  rasterFormat: number;
  /** Only present for version >= 0x36003. */
  d3dFormat?: number;
  hasAlpha: boolean;
  width: number;
  height: number;
  depth: number;
  mipLevelCount: number;
  rasterType: number;
  /** Only present for version < 0x36003. */
  compression?: number;
  isCubeTexture: boolean;
  hasAutoMipmaps: boolean;
  isCompressed: boolean;
  pixels: Uint8Array;
}

export function hasRasterFlag(flags: number, flag: number): boolean {
  return (flags & flag) !== 0;
}

export function decodeRaster(reader: BsfReader, version: number): BsfRaster {
  const legacy = version < RASTER_D3D_FORMAT_VERSION;

  const platformId = reader.readUint32();
  const filterOffset = reader.absolutePosition;
  const filterFlags = reader.readUint32();
  const filtering = toFilterMode((filterFlags >>> FILTER_MODE_SHIFT) & BYTE_MASK, filterOffset);
  const addressing = unpackAddressing((filterFlags >>> ADDRESSING_SHIFT) & BYTE_MASK, filterOffset);
  const name = reader.readFixedString(RASTER_NAME_LENGTH);
  const maskName = reader.readFixedString(RASTER_NAME_LENGTH);
  const rasterFormat = reader.readUint32();
  const formatWord = reader.readUint32();
  const width = reader.readUint16();
  const height = reader.readUint16();
  const depth = reader.readUint8();
  const mipLevelCount = reader.readUint8();
  const rasterType = reader.readUint8();
  const trailer = reader.readUint8();

  const common = {
    platformId,
    filtering,
    addressing,
    name,
    maskName,
    rasterFormat,
    width,
    height,
    depth,
    mipLevelCount,
    rasterType,
  };

  if (legacy) {
    return {
      ...common,
      hasAlpha: formatWord !== 0,
      compression: trailer,
      isCubeTexture: false,
      hasAutoMipmaps: false,
      isCompressed: false,
      pixels: reader.readRemaining(),
    };
  }

  return {
    ...common,
    d3dFormat: formatWord,
    hasAlpha: hasRasterFlag(trailer, RasterFlag.HAS_ALPHA),
    isCubeTexture: hasRasterFlag(trailer, RasterFlag.CUBE_TEXTURE),
    hasAutoMipmaps: hasRasterFlag(trailer, RasterFlag.AUTO_MIPMAPS),
    isCompressed: hasRasterFlag(trailer, RasterFlag.COMPRESSED),
    pixels: reader.readRemaining(),
  };
}
