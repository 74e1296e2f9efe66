/**
 * Library id packing.
 *
 * Newer files pack the format version and the build number into one word:
 *   bits 30-31 : unused
 *   bits 22-29 : version bits 8-15 (minus the implicit 3.x prefix)
 *   bits 16-21 : version bits 0-5
 *   bits  0-15 : build number
 * Older files store `version >> 8` directly and have no build number.
 */

export interface LibraryVersion {
  version: number;
  build: number;
}

const MODERN_PACKING_MASK = 0xffff0000;

export function isModernLibraryId(libraryId: number): boolean {
  return (libraryId & MODERN_PACKING_MASK) !== 0;
}

export function unpackLibraryId(libraryId: number): LibraryVersion {
  const id = libraryId >>> 0;
  if (isModernLibraryId(id)) {
    return {
      version: ((((id >>> 14) & 0x3ff00) + 0x30000) | ((id >>> 16) & 0x3f)) >>> 0,
      build: id & 0xffff,
    };
  }
  return { version: (id << 8) >>> 0, build: 0 };
}

/** Format a version as the dotted form used in tooling output, e.g. `3.6.0.3`. */
export function formatVersion(version: number): string {
  const major = (version >>> 16) & 0xf;
  const minor = (version >>> 12) & 0xf;
  const revision = (version >>> 8) & 0xf;
  const patch = version & 0xff;
  return `${major}.${minor}.${revision}.${patch}`;
}
