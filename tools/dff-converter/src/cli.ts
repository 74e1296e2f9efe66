/**
 * CLI for inspecting DFF/TXD chunk files and converting clumps to GLB.
 *
 * Usage:
 *   dff-converter --input <file.dff> --output <file.glb> [--info]
 *
 * Options:
 *   --input   Path to the input .dff or .txd file
 *   --output  Path for the output .glb file
 *   --info    Print the chunk tree without converting
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  BsfDecodeError,
  BsfParser,
  chunkTypeName,
  collectGeometries,
  collectRasters,
  contentOf,
  formatVersion,
  walkChunks,
  type BsfChunk,
} from '@rwkit/bsf';
import { GltfBuilder } from './GltfBuilder.js';

/* ------------------------------------------------------------------ */
/*  Argument parsing                                                   */
/* ------------------------------------------------------------------ */

interface CliArgs {
  input?: string;
  output?: string;
  info: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { info: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--input' || arg === '-i') {
      args.input = argv[++i];
    } else if (arg === '--output' || arg === '-o') {
      args.output = argv[++i];
    } else if (arg === '--info') {
      args.info = true;
    }
  }
  return args;
}

/* ------------------------------------------------------------------ */
/*  Chunk tree printer                                                 */
/* ------------------------------------------------------------------ */

function printChunkTree(root: BsfChunk): void {
  for (const { chunk, depth } of walkChunks(root)) {
    const { header, content } = chunk;
    const indent = '  '.repeat(depth);
    const name = chunkTypeName(header.type);
    const sizeStr = header.size.toLocaleString();
    const detail = content.kind === 'text' ? ` "${content.value}"` : ` [${content.kind}]`;
    console.log(
      `${indent}${name} @${header.offset}  ${sizeStr} bytes  v${formatVersion(header.version)}${detail}`,
    );
  }
}

function printSummary(root: BsfChunk): void {
  const geometries = collectGeometries(root);
  for (const [i, { geometry, materials }] of geometries.entries()) {
    console.log(
      `  Geometry ${i}: ${geometry.vertexCount} verts, ${geometry.triangleCount} tris, ${materials.length} materials`,
    );
  }
  for (const chunk of collectRasters(root)) {
    const raster = contentOf(chunk, 'raster')?.raster;
    if (raster) {
      console.log(`  Raster "${raster.name}": ${raster.width}x${raster.height}, ${raster.mipLevelCount} mips`);
    }
  }
}

/* ------------------------------------------------------------------ */
/*  Main                                                               */
/* ------------------------------------------------------------------ */

function main(): void {
  const args = parseArgs(process.argv.slice(2));

  if (!args.input) {
    console.error('Usage: dff-converter --input <file.dff> --output <file.glb> [--info]');
    process.exit(1);
  }

  const inputPath = resolve(args.input);
  const fileBytes = new Uint8Array(readFileSync(inputPath));

  let root: BsfChunk;
  try {
    root = BsfParser.parse(fileBytes);
  } catch (err) {
    if (err instanceof BsfDecodeError) {
      console.error(`Error: ${err.message} (offset ${err.offset})`);
      process.exit(1);
    }
    throw err;
  }

  if (args.info) {
    console.log(`Chunk tree for: ${inputPath}`);
    console.log(`File size: ${fileBytes.byteLength.toLocaleString()} bytes\n`);
    printChunkTree(root);
    console.log('');
    printSummary(root);
    return;
  }

  if (!args.output) {
    console.error('Error: --output is required when not using --info');
    process.exit(1);
  }

  const outputPath = resolve(args.output);

  console.log(`Parsing: ${inputPath}`);
  printSummary(root);

  console.log(`\nBuilding GLB...`);
  const glb = GltfBuilder.buildGlb(root);

  writeFileSync(outputPath, new Uint8Array(glb));
  console.log(`Written: ${outputPath} (${glb.byteLength.toLocaleString()} bytes)`);
}

main();
