/**
 * CLI for inspecting collision (.col) files.
 *
 * Usage:
 *   col-inspector --input <file.col> [--verbose]
 *
 * Options:
 *   --input    Path to the input .col file
 *   --verbose  Print every sphere and box
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { BsfDecodeError } from '@rwkit/bsf';
import { ColFileReader, type ColModel, type ColVector } from './ColFileReader.js';

/* ------------------------------------------------------------------ */
/*  Argument parsing                                                   */
/* ------------------------------------------------------------------ */

interface CliArgs {
  input?: string;
  verbose: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { verbose: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--input' || arg === '-i') {
      args.input = argv[++i];
    } else if (arg === '--verbose' || arg === '-v') {
      args.verbose = true;
    }
  }
  return args;
}

/* ------------------------------------------------------------------ */
/*  Printing                                                           */
/* ------------------------------------------------------------------ */

function vec(v: ColVector): string {
  return `(${v.map((n) => n.toFixed(2)).join(', ')})`;
}

function printModel(model: ColModel, verbose: boolean): void {
  console.log(`"${model.name}" id=${model.modelId} @${model.offset}`);
  console.log(`  Bounds:   r=${model.bounds.radius.toFixed(2)} center=${vec(model.bounds.center)}`);
  console.log(`            min=${vec(model.bounds.min)} max=${vec(model.bounds.max)}`);
  console.log(`  Spheres:  ${model.spheres.length}`);
  console.log(`  Boxes:    ${model.boxes.length}`);
  console.log(`  Mesh:     ${model.vertices.length} verts, ${model.faces.length} faces`);

  if (!verbose) return;
  for (const sphere of model.spheres) {
    console.log(`    sphere r=${sphere.radius.toFixed(2)} ${vec(sphere.center)} material=${sphere.surface.material}`);
  }
  for (const box of model.boxes) {
    console.log(`    box ${vec(box.min)} - ${vec(box.max)} material=${box.surface.material}`);
  }
}

/* ------------------------------------------------------------------ */
/*  Main                                                               */
/* ------------------------------------------------------------------ */

function main(): void {
  const args = parseArgs(process.argv.slice(2));

  if (!args.input) {
    console.error('Usage: col-inspector --input <file.col> [--verbose]');
    process.exit(1);
  }

  const inputPath = resolve(args.input);
  let models: ColModel[];
  try {
    models = ColFileReader.parse(new Uint8Array(readFileSync(inputPath)));
  } catch (err) {
    if (err instanceof BsfDecodeError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  console.log(`Collision file: ${inputPath}`);
  console.log(`Models: ${models.length}\n`);
  for (const model of models) {
    printModel(model, args.verbose);
  }
}

main();
