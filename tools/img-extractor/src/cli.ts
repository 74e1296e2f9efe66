/**
 * IMG Archive Extractor CLI
 *
 * Usage:
 *   img-extractor --input <file.img> [--dir <file.dir>] --output <dir> [--list] [--filter <ext>] [--name <file>]
 *
 * Options:
 *   --input   Path to the .img archive
 *   --dir     Path to the .dir table (defaults to the .img path with a .dir extension)
 *   --output  Output directory for extracted files
 *   --list    List files without extracting
 *   --filter  Only extract files matching extension (e.g., .dff, .txd, .col)
 *   --name    Only extract the named file
 */

import { readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { ImgArchiveError, ImgArchiveReader } from './ImgArchiveReader.js';

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

interface CliArgs {
  input: string | undefined;
  dir: string | undefined;
  output: string | undefined;
  list: boolean;
  filter: string | undefined;
  name: string | undefined;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    input: undefined,
    dir: undefined,
    output: undefined,
    list: false,
    filter: undefined,
    name: undefined,
  };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--input':
      case '-i':
        args.input = argv[++i];
        break;
      case '--dir':
      case '-d':
        args.dir = argv[++i];
        break;
      case '--output':
      case '-o':
        args.output = argv[++i];
        break;
      case '--list':
      case '-l':
        args.list = true;
        break;
      case '--filter':
      case '-f':
        args.filter = argv[++i];
        break;
      case '--name':
      case '-n':
        args.name = argv[++i];
        break;
      case '--help':
      case '-h':
        printUsage();
        process.exit(0);
        break;
      default:
        console.error(`Unknown argument: ${arg}`);
        printUsage();
        process.exit(1);
    }
  }

  return args;
}

function printUsage(): void {
  console.log(`
IMG Archive Extractor

Usage:
  img-extractor --input <file.img> --output <dir> [--dir <file.dir>] [--list] [--filter <ext>] [--name <file>]

Options:
  --input,  -i   Path to .img archive (required)
  --dir,    -d   Path to .dir table (default: input with .dir extension)
  --output, -o   Output directory for extracted files (required unless --list)
  --list,   -l   List files without extracting
  --filter, -f   Only extract files matching extension (e.g., .dff, .txd, .col)
  --name,   -n   Only extract the named file
  --help,   -h   Show this help message
  `.trim());
}

// ---------------------------------------------------------------------------
// Formatting helpers
// ---------------------------------------------------------------------------

function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function run(args: CliArgs): void {
  const input = args.input;
  if (!input) {
    console.error('Error: --input is required\n');
    printUsage();
    process.exit(1);
  }

  const output = args.output;
  if (!args.list && !output) {
    console.error('Error: --output is required when not using --list\n');
    printUsage();
    process.exit(1);
  }

  const dirPath = args.dir ?? input.replace(/\.img$/i, '') + '.dir';
  console.log(`Reading directory: ${dirPath}`);
  const archive = ImgArchiveReader.parseDirectory(new Uint8Array(readFileSync(dirPath)));
  console.log(`Archive: ${archive.entries.length} files`);

  let entries = archive.entries;
  if (args.name) {
    const entry = ImgArchiveReader.findEntry(archive, args.name);
    if (!entry) {
      console.error(`Error: "${args.name}" not found in archive`);
      process.exit(1);
    }
    entries = [entry];
  } else if (args.filter) {
    const ext = args.filter.startsWith('.') ? args.filter : `.${args.filter}`;
    entries = ImgArchiveReader.listByExtension(archive, ext);
    console.log(`Filter: *${ext} (${entries.length} matching file(s))`);
  }

  if (args.list || !output) {
    console.log('');
    for (const entry of entries) {
      console.log(`  ${entry.name}  (${formatSize(entry.size)})`);
    }
    console.log(`\nTotal: ${entries.length} file(s)`);
    return;
  }

  console.log(`Reading archive: ${input}`);
  const img = new Uint8Array(readFileSync(input));
  mkdirSync(output, { recursive: true });

  let totalBytes = 0;
  for (const entry of entries) {
    writeFileSync(ImgArchiveReader.outputPath(output, entry), ImgArchiveReader.extractFile(img, entry));
    totalBytes += entry.size;
  }

  console.log(`\nExtracted ${entries.length} file(s) (${formatSize(totalBytes)}) to ${output}`);
}

function main(): void {
  try {
    run(parseArgs(process.argv));
  } catch (err) {
    if (err instanceof ImgArchiveError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

main();
