/**
 * CLI Argument Parsing
 *
 * Single-command commander program; defaults come from the environment.
 */

import { Command, InvalidArgumentError } from 'commander';

import { env } from '../config/index.js';

export interface CLIArgs {
  inputZip: string;
  outputDir: string;
  maxZipSize: number;
  maxImageSize: number;
  threshold: number;
  hashSize: number;
  concurrency: number;
  timeoutMs: number;
  json: boolean;
}

const DESCRIPTION = `Process images from a zip file and remove near-duplicates.

Each image is reduced to an ${env.HASH_SIZE}x${env.HASH_SIZE} average-hash fingerprint. An image
whose fingerprint is within the threshold of an earlier accepted image is
dropped; the rest are written to <output-dir>/unique_images.zip.`;

function parseInteger(min: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
    }
    return parsed;
  };
}

export function createProgram(): Command {
  return new Command()
    .name('imgdedup')
    .description(DESCRIPTION)
    .argument('<input-zip>', 'Path to the input zip file')
    .argument('<output-dir>', 'Directory to store the output zip file')
    .option('--max-zip-size <bytes>', 'Maximum zip file size in bytes', parseInteger(1), env.MAX_ZIP_SIZE)
    .option(
      '--max-image-size <bytes>',
      'Maximum individual image size in bytes',
      parseInteger(1),
      env.MAX_IMAGE_SIZE
    )
    .option(
      '-t, --threshold <bits>',
      'Maximum Hamming distance for two images to count as duplicates',
      parseInteger(0),
      env.HASH_DIFF_THRESHOLD
    )
    .option('--hash-size <n>', 'Fingerprint grid side (n*n bits)', parseInteger(2), env.HASH_SIZE)
    .option(
      '-c, --concurrency <n>',
      'Images fingerprinted in parallel',
      parseInteger(1),
      env.FINGERPRINT_CONCURRENCY
    )
    .option('--timeout <ms>', 'Per-image fingerprinting timeout', parseInteger(1), env.ITEM_TIMEOUT_MS)
    .option('--json', 'Print the full verdict report as JSON');
}

function numberOpt(opts: Record<string, unknown>, key: string, fallback: number): number {
  const value = opts[key];
  return typeof value === 'number' ? value : fallback;
}

export function buildCLIArgs(inputZip: string, outputDir: string, opts: Record<string, unknown>): CLIArgs {
  return {
    inputZip,
    outputDir,
    maxZipSize: numberOpt(opts, 'maxZipSize', env.MAX_ZIP_SIZE),
    maxImageSize: numberOpt(opts, 'maxImageSize', env.MAX_IMAGE_SIZE),
    threshold: numberOpt(opts, 'threshold', env.HASH_DIFF_THRESHOLD),
    hashSize: numberOpt(opts, 'hashSize', env.HASH_SIZE),
    concurrency: numberOpt(opts, 'concurrency', env.FINGERPRINT_CONCURRENCY),
    timeoutMs: numberOpt(opts, 'timeout', env.ITEM_TIMEOUT_MS),
    json: opts.json === true
  };
}

/**
 * Parse CLI arguments from an argv array (user args only, no node/script).
 * Throws a CommanderError instead of exiting.
 */
export function parseArgs(argv: string[]): CLIArgs {
  const program = createProgram()
    .exitOverride()
    .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });

  let result: CLIArgs | undefined;
  program.action((inputZip: string, outputDir: string, opts: Record<string, unknown>) => {
    result = buildCLIArgs(inputZip, outputDir, opts);
  });

  program.parse(argv, { from: 'user' });

  if (!result) {
    throw new Error('No command parsed');
  }
  return result;
}
