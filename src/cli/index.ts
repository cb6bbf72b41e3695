#!/usr/bin/env node
import { existsSync, realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { buildCLIArgs, createProgram, type CLIArgs } from './args.js';
import { logger } from '../lib/logger.js';
import { dedupeArchive } from '../services/archive-dedup.js';
import type { DedupReport } from '../types/index.js';

export function formatSummary(report: DedupReport): string {
  const { unique, duplicate, skipped } = report.counts;
  return `Identified ${unique} unique images, ${duplicate} duplicates, ${skipped} skipped.`;
}

export async function run(args: CLIArgs): Promise<void> {
  const { report, outputPath } = await dedupeArchive({
    inputPath: args.inputZip,
    outputDir: args.outputDir,
    maxArchiveSize: args.maxZipSize,
    maxImageSize: args.maxImageSize,
    threshold: args.threshold,
    hashSize: args.hashSize,
    concurrency: args.concurrency,
    itemTimeoutMs: args.timeoutMs
  });

  if (args.json) {
    const { verdicts, counts } = report;
    console.log(JSON.stringify({ outputPath, counts, verdicts }, null, 2));
    return;
  }

  console.log(formatSummary(report));
  console.log(`Unique images have been zipped at ${outputPath}`);
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram().action(
    async (inputZip: string, outputDir: string, opts: Record<string, unknown>) => {
      await run(buildCLIArgs(inputZip, outputDir, opts));
    }
  );

  await program.parseAsync(argv);
}

function isEntrypoint(): boolean {
  const script = process.argv[1];
  if (!script || !existsSync(script)) {
    return false;
  }
  return realpathSync(script) === fileURLToPath(import.meta.url);
}

if (isEntrypoint()) {
  main().catch(error => {
    logger.error(error, 'Fatal error');
    console.error(`An error occurred: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
}
