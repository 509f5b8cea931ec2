#!/usr/bin/env node
/**
 * Outline extraction script
 *
 * Converts every PDF in an input directory into a JSON outline
 * (title + H1/H2/H3 headings) in an output directory.
 *
 *   tsx scripts/extract-outlines.ts [inputDir] [outputDir]
 *
 * Environment (a .env file is honoured):
 *   OUTLINE_INPUT_DIR, OUTLINE_OUTPUT_DIR, OUTLINE_CONCURRENCY,
 *   OUTLINE_TIMEOUT_MS, OUTLINE_LOG_LEVEL
 */

import 'dotenv/config';
import { resolve } from 'path';
import { PDFOutline } from '../src/index.js';
import { BatchProcessor, batchOptionsFromEnv } from '../src/batch/batch-processor.js';
import { ConsoleReporter } from '../src/utils/reporter.js';

async function main(): Promise<void> {
  const [inputArg, outputArg] = process.argv.slice(2);
  const inputDir = resolve(inputArg ?? process.env.OUTLINE_INPUT_DIR ?? 'input');
  const outputDir = resolve(outputArg ?? process.env.OUTLINE_OUTPUT_DIR ?? 'output');

  const options = batchOptionsFromEnv(process.env);
  const reporter = new ConsoleReporter(options.logLevel);
  const outline = new PDFOutline({ reporter });
  const processor = new BatchProcessor((data) => outline.extractOrThrow(data), options, reporter);

  const results = await processor.processDirectory(inputDir, outputDir);

  console.log('\n📊 Summary');
  console.log('─'.repeat(60));
  for (const r of results) {
    const detail = r.success ? `${r.headingCount} heading(s)` : r.error ?? 'failed';
    console.log(`   ${r.success ? '✓' : '✗'} ${r.fileName} (${r.processingTime}ms) ${detail}`);
  }

  if (results.some((r) => !r.success)) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
