import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import type { BatchOptions } from '../types/config.js';
import type { OutlineResult } from '../types/outline.js';
import { describeError, isReportLevel, ConsoleReporter, type Reporter } from '../utils/reporter.js';

export const DEFAULT_BATCH_OPTIONS: BatchOptions = {
  maxConcurrentDocuments: 2,
  documentTimeoutMs: 60_000,
  logLevel: 'info'
};

const envNumber = (raw: string | undefined): number | null => {
  if (raw === undefined || raw.trim() === '') return null;
  const n = Number(raw);
  return Number.isFinite(n) ? n : null;
};

/** Reads OUTLINE_CONCURRENCY, OUTLINE_TIMEOUT_MS and OUTLINE_LOG_LEVEL. */
export const batchOptionsFromEnv = (env: Record<string, string | undefined>): BatchOptions => {
  const concurrency = envNumber(env.OUTLINE_CONCURRENCY);
  const timeoutMs = envNumber(env.OUTLINE_TIMEOUT_MS);
  const logLevel = env.OUTLINE_LOG_LEVEL?.trim().toLowerCase() ?? '';

  return {
    maxConcurrentDocuments:
      concurrency !== null && Number.isInteger(concurrency) && concurrency > 0
        ? concurrency
        : DEFAULT_BATCH_OPTIONS.maxConcurrentDocuments,
    documentTimeoutMs: timeoutMs !== null && timeoutMs >= 0 ? timeoutMs : DEFAULT_BATCH_OPTIONS.documentTimeoutMs,
    logLevel: isReportLevel(logLevel) ? logLevel : DEFAULT_BATCH_OPTIONS.logLevel
  };
};

export interface BatchResult {
  fileName: string;
  success: boolean;
  outputPath?: string;
  error?: string;
  processingTime: number;
  headingCount: number;
}

export type OutlineExtractor = (pdfData: Uint8Array) => Promise<OutlineResult>;

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export const withTimeout = async <T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> => {
  if (timeoutMs <= 0) return work;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
};

export const serializeOutline = (result: OutlineResult): string => JSON.stringify(result, null, 4);

/**
 * Converts every PDF in a directory into `<name>.json` outlines. A failing
 * document is recorded and does not stop the batch.
 */
export class BatchProcessor {
  private extractor: OutlineExtractor;
  private options: BatchOptions;
  private reporter: Reporter;

  constructor(extractor: OutlineExtractor, options: Partial<BatchOptions> = {}, reporter?: Reporter) {
    this.extractor = extractor;
    this.options = { ...DEFAULT_BATCH_OPTIONS, ...options };
    this.reporter = reporter ?? new ConsoleReporter(this.options.logLevel);
  }

  async processDirectory(inputDir: string, outputDir: string): Promise<BatchResult[]> {
    await mkdir(outputDir, { recursive: true });

    const entries = await readdir(inputDir);
    const pdfFiles = entries.filter((name) => extname(name).toLowerCase() === '.pdf').sort();
    this.reporter.recordEvent('info', `Found ${pdfFiles.length} PDF(s) to process in '${inputDir}'.`);

    const results: BatchResult[] = new Array(pdfFiles.length);
    const queue: Array<Promise<void>> = [];
    const maxConcurrent = Math.max(1, this.options.maxConcurrentDocuments);

    for (let i = 0; i < pdfFiles.length; i++) {
      const fileName = pdfFiles[i];
      if (fileName === undefined) continue;
      const promise: Promise<void> = this.processFile(join(inputDir, fileName), outputDir).then((result) => {
        results[i] = result;
        queue.splice(queue.indexOf(promise), 1);
      });
      queue.push(promise);

      if (queue.length >= maxConcurrent) {
        await Promise.race(queue);
      }
    }

    await Promise.all(queue);
    this.reporter.recordEvent('info', '--- All processing complete ---');
    return results;
  }

  async processFile(pdfPath: string, outputDir: string): Promise<BatchResult> {
    const fileName = basename(pdfPath);
    const startTime = Date.now();
    this.reporter.recordEvent('info', `--- Starting processing for: ${fileName} ---`);

    try {
      const data = await readFile(pdfPath);
      const result = await withTimeout(
        this.extractor(new Uint8Array(data)),
        this.options.documentTimeoutMs,
        fileName
      );

      const outputPath = join(outputDir, `${basename(fileName, extname(fileName))}.json`);
      await writeFile(outputPath, serializeOutline(result), 'utf-8');

      const processingTime = Date.now() - startTime;
      this.reporter.recordEvent(
        'info',
        `Successfully processed ${fileName} in ${(processingTime / 1000).toFixed(2)} seconds.`
      );
      return { fileName, success: true, outputPath, processingTime, headingCount: result.outline.length };
    } catch (error) {
      const message = describeError(error);
      this.reporter.recordEvent('error', `An unexpected error occurred while processing ${fileName}: ${message}`);
      if (error instanceof TimeoutError) {
        this.reporter.recordEvent(
          'warn',
          `Abandoned ${fileName}; its extraction keeps running outside the concurrency limit`
        );
      }
      return { fileName, success: false, error: message, processingTime: Date.now() - startTime, headingCount: 0 };
    }
  }
}
