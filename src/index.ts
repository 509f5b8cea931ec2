import type {
  PDFOutlineConfig,
  GroupingOptions,
  ClassifierOptions,
  ConversionProgress,
  ProgressCallback
} from './types/index.js';
import type { PageWords } from './types/pdf.js';
import type { OutlineResult, PageBlocks } from './types/outline.js';
import { NO_CONTENT_TITLE } from './types/outline.js';
import { BlockGrouper } from './core/block-grouper.js';
import { OutlineClassifier } from './core/outline/classifier.js';
import { KMeansLevelAssigner } from './core/outline/level-assigner.js';
import type { LevelAssigner } from './core/outline/types.js';
import { UnPDFWrapper } from './core/unpdf-wrapper.js';
import { ConsoleReporter, describeError, type Reporter } from './utils/reporter.js';

// Convenience configuration presets
export const OutlinePresets = {
  /**
   * Thresholds tuned for A4/Letter reports and papers
   */
  default: {},

  /**
   * Fewer false positives: shorter headings, larger type required
   */
  strict: {
    classifier: {
      headingWordLimit: 10,
      largeFontSize: 16,
      allCapsMinFontSize: 12
    }
  },

  /**
   * Picks up headings set in body-sized type
   */
  lenient: {
    classifier: {
      headingWordLimit: 20,
      maxHeadingWords: 25,
      largeFontSize: 12,
      allCapsMinFontSize: 10
    }
  }
} satisfies Record<string, Pick<PDFOutlineConfig, 'grouping' | 'classifier'>>;

export class PDFOutline {
  private grouping: Partial<GroupingOptions>;
  private classifierOptions: Partial<ClassifierOptions>;
  private levelAssigner: LevelAssigner;
  private reporter: Reporter;

  constructor(config: PDFOutlineConfig = {}) {
    this.grouping = { ...config.grouping };
    this.classifierOptions = { ...config.classifier };
    this.levelAssigner = config.levelAssigner ?? new KMeansLevelAssigner();
    this.reporter = config.reporter ?? new ConsoleReporter('warn');
  }

  // Chainable configuration methods
  setGroupingOptions(options: Partial<GroupingOptions>): this {
    this.grouping = { ...this.grouping, ...options };
    return this;
  }

  setClassifierOptions(options: Partial<ClassifierOptions>): this {
    this.classifierOptions = { ...this.classifierOptions, ...options };
    return this;
  }

  setLevelAssigner(assigner: LevelAssigner): this {
    this.levelAssigner = assigner;
    return this;
  }

  setReporter(reporter: Reporter): this {
    this.reporter = reporter;
    return this;
  }

  applyPreset(preset: keyof typeof OutlinePresets): this {
    const presetConfig: Pick<PDFOutlineConfig, 'grouping' | 'classifier'> = OutlinePresets[preset];
    if (!presetConfig) {
      throw new Error(`Unknown preset: ${preset}. Available presets: ${Object.keys(OutlinePresets).join(', ')}`);
    }
    this.grouping = { ...this.grouping, ...presetConfig.grouping };
    this.classifierOptions = { ...this.classifierOptions, ...presetConfig.classifier };
    return this;
  }

  /**
   * Runs grouping and classification over already-extracted pages.
   * Synchronous; never throws for well-formed input.
   */
  buildFromPages(pages: readonly PageWords[], progressCallback?: ProgressCallback): OutlineResult {
    if (pages.length === 0) {
      this.reporter.recordEvent('info', 'No pages to analyse');
      return { title: NO_CONTENT_TITLE, outline: [] };
    }

    const grouper = new BlockGrouper(this.grouping, this.reporter);
    const pageBlocks: PageBlocks[] = pages.map((page, i) => {
      this.reportProgress(progressCallback, {
        stage: 'grouping',
        progress: Math.round(((i + 1) / pages.length) * 80),
        currentPage: page.pageNumber,
        totalPages: pages.length
      });
      return {
        pageNumber: page.pageNumber,
        width: page.width,
        height: page.height,
        blocks: grouper.group(page.words, page.pageNumber)
      };
    });

    this.reportProgress(progressCallback, {
      stage: 'classifying',
      progress: 90,
      message: 'Classifying headings...'
    });
    const classifier = new OutlineClassifier(this.classifierOptions, this.levelAssigner, this.reporter);
    const result = classifier.build(pageBlocks);

    this.reportProgress(progressCallback, {
      stage: 'complete',
      progress: 100,
      message: `Found ${result.outline.length} heading(s)`
    });
    return result;
  }

  /**
   * Extracts words from PDF bytes and builds the outline. Extraction failures
   * are reported and produce the "No Content Found" result.
   */
  async extract(pdfData: ArrayBuffer | Uint8Array, progressCallback?: ProgressCallback): Promise<OutlineResult> {
    let pages: PageWords[];
    try {
      pages = await this.parsePages(pdfData, progressCallback);
    } catch (error) {
      this.reporter.recordEvent('error', describeError(error));
      return { title: NO_CONTENT_TITLE, outline: [] };
    }
    return this.buildFromPages(pages, progressCallback);
  }

  /**
   * Like {@link extract}, but rejects when the PDF yields no pages, so callers
   * such as the batch processor can count the document as failed.
   */
  async extractOrThrow(pdfData: ArrayBuffer | Uint8Array, progressCallback?: ProgressCallback): Promise<OutlineResult> {
    const pages = await this.parsePages(pdfData, progressCallback);
    return this.buildFromPages(pages, progressCallback);
  }

  private async parsePages(pdfData: ArrayBuffer | Uint8Array, progressCallback?: ProgressCallback): Promise<PageWords[]> {
    this.reportProgress(progressCallback, {
      stage: 'parsing',
      progress: 0,
      message: 'Parsing PDF document...'
    });

    const wrapper = new UnPDFWrapper(this.reporter);
    let pages: PageWords[];
    try {
      pages = await wrapper.parseDocument(pdfData);
    } catch (error) {
      throw new Error(`Could not extract any data from PDF: ${describeError(error)}`, { cause: error });
    } finally {
      await wrapper.dispose();
    }

    if (pages.length === 0) {
      throw new Error('Could not extract any data from PDF: document has no pages');
    }
    return pages;
  }

  private reportProgress(callback: ProgressCallback | undefined, progress: ConversionProgress): void {
    if (callback) {
      callback(progress);
    }
  }
}

export type * from './types/index.js';
export { HEADING_LEVELS, NO_CONTENT_TITLE, UNTITLED_TITLE } from './types/outline.js';
export { BlockGrouper, DEFAULT_GROUPING_OPTIONS } from './core/block-grouper.js';
export { OutlineClassifier, DEFAULT_CLASSIFIER_OPTIONS } from './core/outline/classifier.js';
export { KMeansLevelAssigner, QuantileLevelAssigner } from './core/outline/level-assigner.js';
export type { LevelAssigner, ClusterAssignment, HeadingFeatures } from './core/outline/types.js';
export { UnPDFWrapper } from './core/unpdf-wrapper.js';
export { PDFJSWordExtractor } from './core/pdfjs-word-extractor.js';
export { ConsoleReporter, silentReporter, type Reporter, type ReportLevel } from './utils/reporter.js';
export { BatchProcessor, DEFAULT_BATCH_OPTIONS, TimeoutError, type BatchResult } from './batch/batch-processor.js';

export default PDFOutline;
