import type { PageWords, PDFParserOptions } from '../types/pdf.js';
import { describeError, silentReporter, type Reporter } from '../utils/reporter.js';
import { PDFJSWordExtractor, type PDFJSPage } from './pdfjs-word-extractor.js';

type PDFJSDocument = {
  numPages: number;
  getPage: (pageNumber: number) => Promise<PDFJSPage>;
  destroy?: () => Promise<void>;
};

type UnpdfModule = {
  getDocumentProxy: (bytes: Uint8Array) => Promise<PDFJSDocument>;
};

let cachedUnpdf: Promise<UnpdfModule> | null = null;

const loadUnpdf = (): Promise<UnpdfModule> => {
  if (!cachedUnpdf) {
    cachedUnpdf = import('unpdf').then((mod) => ({ getDocumentProxy: mod.getDocumentProxy }));
  }
  return cachedUnpdf;
};

/**
 * Loads a PDF through unpdf's bundled pdf.js build and exposes its pages as
 * word fragments.
 */
export class UnPDFWrapper {
  private document: PDFJSDocument | null = null;
  private wordExtractor: PDFJSWordExtractor;
  private reporter: Reporter;

  constructor(reporter: Reporter = silentReporter) {
    this.reporter = reporter;
    this.wordExtractor = new PDFJSWordExtractor(reporter);
  }

  async loadDocument(data: ArrayBuffer | Uint8Array): Promise<void> {
    const unpdf = await loadUnpdf();
    // pdf.js may transfer the buffer to its worker, so hand it a copy
    const bytes = data instanceof Uint8Array ? new Uint8Array(data) : new Uint8Array(data.slice(0));
    this.document = await unpdf.getDocumentProxy(bytes);
  }

  async getPageCount(): Promise<number> {
    if (!this.document) {
      throw new Error('Document not loaded');
    }
    return this.document.numPages;
  }

  async parsePage(pageIndex: number): Promise<PageWords> {
    if (!this.document) {
      throw new Error('Document not loaded');
    }

    const pageNumber = pageIndex + 1;
    const pdfPage = await this.document.getPage(pageNumber);
    const viewport = pdfPage.getViewport({ scale: 1.0 });

    return {
      pageNumber,
      width: viewport.width,
      height: viewport.height,
      words: await this.wordExtractor.extractWords(pdfPage, pageNumber)
    };
  }

  async parseDocument(data: ArrayBuffer | Uint8Array, options: PDFParserOptions = {}): Promise<PageWords[]> {
    await this.loadDocument(data);

    const pageCount = await this.getPageCount();
    const indices = options.pages
      ? options.pages.filter((i) => Number.isInteger(i) && i >= 0 && i < pageCount)
      : Array.from({ length: pageCount }, (_, i) => i);

    const pages: PageWords[] = [];
    for (const i of indices) {
      pages.push(await this.parsePage(i));
    }
    this.reporter.recordEvent('info', `Extracted ${pages.length} of ${pageCount} page(s)`);
    return pages;
  }

  async dispose(): Promise<void> {
    const doc = this.document;
    this.document = null;
    if (!doc?.destroy) return;
    try {
      await doc.destroy();
    } catch (error) {
      this.reporter.recordEvent('warn', `Failed to release PDF document: ${describeError(error)}`);
    }
  }
}
