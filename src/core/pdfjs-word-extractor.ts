import type { WordFragment } from '../types/pdf.js';
import { describeError, silentReporter, type Reporter } from '../utils/reporter.js';

export type PDFJSPage = {
  getTextContent: () => Promise<PDFJSTextContent>;
  getViewport: (options: { scale: number }) => { width: number; height: number };
  getOperatorList?: () => Promise<unknown>;
  commonObjs?: { get: (name: string) => unknown };
};

type PDFJSTextContent = {
  items: unknown[];
};

type PDFJSTextItem = {
  str: string;
  transform: number[];
  fontName?: string;
  width?: number;
  height?: number;
};

// Marked-content entries carry no `str`
const isTextItem = (item: unknown): item is PDFJSTextItem => {
  if (typeof item !== 'object' || item === null) return false;
  if (!('str' in item) || typeof item.str !== 'string') return false;
  return 'transform' in item && Array.isArray(item.transform);
};

const readFontName = (font: unknown): string | null => {
  if (typeof font !== 'object' || font === null || !('name' in font)) return null;
  return typeof font.name === 'string' && font.name.length > 0 ? font.name : null;
};

export class PDFJSWordExtractor {
  private reporter: Reporter;

  constructor(reporter: Reporter = silentReporter) {
    this.reporter = reporter;
  }

  async extractWords(page: PDFJSPage, pageNumber: number): Promise<WordFragment[]> {
    const words: WordFragment[] = [];

    try {
      const { height: pageHeight } = page.getViewport({ scale: 1.0 });
      // Font objects land in commonObjs only once the operator list is loaded
      if (page.getOperatorList) await page.getOperatorList();
      const textContent = await page.getTextContent();

      const fontNames = new Map<string, string>();
      for (const item of textContent.items) {
        if (!isTextItem(item)) continue;
        const fontName = this.resolveFontName(page, item.fontName, fontNames);
        words.push(...this.splitItem(item, fontName, pageHeight, pageNumber));
      }
    } catch (error) {
      this.reporter.recordEvent('warn', `Failed to extract words from page ${pageNumber}: ${describeError(error)}`);
      return [];
    }

    return words;
  }

  private resolveFontName(page: PDFJSPage, fontId: string | undefined, cache: Map<string, string>): string {
    if (!fontId) return '';
    const cached = cache.get(fontId);
    if (cached !== undefined) return cached;

    let resolved = fontId;
    if (page.commonObjs) {
      try {
        resolved = readFontName(page.commonObjs.get(fontId)) ?? fontId;
      } catch (error) {
        // commonObjs.get throws for fonts that were never resolved
        this.reporter.recordEvent('debug', `Font ${fontId} unresolved: ${describeError(error)}`);
      }
    }
    cache.set(fontId, resolved);
    return resolved;
  }

  private splitItem(item: PDFJSTextItem, fontName: string, pageHeight: number, pageNumber: number): WordFragment[] {
    if (item.str.trim().length === 0) return [];

    // PDF.js text matrix: [a, b, c, d, e, f]; e/f are the baseline origin in PDF space
    const [, , c = 0, d = 1, e = 0, f = 0] = item.transform;
    const itemHeight = typeof item.height === 'number' && item.height > 0 ? item.height : 0;
    const fontSize = Math.hypot(c, d) || itemHeight || 12;
    const boxHeight = itemHeight || fontSize;

    const width = typeof item.width === 'number' && item.width > 0 ? item.width : item.str.length * fontSize * 0.6;
    const charWidth = width / Math.max(1, item.str.length);

    // Flip to a top-left origin
    const bottom = pageHeight - f;
    const top = bottom - boxHeight;

    const words: WordFragment[] = [];
    const pattern = /\S+/g;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(item.str)) !== null) {
      const x0 = e + match.index * charWidth;
      words.push({
        text: match[0],
        x0,
        top,
        x1: x0 + match[0].length * charWidth,
        bottom,
        fontName,
        fontSize,
        pageNumber
      });
    }
    return words;
  }
}
