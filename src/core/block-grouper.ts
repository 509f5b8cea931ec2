import type { BoundingBox, WordFragment } from '../types/pdf.js';
import type { TextBlock } from '../types/outline.js';
import type { GroupingOptions } from '../types/config.js';
import { silentReporter, type Reporter } from '../utils/reporter.js';

export const DEFAULT_GROUPING_OPTIONS: GroupingOptions = {
  lineTolerance: 2,
  blockGapFactor: 1.6,
  fontSizeTolerance: 1
};

type TextLine = WordFragment[];

const isUsableWord = (w: WordFragment): boolean =>
  typeof w.text === 'string' &&
  w.text.trim().length > 0 &&
  Number.isFinite(w.x0) &&
  Number.isFinite(w.x1) &&
  Number.isFinite(w.top) &&
  Number.isFinite(w.bottom) &&
  Number.isFinite(w.fontSize) &&
  w.fontSize > 0;

const byX = (a: WordFragment, b: WordFragment): number => a.x0 - b.x0;

// Ties go to the even neighbour, so 10.125 becomes 10.12
const roundHalfEven = (x: number): number => {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff !== 0.5) return diff < 0.5 ? floor : floor + 1;
  return floor % 2 === 0 ? floor : floor + 1;
};

const round2 = (v: number): number => roundHalfEven(v * 100) / 100;

/**
 * Groups a page's words into lines, then lines into blocks that share a font
 * and sit close together vertically.
 */
export class BlockGrouper {
  private options: GroupingOptions;
  private reporter: Reporter;

  constructor(options: Partial<GroupingOptions> = {}, reporter: Reporter = silentReporter) {
    this.options = { ...DEFAULT_GROUPING_OPTIONS, ...options };
    this.reporter = reporter;
  }

  group(words: readonly WordFragment[], pageNumber: number): TextBlock[] {
    const usable = words.filter(isUsableWord);
    if (usable.length < words.length) {
      this.reporter.recordEvent(
        'debug',
        `Page ${pageNumber}: dropped ${words.length - usable.length} malformed word fragment(s)`
      );
    }
    if (usable.length === 0) return [];

    const lines = this.assembleLines(usable);
    return this.assembleBlocks(lines).map((blockLines) => this.toTextBlock(blockLines, pageNumber));
  }

  private assembleLines(words: WordFragment[]): TextLine[] {
    const sorted = [...words].sort((a, b) => a.top - b.top || a.x0 - b.x0);
    const lines: TextLine[] = [];
    let current: TextLine = [];

    for (const word of sorted) {
      const anchor = current[0];
      if (anchor && Math.abs(word.top - anchor.top) < this.options.lineTolerance) {
        current.push(word);
        continue;
      }
      if (current.length > 0) lines.push(current.sort(byX));
      current = [word];
    }
    if (current.length > 0) lines.push(current.sort(byX));

    return lines;
  }

  private assembleBlocks(lines: TextLine[]): TextLine[][] {
    const blocks: TextLine[][] = [];
    let current: TextLine[] = [];

    for (const line of lines) {
      const prev = current[current.length - 1];
      if (prev && !this.startsNewBlock(prev[0], line[0])) {
        current.push(line);
        continue;
      }
      if (current.length > 0) blocks.push(current);
      current = [line];
    }
    // Trailing block
    if (current.length > 0) blocks.push(current);

    return blocks;
  }

  private startsNewBlock(prev: WordFragment | undefined, next: WordFragment | undefined): boolean {
    if (!prev || !next) return true;
    const verticalGap = next.top - prev.top;
    if (verticalGap > prev.fontSize * this.options.blockGapFactor) return true;
    if (next.fontName !== prev.fontName) return true;
    return Math.abs(next.fontSize - prev.fontSize) >= this.options.fontSizeTolerance;
  }

  private toTextBlock(lines: TextLine[], pageNumber: number): TextBlock {
    const words = lines.flat();
    const first = words[0];
    return {
      text: lines.map((line) => line.map((w) => w.text).join(' ')).join(' '),
      bbox: unifyBBox(words),
      fontName: first?.fontName ?? '',
      fontSize: round2(first?.fontSize ?? 0),
      pageNumber
    };
  }
}

export const unifyBBox = (boxes: readonly BoundingBox[]): BoundingBox => {
  if (boxes.length === 0) return { x0: 0, top: 0, x1: 0, bottom: 0 };
  return {
    x0: Math.min(...boxes.map((b) => b.x0)),
    top: Math.min(...boxes.map((b) => b.top)),
    x1: Math.max(...boxes.map((b) => b.x1)),
    bottom: Math.max(...boxes.map((b) => b.bottom))
  };
};
