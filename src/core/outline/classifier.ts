import type { TextBlock, PageBlocks, OutlineEntry, OutlineResult, HeadingLevel } from '../../types/outline.js';
import { HEADING_LEVELS, NO_CONTENT_TITLE, UNTITLED_TITLE } from '../../types/outline.js';
import type { ClassifierOptions } from '../../types/config.js';
import { describeError, silentReporter, type Reporter } from '../../utils/reporter.js';
import { extractFeatures, isPotentialHeading } from './features.js';
import { KMeansLevelAssigner } from './level-assigner.js';
import type { HeadingFeatures, LevelAssigner, LeveledEntry } from './types.js';

export const DEFAULT_CLASSIFIER_OPTIONS: ClassifierOptions = {
  headerZoneRatio: 0.08,
  footerZoneRatio: 0.08,
  centerToleranceRatio: 0.15,
  titleMaxTop: 400,
  titleMaxWords: 25,
  titleCenterBoost: 1.5,
  titleBoldBoost: 1.2,
  maxHeadingWords: 20,
  headingWordLimit: 15,
  largeFontSize: 14,
  allCapsMinFontSize: 11,
  maxLevels: 3,
  defaultPageWidth: 595,
  defaultPageHeight: 842
};

const emptyResult = (): OutlineResult => ({ title: NO_CONTENT_TITLE, outline: [] });

const positiveOr = (value: number | undefined, fallback: number): number =>
  typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;

/**
 * Turns grouped text blocks into a title and a leveled heading outline.
 *
 * Header and footer bands are measured against the first page; pages are
 * assumed to share its size.
 */
export class OutlineClassifier {
  private options: ClassifierOptions;
  private levelAssigner: LevelAssigner;
  private reporter: Reporter;

  constructor(
    options: Partial<ClassifierOptions> = {},
    levelAssigner: LevelAssigner = new KMeansLevelAssigner(),
    reporter: Reporter = silentReporter
  ) {
    this.options = { ...DEFAULT_CLASSIFIER_OPTIONS, ...options };
    this.levelAssigner = levelAssigner;
    this.reporter = reporter;
  }

  build(pages: readonly PageBlocks[]): OutlineResult {
    const first = pages[0];
    if (!first) return emptyResult();

    try {
      return this.buildOutline(pages, first);
    } catch (error) {
      this.reporter.recordEvent('error', `Outline construction failed: ${describeError(error)}`);
      return emptyResult();
    }
  }

  private buildOutline(pages: readonly PageBlocks[], first: PageBlocks): OutlineResult {
    const pageWidth = positiveOr(first.width, this.options.defaultPageWidth);
    const pageHeight = positiveOr(first.height, this.options.defaultPageHeight);

    const allBlocks = pages.flatMap((p) => p.blocks);
    const coreBlocks = allBlocks.filter((b) => !this.isHeaderOrFooter(b, pageHeight));
    this.reporter.recordEvent(
      'debug',
      `${coreBlocks.length} of ${allBlocks.length} block(s) outside header/footer zones`
    );

    const title = this.extractTitle(coreBlocks, pageWidth);

    const candidates = coreBlocks
      .map((b) => extractFeatures(b, pageWidth, this.options))
      .filter((f) => isPotentialHeading(f, this.options))
      .filter((f) => f.text !== title);
    this.reporter.recordEvent('debug', `Found ${candidates.length} heading candidate(s)`);

    const outline = this.assignLevels(candidates)
      .sort((a, b) => a.page - b.page || a.top - b.top)
      .map(toOutlineEntry);

    return { title: title.replace(/\n/g, ' ').trim(), outline };
  }

  private isHeaderOrFooter(block: TextBlock, pageHeight: number): boolean {
    const y = block.bbox.top;
    return y < pageHeight * this.options.headerZoneRatio || y > pageHeight * (1 - this.options.footerZoneRatio);
  }

  private extractTitle(blocks: TextBlock[], pageWidth: number): string {
    const firstPage = blocks.filter((b) => b.pageNumber === 1 && b.text.trim().length > 0);

    let best: { score: number; text: string } | null = null;
    for (const block of firstPage) {
      if (block.bbox.top > this.options.titleMaxTop) continue;

      const f = extractFeatures(block, pageWidth, this.options);
      if (!f.text || f.wordCount > this.options.titleMaxWords) continue;

      let score = f.fontSize;
      if (f.isCentered) score *= this.options.titleCenterBoost;
      if (f.isBold) score *= this.options.titleBoldBoost;

      // strict comparison keeps the first block on ties
      if (!best || score > best.score) best = { score, text: f.text };
    }

    if (!best) {
      this.reporter.recordEvent('info', 'No title candidate on page 1');
      return UNTITLED_TITLE;
    }
    return best.text;
  }

  private assignLevels(candidates: HeadingFeatures[]): LeveledEntry[] {
    const only = candidates.length === 1 ? candidates[0] : undefined;
    if (only) return [toLeveledEntry(only, 'H1')];
    if (candidates.length === 0) {
      this.reporter.recordEvent('info', 'No heading candidates; outline is empty');
      return [];
    }

    const sizes = candidates.map((c) => c.fontSize);
    const k = Math.min(new Set(sizes).size, this.options.maxLevels, HEADING_LEVELS.length);
    const { labels, centers } = this.levelAssigner.assign(sizes, k);

    // Rank cluster indices by center, largest first
    const ranked = centers
      .map((center, idx) => ({ center, idx }))
      .sort((a, b) => b.center - a.center || a.idx - b.idx);
    const levelOf = new Map<number, HeadingLevel>();
    ranked.forEach(({ idx }, rank) => {
      levelOf.set(idx, HEADING_LEVELS[Math.min(rank, HEADING_LEVELS.length - 1)] ?? 'H3');
    });
    const lowest = HEADING_LEVELS[Math.max(0, Math.min(k, HEADING_LEVELS.length) - 1)] ?? 'H3';

    return candidates.map((c, i) => {
      const label = labels[i];
      const level = label === undefined ? lowest : levelOf.get(label) ?? lowest;
      return toLeveledEntry(c, level);
    });
  }
}

const toLeveledEntry = (f: HeadingFeatures, level: HeadingLevel): LeveledEntry => ({
  level,
  text: f.text,
  page: f.block.pageNumber,
  top: f.block.bbox.top
});

const toOutlineEntry = ({ level, text, page }: LeveledEntry): OutlineEntry => ({ level, text, page });
