import type { LevelAssigner } from '../core/outline/types.js';
import type { Reporter, ReportLevel } from '../utils/reporter.js';

export interface GroupingOptions {
  // Max |top| difference for two words to share a line
  lineTolerance: number;
  // A new block starts when the line gap exceeds this multiple of the previous line's font size
  blockGapFactor: number;
  fontSizeTolerance: number;
}

export interface ClassifierOptions {
  headerZoneRatio: number;
  footerZoneRatio: number;
  centerToleranceRatio: number;
  /** Absolute cutoff (page units from the top of page 1) for title candidates. */
  titleMaxTop: number;
  titleMaxWords: number;
  titleCenterBoost: number;
  titleBoldBoost: number;
  maxHeadingWords: number;
  headingWordLimit: number;
  largeFontSize: number;
  allCapsMinFontSize: number;
  maxLevels: number;
  defaultPageWidth: number;
  defaultPageHeight: number;
}

export interface PDFOutlineConfig {
  grouping?: Partial<GroupingOptions>;
  classifier?: Partial<ClassifierOptions>;
  levelAssigner?: LevelAssigner;
  reporter?: Reporter;
}

export interface BatchOptions {
  /**
   * Documents processed at once. A timed-out document frees its slot while its
   * extraction keeps running, so abandoned work is not counted here.
   */
  maxConcurrentDocuments: number;
  /** 0 disables the timeout. */
  documentTimeoutMs: number;
  logLevel: ReportLevel;
}

export interface ConversionProgress {
  stage: 'parsing' | 'grouping' | 'classifying' | 'complete';
  progress: number;
  currentPage?: number;
  totalPages?: number;
  message?: string;
}

export type ProgressCallback = (progress: ConversionProgress) => void;
