export interface BoundingBox {
  x0: number;
  top: number;
  x1: number;
  bottom: number;
}

/**
 * A single word as produced by the extraction layer.
 * Coordinates use a top-left origin with y growing downward.
 */
export interface WordFragment {
  readonly text: string;
  readonly x0: number;
  readonly top: number;
  readonly x1: number;
  readonly bottom: number;
  readonly fontName: string;
  readonly fontSize: number;
  readonly pageNumber: number;
}

export interface PageWords {
  pageNumber: number;
  width?: number;
  height?: number;
  words: WordFragment[];
}

export interface PDFParserOptions {
  /** Page indices (0-based) to extract. All pages when omitted. */
  pages?: number[];
}
