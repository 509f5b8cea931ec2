import type { BoundingBox } from './pdf.js';

export interface TextBlock {
  text: string;
  bbox: BoundingBox;
  fontName: string;
  fontSize: number;
  pageNumber: number;
}

export interface PageBlocks {
  pageNumber: number;
  width?: number;
  height?: number;
  blocks: TextBlock[];
}

export type HeadingLevel = 'H1' | 'H2' | 'H3';

export const HEADING_LEVELS: readonly HeadingLevel[] = ['H1', 'H2', 'H3'];

export interface OutlineEntry {
  level: HeadingLevel;
  text: string;
  page: number;
}

export interface OutlineResult {
  title: string;
  outline: OutlineEntry[];
}

export const NO_CONTENT_TITLE = 'No Content Found';
export const UNTITLED_TITLE = 'Untitled Document';
