import type { TextBlock } from '../../types/outline.js';
import type { ClassifierOptions } from '../../types/config.js';
import { isBoldFontName } from '../../fonts/font-style.js';
import type { HeadingFeatures } from './types.js';

const TOC_ENTRY = /\.{4,}\s*\d+\s*$/;
const NUMBERED_PREFIX = /^\d+(\.\d+)*\.?\s+/;
const PURELY_NUMERIC = /^\d+$/;

export const countWords = (text: string): number => text.split(/\s+/).filter((w) => w.length > 0).length;

export const isTocEntry = (text: string): boolean => TOC_ENTRY.test(text);

/** True when the text has cased letters and none of them are lowercase. */
export const isUpperCase = (text: string): boolean =>
  text === text.toUpperCase() && text !== text.toLowerCase();

export const isPurelyNumeric = (text: string): boolean => PURELY_NUMERIC.test(text);

export const extractFeatures = (
  block: TextBlock,
  pageWidth: number,
  options: Pick<ClassifierOptions, 'centerToleranceRatio'>
): HeadingFeatures => {
  const text = block.text.trim();
  const wordCount = countWords(text);
  const center = (block.bbox.x0 + block.bbox.x1) / 2;

  return {
    text,
    fontSize: block.fontSize,
    isBold: isBoldFontName(block.fontName),
    isAllCaps: wordCount > 0 && isUpperCase(text),
    startsWithNumber: NUMBERED_PREFIX.test(text),
    isCentered: Math.abs(center - pageWidth / 2) < pageWidth * options.centerToleranceRatio,
    wordCount,
    isTocEntry: isTocEntry(text),
    block
  };
};

export const isPotentialHeading = (
  f: HeadingFeatures,
  options: Pick<ClassifierOptions, 'maxHeadingWords' | 'headingWordLimit' | 'largeFontSize' | 'allCapsMinFontSize'>
): boolean => {
  if (!f.text || f.wordCount > options.maxHeadingWords || f.isTocEntry || isPurelyNumeric(f.text)) {
    return false;
  }
  if (f.wordCount >= options.headingWordLimit) return false;

  return (
    f.fontSize > options.largeFontSize ||
    f.startsWithNumber ||
    f.isBold ||
    (f.isAllCaps && f.fontSize > options.allCapsMinFontSize)
  );
};
