import type { HeadingLevel, TextBlock } from '../../types/outline.js';

export type HeadingFeatures = {
  text: string;
  fontSize: number;
  isBold: boolean;
  isAllCaps: boolean;
  startsWithNumber: boolean;
  isCentered: boolean;
  wordCount: number;
  isTocEntry: boolean;
  block: TextBlock;
};

export type ClusterAssignment = {
  // labels[i] is the cluster index of sizes[i]
  labels: number[];
  centers: number[];
};

/**
 * Partitions heading font sizes into at most `k` clusters. Implementations
 * must be deterministic: identical input yields identical output.
 */
export interface LevelAssigner {
  assign(sizes: readonly number[], k: number): ClusterAssignment;
}

// Carries the sort key until final assembly
export type LeveledEntry = {
  level: HeadingLevel;
  text: string;
  page: number;
  top: number;
};
