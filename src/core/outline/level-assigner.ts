import type { ClusterAssignment, LevelAssigner } from './types.js';

const distinctSorted = (values: readonly number[]): number[] =>
  [...new Set(values)].sort((a, b) => a - b);

const mean = (arr: number[]): number => (arr.length > 0 ? arr.reduce((a, b) => a + b, 0) / arr.length : 0);

const nearestCenter = (value: number, centers: number[]): number => {
  let bestIdx = 0;
  let bestDist = Number.POSITIVE_INFINITY;
  for (let i = 0; i < centers.length; i++) {
    const c = centers[i];
    if (c === undefined) continue;
    const d = Math.abs(value - c);
    // strict: ties stay with the lower index
    if (d < bestDist) {
      bestDist = d;
      bestIdx = i;
    }
  }
  return bestIdx;
};

const clampK = (sizes: readonly number[], k: number): number =>
  Math.max(1, Math.min(Math.floor(k), distinctSorted(sizes).length));

/**
 * One-dimensional Lloyd's k-means. Centers are seeded from evenly spaced
 * distinct sizes, so the result depends on the input alone.
 */
export class KMeansLevelAssigner implements LevelAssigner {
  private maxIterations: number;

  constructor(maxIterations: number = 100) {
    this.maxIterations = maxIterations;
  }

  assign(sizes: readonly number[], k: number): ClusterAssignment {
    if (sizes.length === 0) return { labels: [], centers: [] };
    const clusters = clampK(sizes, k);
    let centers = this.seed(distinctSorted(sizes), clusters);
    let labels = sizes.map((s) => nearestCenter(s, centers));

    for (let iter = 0; iter < this.maxIterations; iter++) {
      const next = centers.map((prev, idx) => {
        const members = sizes.filter((_, i) => labels[i] === idx);
        return members.length > 0 ? mean(members) : prev;
      });
      const nextLabels = sizes.map((s) => nearestCenter(s, next));
      const converged = nextLabels.every((l, i) => l === labels[i]) && next.every((c, i) => c === centers[i]);
      centers = next;
      labels = nextLabels;
      if (converged) break;
    }

    return { labels, centers };
  }

  private seed(distinct: number[], k: number): number[] {
    if (k === 1) return [mean(distinct)];
    const seeds: number[] = [];
    for (let i = 0; i < k; i++) {
      const idx = Math.round((i * (distinct.length - 1)) / (k - 1));
      seeds.push(distinct[idx] ?? 0);
    }
    return seeds;
  }
}

/**
 * Splits the sorted distinct sizes into k contiguous bins of near-equal count.
 */
export class QuantileLevelAssigner implements LevelAssigner {
  assign(sizes: readonly number[], k: number): ClusterAssignment {
    if (sizes.length === 0) return { labels: [], centers: [] };
    const distinct = distinctSorted(sizes);
    const clusters = clampK(sizes, k);

    const binOf = new Map<number, number>();
    const bins: number[][] = Array.from({ length: clusters }, () => []);
    distinct.forEach((size, i) => {
      const bin = Math.min(clusters - 1, Math.floor((i * clusters) / distinct.length));
      binOf.set(size, bin);
      bins[bin]?.push(size);
    });

    return {
      labels: sizes.map((s) => binOf.get(s) ?? 0),
      centers: bins.map(mean)
    };
  }
}
