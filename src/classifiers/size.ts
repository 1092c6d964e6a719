'use strict';

import type { ChangedFile, Finding } from '../types';
import { createFinding } from './finding';
import type { Classifier, PullRequestInput } from './registry';

export const SIZE_BUCKETS = ['small', 'medium', 'large', 'xlarge'] as const;

export type SizeBucket = (typeof SIZE_BUCKETS)[number];

export const DEFAULT_SIZE_THRESHOLDS: readonly number[] = [50, 300, 1000];

export const SIZE_LABELS: readonly string[] = SIZE_BUCKETS.map((bucket) => `size:${bucket}`);

export function countChangedLines(files: readonly ChangedFile[]): number {
  return files.reduce((total, file) => total + file.additions + file.deletions, 0);
}

/** Lower bounds are inclusive: with the default thresholds 50 is medium and 1000 is xlarge. */
export function determineSizeBucket(
  totalLinesChanged: number,
  thresholds: readonly number[] = DEFAULT_SIZE_THRESHOLDS,
): SizeBucket {
  for (let i = 0; i < thresholds.length && i < SIZE_BUCKETS.length - 1; i++) {
    if (totalLinesChanged < thresholds[i]) {
      return SIZE_BUCKETS[i];
    }
  }

  return SIZE_BUCKETS[SIZE_BUCKETS.length - 1];
}

export const sizeClassifier: Classifier<PullRequestInput> = {
  id: 'size',
  classify({ files }, { sizeThresholds }): Finding[] {
    const total = countChangedLines(files);
    return [
      createFinding({
        category: 'size',
        severity: 'info',
        value: determineSizeBucket(total, sizeThresholds),
        evidence: `${total} lines changed`,
      }),
    ];
  },
};
