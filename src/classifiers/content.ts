'use strict';

import { normalizePath } from '../core/utils';
import type { ContentRule } from '../taxonomy';
import type { Finding } from '../types';
import { createFinding } from './finding';
import type { Classifier, PullRequestInput } from './registry';

export function matchesContentRule(path: string, rule: ContentRule): boolean {
  const normalized = normalizePath(path).toLowerCase();
  return (
    rule.extensions.some((extension) => normalized.endsWith(extension)) ||
    rule.fragments.some((fragment) => normalized.includes(fragment))
  );
}

export const contentClassifier: Classifier<PullRequestInput> = {
  id: 'content',
  classify({ files }, { taxonomy }): Finding[] {
    const findings: Finding[] = [];

    for (const rule of taxonomy.content) {
      const match = files.find((file) => matchesContentRule(file.path, rule));
      if (match) {
        findings.push(
          createFinding({ category: 'classification', severity: 'info', value: rule.label, evidence: match.path }),
        );
      }
    }

    return findings;
  },
};
