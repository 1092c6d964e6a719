'use strict';

import { normalizePath } from '../core/utils';
import type { Finding } from '../types';
import { createFinding } from './finding';
import type { Classifier, PullRequestInput } from './registry';

export interface OwnershipRule {
  /** Path prefix such as `src/api/`; `*` matches every path. */
  readonly prefix: string;
  readonly owners: readonly string[];
}

export const CATCH_ALL_PREFIX = '*';

/** The longest matching prefix wins; the catch-all only applies when nothing else does. */
export function findOwnershipRule(path: string, rules: readonly OwnershipRule[]): OwnershipRule | null {
  const normalized = normalizePath(path);
  let best: OwnershipRule | null = null;
  let fallback: OwnershipRule | null = null;

  for (const rule of rules) {
    if (rule.prefix === CATCH_ALL_PREFIX) {
      fallback = fallback ?? rule;
      continue;
    }

    if (normalized.startsWith(rule.prefix) && (!best || rule.prefix.length > best.prefix.length)) {
      best = rule;
    }
  }

  return best ?? fallback;
}

export const ownershipClassifier: Classifier<PullRequestInput> = {
  id: 'ownership',
  classify({ files }, { ownershipRules }): Finding[] {
    if (ownershipRules.length === 0) {
      return [];
    }

    const prefixByOwner = new Map<string, string>();
    for (const file of files) {
      const rule = findOwnershipRule(file.path, ownershipRules);
      if (!rule) {
        continue;
      }

      for (const owner of rule.owners) {
        if (!prefixByOwner.has(owner)) {
          prefixByOwner.set(owner, rule.prefix);
        }
      }
    }

    return [...prefixByOwner.entries()].map(([owner, prefix]) =>
      createFinding({ category: 'ownership', severity: 'info', value: owner, evidence: prefix }),
    );
  },
};
