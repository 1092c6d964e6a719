'use strict';

import type { Finding, FindingCategory, Severity } from '../types';

const LABEL_PREFIXES: Record<FindingCategory, string | null> = {
  language: 'lang:',
  size: 'size:',
  security: 'security:',
  priority: 'priority:',
  classification: '',
  ownership: null,
};

/** Pure mapping from a finding's category and value to its label. Ownership never becomes a label. */
export function deriveLabel(category: FindingCategory, value: string): string | null {
  const prefix = LABEL_PREFIXES[category];
  if (prefix === null) {
    return null;
  }

  return `${prefix}${value}`;
}

export function createFinding({
  category,
  severity,
  value,
  file = null,
  evidence = null,
}: {
  category: FindingCategory;
  severity: Severity;
  value: string;
  file?: string | null;
  evidence?: string | null;
}): Finding {
  return {
    category,
    severity,
    value,
    label: deriveLabel(category, value),
    file,
    evidence,
  };
}

export function findingKey(finding: Finding): string {
  return [finding.category, finding.value, finding.file ?? ''].join('|');
}

export function compareFindings(a: Finding, b: Finding): number {
  const keyA = findingKey(a);
  const keyB = findingKey(b);
  if (keyA < keyB) {
    return -1;
  }

  return keyA > keyB ? 1 : 0;
}
