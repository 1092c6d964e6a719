'use strict';

import type { Finding } from '../types';
import { createFinding } from './finding';
import type { Classifier, IssueInput } from './registry';

/** First keyword, in list order, that occurs anywhere in the text (case-insensitive). */
export function findKeyword(text: string, keywords: readonly string[]): string | null {
  const haystack = text.toLowerCase();
  return keywords.find((keyword) => haystack.includes(keyword)) ?? null;
}

function issueText({ title, body }: IssueInput): string {
  return `${title}\n${body}`;
}

export const keywordTriageClassifier: Classifier<IssueInput> = {
  id: 'keyword-triage',
  classify(input, { taxonomy }): Finding[] {
    const text = issueText(input);

    for (const category of taxonomy.triage) {
      const keyword = findKeyword(text, category.keywords);
      if (keyword) {
        return [
          createFinding({ category: 'classification', severity: 'info', value: category.label, evidence: keyword }),
        ];
      }
    }

    return [];
  },
};

// Default priority is implicit: no finding, no label.
export const priorityClassifier: Classifier<IssueInput> = {
  id: 'priority',
  classify(input, { taxonomy }): Finding[] {
    const keyword = findKeyword(issueText(input), taxonomy.priority.keywords);
    if (!keyword) {
      return [];
    }

    return [
      createFinding({ category: 'priority', severity: 'critical', value: taxonomy.priority.label, evidence: keyword }),
    ];
  },
};
