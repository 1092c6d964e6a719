'use strict';

import type { Taxonomy } from '../taxonomy';
import type { ChangedFile, Finding } from '../types';
import { contentClassifier } from './content';
import { compareFindings, findingKey } from './finding';
import { languageClassifier } from './language';
import type { OwnershipRule } from './ownership';
import { ownershipClassifier } from './ownership';
import { securityClassifier } from './security';
import { sizeClassifier } from './size';
import { keywordTriageClassifier, priorityClassifier } from './triage';

export type ClassifierId =
  | 'language'
  | 'content'
  | 'size'
  | 'security'
  | 'ownership'
  | 'keyword-triage'
  | 'priority';

export interface PullRequestInput {
  readonly files: readonly ChangedFile[];
}

export interface IssueInput {
  readonly title: string;
  readonly body: string;
}

/** Fixed tables shared by every classifier run. */
export interface ClassifierContext {
  readonly taxonomy: Taxonomy;
  readonly sizeThresholds: readonly number[];
  readonly ownershipRules: readonly OwnershipRule[];
}

/**
 * A stateless analyzer. Classifiers never see each other's output; the
 * registry merges their findings as a set.
 */
export interface Classifier<TInput> {
  readonly id: ClassifierId;
  readonly classify: (input: TInput, context: ClassifierContext) => readonly Finding[];
}

export type OnClassifierError = (classifierId: ClassifierId, error: unknown) => void;

export interface ClassifierExecutionResult {
  /** De-duplicated and sorted; independent of classifier order. */
  readonly findings: readonly Finding[];
  readonly failedClassifiers: readonly ClassifierId[];
}

export const PULL_REQUEST_CLASSIFIERS: readonly Classifier<PullRequestInput>[] = [
  languageClassifier,
  contentClassifier,
  sizeClassifier,
  securityClassifier,
  ownershipClassifier,
];

export const ISSUE_CLASSIFIERS: readonly Classifier<IssueInput>[] = [keywordTriageClassifier, priorityClassifier];

/**
 * Runs classifiers with per-classifier failure isolation. A throwing
 * classifier contributes no findings and is reported in `failedClassifiers`.
 */
export function executeClassifiers<TInput>({
  classifiers,
  input,
  context,
  onClassifierError,
}: {
  classifiers: readonly Classifier<TInput>[];
  input: TInput;
  context: ClassifierContext;
  onClassifierError?: OnClassifierError;
}): ClassifierExecutionResult {
  const merged = new Map<string, Finding>();
  const failedClassifiers: ClassifierId[] = [];

  for (const classifier of classifiers) {
    let findings: readonly Finding[];
    try {
      findings = classifier.classify(input, context);
    } catch (error) {
      failedClassifiers.push(classifier.id);
      onClassifierError?.(classifier.id, error);
      continue;
    }

    for (const finding of findings) {
      const key = findingKey(finding);
      if (!merged.has(key)) {
        merged.set(key, finding);
      }
    }
  }

  return {
    findings: [...merged.values()].sort(compareFindings),
    failedClassifiers: [...failedClassifiers].sort(),
  };
}
