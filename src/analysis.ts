'use strict';

import { getLowerExtension } from './core/utils';
import type { ChangedFile } from './types';

export type RiskLevel = 'low' | 'medium' | 'high';

export interface ComplexitySummary {
  readonly score: number;
  readonly totalLines: number;
  readonly fileCount: number;
  readonly riskLevel: RiskLevel;
}

export interface PullRequestAnalysis {
  readonly complexity: ComplexitySummary;
  /** Files whose added lines touch signatures, inheritance, imports or decorators. */
  readonly breakingFiles: readonly string[];
  readonly languages: readonly string[];
}

export type RequirementGap =
  | { readonly kind: 'missing-tests' }
  | { readonly kind: 'large-files'; readonly files: readonly string[] }
  | { readonly kind: 'missing-docs' };

export type IssueSuggestion = 'more-detail' | 'reproduction-steps' | 'use-case';

export const LARGE_FILE_LINES = 300;
export const DOCS_EXPECTED_ABOVE_FILES = 5;
export const MIN_ISSUE_BODY_LENGTH = 50;

const DOC_EXTENSIONS = new Set(['.md', '.rst', '.txt']);
const TESTED_CODE_EXTENSIONS = new Set(['.py', '.js', '.ts', '.java', '.go']);

const BREAKING_CHANGE_PATTERNS: readonly RegExp[] = [
  /\bdef\s+\w+\([^)]*\)\s*->/,
  /\bclass\s+\w+\([^)]*\):/,
  /\bimport\s+\w+/,
  /\bfrom\s+\w+\s+import\b/,
  /^\s*@\w+/,
];

function changedLines(file: ChangedFile): number {
  return file.additions + file.deletions;
}

function isDocumentation(file: ChangedFile): boolean {
  return DOC_EXTENSIONS.has(getLowerExtension(file.path));
}

export function analyzeComplexity(files: readonly ChangedFile[]): ComplexitySummary {
  const totalLines = files.reduce((sum, file) => sum + changedLines(file), 0);
  const fileCount = files.length;

  let score = 0;
  if (totalLines > 500) {
    score += 3;
  } else if (totalLines > 200) {
    score += 2;
  } else if (totalLines > 50) {
    score += 1;
  }

  if (fileCount > 10) {
    score += 2;
  } else if (fileCount > 5) {
    score += 1;
  }

  const riskLevel: RiskLevel = score >= 4 ? 'high' : score >= 2 ? 'medium' : 'low';
  return { score, totalLines, fileCount, riskLevel };
}

export function detectBreakingChanges(files: readonly ChangedFile[]): string[] {
  return files
    .filter((file) => !isDocumentation(file))
    .filter((file) => file.addedLines.some((line) => BREAKING_CHANGE_PATTERNS.some((pattern) => pattern.test(line))))
    .map((file) => file.path);
}

export function analyzePullRequest(files: readonly ChangedFile[], languages: readonly string[]): PullRequestAnalysis {
  return {
    complexity: analyzeComplexity(files),
    breakingFiles: detectBreakingChanges(files),
    languages: [...new Set(languages)].sort(),
  };
}

export function checkPullRequestRequirements(files: readonly ChangedFile[]): RequirementGap[] {
  const gaps: RequirementGap[] = [];

  const hasTests = files.some((file) => file.path.toLowerCase().includes('test'));
  const hasCode = files.some((file) => TESTED_CODE_EXTENSIONS.has(getLowerExtension(file.path)));
  if (hasCode && !hasTests) {
    gaps.push({ kind: 'missing-tests' });
  }

  const largeFiles = files.filter((file) => changedLines(file) > LARGE_FILE_LINES).map((file) => file.path);
  if (largeFiles.length > 0) {
    gaps.push({ kind: 'large-files', files: largeFiles });
  }

  if (files.length > DOCS_EXPECTED_ABOVE_FILES && !files.some(isDocumentation)) {
    gaps.push({ kind: 'missing-docs' });
  }

  return gaps;
}

export function suggestIssueImprovements(title: string, body: string): IssueSuggestion[] {
  const lowerTitle = title.toLowerCase();
  const lowerBody = body.toLowerCase();
  const suggestions: IssueSuggestion[] = [];

  if (body.trim().length < MIN_ISSUE_BODY_LENGTH) {
    suggestions.push('more-detail');
  }
  if (lowerTitle.includes('bug') && !lowerBody.includes('reproduce')) {
    suggestions.push('reproduction-steps');
  }
  if (lowerTitle.includes('feature') && !lowerBody.includes('why')) {
    suggestions.push('use-case');
  }

  return suggestions;
}
