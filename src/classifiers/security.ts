'use strict';

import { truncate } from '../core/utils';
import type { ChangedFile, Finding, Severity } from '../types';
import { createFinding } from './finding';
import type { Classifier, PullRequestInput } from './registry';

/*
 * Fixed-pattern scan over added lines. No grammar is parsed, so the scanner
 * both over- and under-reports; findings are prompts for a human, not
 * verdicts.
 */

export type SecurityCategory = 'hardcoded-credential' | 'dangerous-call' | 'sql-injection-risk';

export interface SecurityRule {
  readonly category: SecurityCategory;
  readonly severity: Severity;
  readonly patterns: readonly RegExp[];
}

const QUOTED_LITERAL = String.raw`["'][^"']+["']`;
const SQL_CALL = String.raw`\b(?:execute|query)\s*\(\s*`;
const SQL_STRING = String.raw`(?:"[^"]*"|'[^']*')`;

// Order matters only for the report; each category is matched independently.
export const SECURITY_RULES: readonly SecurityRule[] = [
  {
    category: 'hardcoded-credential',
    severity: 'critical',
    patterns: [
      new RegExp(String.raw`(?:password|passwd|pwd)["']?\s*[:=]\s*${QUOTED_LITERAL}`, 'i'),
      new RegExp(String.raw`api[_-]?key["']?\s*[:=]\s*${QUOTED_LITERAL}`, 'i'),
      new RegExp(String.raw`secret["']?\s*[:=]\s*${QUOTED_LITERAL}`, 'i'),
      new RegExp(String.raw`token["']?\s*[:=]\s*${QUOTED_LITERAL}`, 'i'),
      /-----BEGIN (?:RSA |EC |DSA |OPENSSH )?PRIVATE KEY-----/,
      /\bAKIA[0-9A-Z]{16}\b/,
    ],
  },
  {
    category: 'dangerous-call',
    severity: 'critical',
    patterns: [
      /\beval\s*\(/i,
      /\bexec\s*\(/i,
      /\bsystem\s*\(/i,
      /\bshell_exec\s*\(/i,
      /\bnew\s+Function\s*\(/,
    ],
  },
  {
    category: 'sql-injection-risk',
    severity: 'warn',
    patterns: [
      new RegExp(String.raw`${SQL_CALL}${SQL_STRING}\s*\+`, 'i'),
      new RegExp(String.raw`${SQL_CALL}${SQL_STRING}\s*%`, 'i'),
      new RegExp(String.raw`${SQL_CALL}${SQL_STRING}\.format\(`, 'i'),
      new RegExp(String.raw`${SQL_CALL}` + '`[^`]*\\$\\{', 'i'),
      new RegExp(String.raw`${SQL_CALL}f["']`, 'i'),
    ],
  },
];

const MAX_EVIDENCE_LENGTH = 120;

/** Quoted literals and AWS key ids are masked so the report never repeats a secret. */
export function redactSecrets(line: string): string {
  return line
    .replace(/(["'`])(?:(?!\1).)*\1/g, '$1***$1')
    .replace(/\bAKIA[0-9A-Z]{16}\b/g, 'AKIA***');
}

function buildEvidence(rule: SecurityRule, line: string): string {
  const trimmed = line.trim();
  const visible = rule.category === 'hardcoded-credential' ? redactSecrets(trimmed) : trimmed;
  return truncate(visible, MAX_EVIDENCE_LENGTH);
}

function findMatchingLine(rule: SecurityRule, lines: readonly string[]): string | null {
  for (const line of lines) {
    if (rule.patterns.some((pattern) => pattern.test(line))) {
      return line;
    }
  }

  return null;
}

/** At most one finding per (category, file), carrying the first matching line. */
export function scanFiles(files: readonly ChangedFile[]): Finding[] {
  const findings: Finding[] = [];

  for (const file of files) {
    for (const rule of SECURITY_RULES) {
      const line = findMatchingLine(rule, file.addedLines);
      if (line === null) {
        continue;
      }

      findings.push(
        createFinding({
          category: 'security',
          severity: rule.severity,
          value: rule.category,
          file: file.path,
          evidence: buildEvidence(rule, line),
        }),
      );
    }
  }

  return findings;
}

export const securityClassifier: Classifier<PullRequestInput> = {
  id: 'security',
  classify({ files }): Finding[] {
    return scanFiles(files);
  },
};
