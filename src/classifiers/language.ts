'use strict';

import { getBaseName, getLowerExtension } from '../core/utils';
import type { Taxonomy } from '../taxonomy';
import type { Finding } from '../types';
import { createFinding } from './finding';
import type { Classifier, PullRequestInput } from './registry';

function lookup(table: Readonly<Record<string, string>>, key: string): string | null {
  return Object.hasOwn(table, key) ? table[key] : null;
}

/** Interpreter named by a `#!` line; `env` indirection is followed. */
export function parseShebangInterpreter(line: string): string | null {
  if (!line.startsWith('#!')) {
    return null;
  }

  const parts = line.slice(2).trim().split(/\s+/).filter(Boolean);
  if (parts.length === 0) {
    return null;
  }

  let program = getBaseName(parts[0]).toLowerCase();
  if (program === 'env') {
    const target = parts.slice(1).find((part) => !part.startsWith('-'));
    if (!target) {
      return null;
    }
    program = getBaseName(target).toLowerCase();
  }

  return program || null;
}

export function detectLanguage(
  path: string,
  addedLines: readonly string[],
  taxonomy: Pick<Taxonomy, 'languages' | 'shebangs'>,
): string | null {
  const extension = getLowerExtension(path);
  if (extension) {
    const byExtension = lookup(taxonomy.languages, extension);
    if (byExtension) {
      return byExtension;
    }
  }

  const interpreter = addedLines.length > 0 ? parseShebangInterpreter(addedLines[0]) : null;
  if (!interpreter) {
    return null;
  }

  return lookup(taxonomy.shebangs, interpreter) ?? lookup(taxonomy.shebangs, interpreter.replace(/[\d.]+$/, ''));
}

export const languageClassifier: Classifier<PullRequestInput> = {
  id: 'language',
  classify({ files }, { taxonomy }): Finding[] {
    const firstFileByLanguage = new Map<string, string>();

    for (const file of files) {
      const language = file.language ?? detectLanguage(file.path, file.addedLines, taxonomy);
      if (language && !firstFileByLanguage.has(language)) {
        firstFileByLanguage.set(language, file.path);
      }
    }

    return [...firstFileByLanguage.entries()].map(([language, path]) =>
      createFinding({ category: 'language', severity: 'info', value: language, evidence: path }),
    );
  },
};
