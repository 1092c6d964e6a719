'use strict';

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

export const DEFAULT_TAXONOMY_PATH = join(__dirname, '..', 'data', 'taxonomy.json');

const lowerCaseString = z
  .string()
  .min(1)
  .refine((value) => value === value.toLowerCase(), 'must be lower-case');

const keywordCategorySchema = z.object({
  label: lowerCaseString,
  keywords: z.array(lowerCaseString).min(1),
});

const taxonomySchema = z.object({
  languages: z.record(
    lowerCaseString.refine((extension) => extension.startsWith('.'), 'extensions start with "."'),
    lowerCaseString,
  ),
  shebangs: z.record(lowerCaseString, lowerCaseString),
  content: z.array(
    z.object({
      label: lowerCaseString,
      extensions: z.array(lowerCaseString).default([]),
      fragments: z.array(lowerCaseString).default([]),
    }),
  ),
  // Listed in priority order: the first category with a matching keyword wins.
  triage: z.array(keywordCategorySchema).min(1),
  priority: keywordCategorySchema,
});

export type Taxonomy = z.infer<typeof taxonomySchema>;
export type ContentRule = Taxonomy['content'][number];

export function parseTaxonomy(raw: unknown, source = 'taxonomy'): Taxonomy {
  const result = taxonomySchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid ${source}:\n  ${issues.join('\n  ')}`);
  }

  return result.data;
}

export function loadTaxonomy(path = DEFAULT_TAXONOMY_PATH): Taxonomy {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new Error(`Failed to read taxonomy from "${path}": ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }

  return parseTaxonomy(raw, path);
}

let defaultTaxonomy: Taxonomy | null = null;

export function getDefaultTaxonomy(): Taxonomy {
  if (!defaultTaxonomy) {
    defaultTaxonomy = loadTaxonomy();
  }

  return defaultTaxonomy;
}
