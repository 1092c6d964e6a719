'use strict';

import { z } from 'zod';

import { CATCH_ALL_PREFIX } from './classifiers/ownership';
import type { OwnershipRule } from './classifiers/ownership';
import { DEFAULT_SIZE_THRESHOLDS } from './classifiers/size';
import { parseBoolean, parseCsv } from './core/utils';
import { ValidationError } from './errors';
import type { RetryPolicy } from './retry';
import type { EnvMap } from './types';

export interface PipelineConfig {
  autoAssignReviewers: boolean;
  securityScanning: boolean;
  welcomeNewContributors: boolean;
  sizeThresholds: number[];
  ownershipRules: OwnershipRule[];
  maxReviewers: number;
  retry: RetryPolicy;
  requestTimeoutMs: number;
  taxonomyPath: string | null;
  logLevel: string;
}

export interface ServerConfig {
  appId: string;
  privateKey: string;
  webhookSecret: string;
  port: number;
  pipeline: PipelineConfig;
}

const BOOLEAN_WORDS = new Set(['1', 'true', 'yes', 'y', 'on', '0', 'false', 'no', 'n', 'off']);
const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function booleanFlag(defaultValue: boolean) {
  return z
    .string()
    .trim()
    .optional()
    .refine((value) => value === undefined || value === '' || BOOLEAN_WORDS.has(value.toLowerCase()), {
      message: 'Expected true or false',
    })
    .transform((value) => parseBoolean(value, defaultValue));
}

function integerSetting(defaultValue: number, min: number, max: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(defaultValue));
}

const sizeThresholdsSchema = z.preprocess(
  blankToUndefined,
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) {
        return [...DEFAULT_SIZE_THRESHOLDS];
      }

      const thresholds = parseCsv(value).map(Number);
      const ascending = thresholds.every(
        (threshold, index) => Number.isInteger(threshold) && threshold > 0 && (index === 0 || threshold > thresholds[index - 1]),
      );
      const valid = ascending && thresholds.length === DEFAULT_SIZE_THRESHOLDS.length;

      if (!valid) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected ${DEFAULT_SIZE_THRESHOLDS.length} ascending positive integers, e.g. ${DEFAULT_SIZE_THRESHOLDS.join(',')}`,
        });
        return z.NEVER;
      }

      return thresholds;
    }),
);

/**
 * `src/api/=alice|bob,docs/=carol,*=dave`. Owner logins may carry a leading
 * `@`; it is dropped.
 */
export function parseOwnershipRules(value: string | null | undefined): OwnershipRule[] {
  const rules: OwnershipRule[] = [];

  for (const entry of parseCsv(value)) {
    const separator = entry.indexOf('=');
    const prefix = separator === -1 ? '' : entry.slice(0, separator).trim();
    const owners =
      separator === -1
        ? []
        : entry
            .slice(separator + 1)
            .split('|')
            .map((owner) => owner.trim().replace(/^@/, ''))
            .filter(Boolean);

    if (!prefix || owners.length === 0) {
      throw new Error(`Invalid ownership rule "${entry}"; expected prefix=owner|owner`);
    }

    rules.push({ prefix: prefix === CATCH_ALL_PREFIX ? prefix : prefix.replace(/^\.?\//, ''), owners });
  }

  return rules;
}

const ownershipRulesSchema = z
  .string()
  .optional()
  .transform((value, ctx) => {
    try {
      return parseOwnershipRules(value);
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) });
      return z.NEVER;
    }
  });

const pipelineSchema = z
  .object({
    AUTO_ASSIGN_REVIEWERS: booleanFlag(true),
    SECURITY_SCANNING: booleanFlag(true),
    WELCOME_NEW_CONTRIBUTORS: booleanFlag(true),
    SIZE_THRESHOLDS: sizeThresholdsSchema,
    OWNERSHIP_RULES: ownershipRulesSchema,
    MAX_REVIEWERS: integerSetting(3, 0, 15),
    RETRY_MAX_ATTEMPTS: integerSetting(3, 1, 5),
    RETRY_BASE_DELAY_MS: integerSetting(500, 0, 60_000),
    RETRY_MAX_DELAY_MS: integerSetting(4000, 0, 300_000),
    REQUEST_TIMEOUT_MS: integerSetting(10_000, 100, 120_000),
    BOT_TAXONOMY_PATH: z.preprocess(blankToUndefined, z.string().optional()),
    LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(LOG_LEVELS).default('info')),
  })
  .refine((env) => env.RETRY_MAX_DELAY_MS >= env.RETRY_BASE_DELAY_MS, {
    message: 'RETRY_MAX_DELAY_MS must not be lower than RETRY_BASE_DELAY_MS',
    path: ['RETRY_MAX_DELAY_MS'],
  });

function requiredSetting(name: string) {
  const message = `${name} is required`;
  return z.string({ required_error: message }).trim().min(1, message);
}

const serverSchema = z.object({
  GITHUB_APP_ID: requiredSetting('GITHUB_APP_ID'),
  GITHUB_APP_PRIVATE_KEY: requiredSetting('GITHUB_APP_PRIVATE_KEY'),
  GITHUB_WEBHOOK_SECRET: requiredSetting('GITHUB_WEBHOOK_SECRET'),
  PORT: integerSetting(3000, 1, 65_535),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function toValidationError(error: z.ZodError): ValidationError {
  const issues = formatIssues(error);
  return new ValidationError(`Invalid configuration:\n  ${issues.join('\n  ')}`, issues);
}

export function buildConfigFromEnv(env: EnvMap = process.env): PipelineConfig {
  const result = pipelineSchema.safeParse({ ...env });
  if (!result.success) {
    throw toValidationError(result.error);
  }

  const parsed = result.data;
  return {
    autoAssignReviewers: parsed.AUTO_ASSIGN_REVIEWERS,
    securityScanning: parsed.SECURITY_SCANNING,
    welcomeNewContributors: parsed.WELCOME_NEW_CONTRIBUTORS,
    sizeThresholds: parsed.SIZE_THRESHOLDS,
    ownershipRules: parsed.OWNERSHIP_RULES,
    maxReviewers: parsed.MAX_REVIEWERS,
    retry: {
      maxAttempts: parsed.RETRY_MAX_ATTEMPTS,
      baseDelayMs: parsed.RETRY_BASE_DELAY_MS,
      maxDelayMs: parsed.RETRY_MAX_DELAY_MS,
    },
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    taxonomyPath: parsed.BOT_TAXONOMY_PATH ?? null,
    logLevel: parsed.LOG_LEVEL,
  };
}

/** Keys pasted into a single-line env var keep their newlines escaped. */
export function normalizePrivateKey(privateKey: string | null | undefined): string {
  if (!privateKey) {
    return '';
  }

  return privateKey.replace(/\\n/g, '\n');
}

export function loadServerConfig(env: EnvMap = process.env): ServerConfig {
  const result = serverSchema.safeParse({ ...env });
  if (!result.success) {
    throw toValidationError(result.error);
  }

  return {
    appId: result.data.GITHUB_APP_ID,
    privateKey: normalizePrivateKey(result.data.GITHUB_APP_PRIVATE_KEY),
    webhookSecret: result.data.GITHUB_WEBHOOK_SECRET,
    port: result.data.PORT,
    pipeline: buildConfigFromEnv(env),
  };
}
