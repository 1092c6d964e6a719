'use strict';

import { z } from 'zod';

import { ValidationError } from './errors';
import type { BotEvent, RepositoryRef } from './types';

export const SUPPORTED_WEBHOOK_EVENTS = ['pull_request', 'issues', 'issue_comment', 'pull_request_review'] as const;

export type SupportedWebhookEvent = (typeof SUPPORTED_WEBHOOK_EVENTS)[number];

export type NormalizedWebhook =
  | { status: 'event'; event: BotEvent; installationId: number | null }
  | { status: 'ignored'; reason: string };

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

const envelopeSchema = z.object({
  action: z.string().optional(),
  repository: z.object({
    name: z.string().min(1),
    owner: z.object({ login: z.string().min(1) }),
  }),
  sender: z.object({
    login: z.string().min(1),
    type: z.string().nullish(),
  }),
  installation: z.object({ id: z.number().int() }).nullish(),
});

const pullRequestSchema = z.object({
  number: z.number().int().positive(),
  title: optionalText,
  body: optionalText,
  head: z.object({ sha: z.string().min(1) }),
  user: z.object({ login: z.string().min(1) }),
  merged: z.boolean().nullish(),
  updated_at: z.string().nullish(),
});

const issueSchema = z.object({
  number: z.number().int().positive(),
  title: optionalText,
  body: optionalText,
  created_at: z.string().nullish(),
  pull_request: z.object({}).passthrough().nullish(),
});

const commentSchema = z.object({
  id: z.number().int(),
  body: optionalText,
  created_at: z.string().nullish(),
});

const reviewSchema = z.object({
  id: z.number().int(),
  state: z.string(),
  body: z.string().nullish(),
  submitted_at: z.string().nullish(),
});

function parseSection<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  value: unknown,
  description: string,
): z.infer<TSchema> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${[description, ...issue.path].join('.')}: ${issue.message}`);
    throw new ValidationError(`Malformed ${description} payload`, issues);
  }

  return result.data;
}

function isSupportedEvent(name: string): name is SupportedWebhookEvent {
  return SUPPORTED_WEBHOOK_EVENTS.some((supported) => supported === name);
}

/**
 * Turns a verified webhook delivery into a `BotEvent`. Deliveries the bot has
 * no use for are `ignored`; payloads missing fields it relies on raise
 * `ValidationError`.
 */
export function normalizeWebhook(
  name: string,
  deliveryId: string,
  payload: unknown,
  now: () => Date = () => new Date(),
): NormalizedWebhook {
  if (!isSupportedEvent(name)) {
    return { status: 'ignored', reason: `unsupported-event:${name}` };
  }

  const envelope = parseSection(envelopeSchema, payload, name);
  if (envelope.sender.type === 'Bot') {
    return { status: 'ignored', reason: 'bot-sender' };
  }

  const action = envelope.action ?? '';
  const repository: RepositoryRef = { owner: envelope.repository.owner.login, name: envelope.repository.name };
  const installationId = envelope.installation?.id ?? null;
  const base = { deliveryId, repository, actor: envelope.sender.login };
  const fallbackTimestamp = () => now().toISOString();
  const section = (field: string): unknown =>
    typeof payload === 'object' && payload !== null ? Reflect.get(payload, field) : undefined;
  const ignored = (): NormalizedWebhook => ({ status: 'ignored', reason: `unsupported-action:${name}.${action}` });

  switch (name) {
    case 'pull_request': {
      if (!['opened', 'reopened', 'synchronize', 'closed'].includes(action)) {
        return ignored();
      }

      const pullRequest = parseSection(pullRequestSchema, section('pull_request'), 'pull_request');
      const timestamp = pullRequest.updated_at ?? fallbackTimestamp();

      if (action === 'closed') {
        if (!pullRequest.merged) {
          return { status: 'ignored', reason: 'pull-request-closed-unmerged' };
        }

        return {
          status: 'event',
          installationId,
          event: {
            kind: 'PullRequestMerged',
            ...base,
            timestamp,
            pullRequest: { number: pullRequest.number, title: pullRequest.title, author: pullRequest.user.login },
          },
        };
      }

      return {
        status: 'event',
        installationId,
        event: {
          kind: action === 'opened' ? 'PullRequestOpened' : 'PullRequestUpdated',
          ...base,
          timestamp,
          pullRequest: {
            number: pullRequest.number,
            title: pullRequest.title,
            body: pullRequest.body,
            headSha: pullRequest.head.sha,
            author: pullRequest.user.login,
            files: null,
          },
        },
      };
    }

    case 'issues': {
      if (action !== 'opened') {
        return ignored();
      }

      const issue = parseSection(issueSchema, section('issue'), 'issue');
      return {
        status: 'event',
        installationId,
        event: {
          kind: 'IssueOpened',
          ...base,
          timestamp: issue.created_at ?? fallbackTimestamp(),
          issue: { number: issue.number, title: issue.title, body: issue.body },
        },
      };
    }

    case 'issue_comment': {
      if (action !== 'created') {
        return ignored();
      }

      const issue = parseSection(issueSchema, section('issue'), 'issue');
      const comment = parseSection(commentSchema, section('comment'), 'comment');
      return {
        status: 'event',
        installationId,
        event: {
          kind: 'IssueCommentCreated',
          ...base,
          timestamp: comment.created_at ?? fallbackTimestamp(),
          issue: { number: issue.number, isPullRequest: Boolean(issue.pull_request) },
          comment: { id: comment.id, body: comment.body },
        },
      };
    }

    case 'pull_request_review': {
      if (action !== 'submitted') {
        return ignored();
      }

      const pullRequest = parseSection(pullRequestSchema, section('pull_request'), 'pull_request');
      const review = parseSection(reviewSchema, section('review'), 'review');
      return {
        status: 'event',
        installationId,
        event: {
          kind: 'PullRequestReviewSubmitted',
          ...base,
          timestamp: review.submitted_at ?? fallbackTimestamp(),
          pullRequest: { number: pullRequest.number },
          review: { id: review.id, state: review.state, body: review.body ?? null },
        },
      };
    }
  }
}
