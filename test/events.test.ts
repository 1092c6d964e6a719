'use strict';

import test from 'node:test';
import assert from 'node:assert/strict';

import { ValidationError } from '../src/errors';
import { normalizeWebhook } from '../src/events';

const fixedNow = () => new Date('2026-03-01T12:00:00Z');

const envelope = {
  repository: { name: 'widgets', owner: { login: 'octo-org' } },
  sender: { login: 'newcomer', type: 'User' },
  installation: { id: 42 },
};

const pullRequest = {
  number: 7,
  title: 'Add CSV export',
  body: null,
  head: { sha: 'abc123' },
  user: { login: 'newcomer' },
  merged: false,
  updated_at: '2026-02-01T10:00:00Z',
};

test('opened pull requests become PullRequestOpened events without files', () => {
  assert.deepEqual(
    normalizeWebhook('pull_request', 'delivery-1', { ...envelope, action: 'opened', pull_request: pullRequest }, fixedNow),
    {
      status: 'event',
      installationId: 42,
      event: {
        kind: 'PullRequestOpened',
        deliveryId: 'delivery-1',
        repository: { owner: 'octo-org', name: 'widgets' },
        actor: 'newcomer',
        timestamp: '2026-02-01T10:00:00Z',
        pullRequest: {
          number: 7,
          title: 'Add CSV export',
          body: '',
          headSha: 'abc123',
          author: 'newcomer',
          files: null,
        },
      },
    },
  );
});

test('synchronize and reopened map to PullRequestUpdated', () => {
  for (const action of ['synchronize', 'reopened']) {
    const result = normalizeWebhook('pull_request', 'd', { ...envelope, action, pull_request: pullRequest }, fixedNow);
    assert.equal(result.status === 'event' && result.event.kind, 'PullRequestUpdated');
  }
});

test('closed pull requests only count when merged', () => {
  const merged = normalizeWebhook(
    'pull_request',
    'delivery-2',
    { ...envelope, action: 'closed', pull_request: { ...pullRequest, merged: true } },
    fixedNow,
  );
  const unmerged = normalizeWebhook(
    'pull_request',
    'delivery-3',
    { ...envelope, action: 'closed', pull_request: pullRequest },
    fixedNow,
  );

  assert.deepEqual(merged.status === 'event' ? merged.event : null, {
    kind: 'PullRequestMerged',
    deliveryId: 'delivery-2',
    repository: { owner: 'octo-org', name: 'widgets' },
    actor: 'newcomer',
    timestamp: '2026-02-01T10:00:00Z',
    pullRequest: { number: 7, title: 'Add CSV export', author: 'newcomer' },
  });
  assert.deepEqual(unmerged, { status: 'ignored', reason: 'pull-request-closed-unmerged' });
});

test('issues, comments and reviews are normalized', () => {
  const issue = normalizeWebhook(
    'issues',
    'delivery-4',
    { ...envelope, action: 'opened', issue: { number: 12, title: 'Crash', body: 'Steps', created_at: '2026-02-02T00:00:00Z' } },
    fixedNow,
  );
  assert.deepEqual(issue.status === 'event' ? issue.event : null, {
    kind: 'IssueOpened',
    deliveryId: 'delivery-4',
    repository: { owner: 'octo-org', name: 'widgets' },
    actor: 'newcomer',
    timestamp: '2026-02-02T00:00:00Z',
    issue: { number: 12, title: 'Crash', body: 'Steps' },
  });

  const comment = normalizeWebhook(
    'issue_comment',
    'delivery-5',
    {
      ...envelope,
      action: 'created',
      issue: { number: 7, title: 'Add CSV export', pull_request: { url: 'https://example.test/pulls/7' } },
      comment: { id: 555, body: '/help' },
    },
    fixedNow,
  );
  assert.deepEqual(comment.status === 'event' ? comment.event : null, {
    kind: 'IssueCommentCreated',
    deliveryId: 'delivery-5',
    repository: { owner: 'octo-org', name: 'widgets' },
    actor: 'newcomer',
    timestamp: '2026-03-01T12:00:00.000Z',
    issue: { number: 7, isPullRequest: true },
    comment: { id: 555, body: '/help' },
  });

  const review = normalizeWebhook(
    'pull_request_review',
    'delivery-6',
    {
      ...envelope,
      action: 'submitted',
      pull_request: pullRequest,
      review: { id: 77, state: 'approved', body: null, submitted_at: '2026-02-03T00:00:00Z' },
    },
    fixedNow,
  );
  assert.deepEqual(review.status === 'event' ? review.event : null, {
    kind: 'PullRequestReviewSubmitted',
    deliveryId: 'delivery-6',
    repository: { owner: 'octo-org', name: 'widgets' },
    actor: 'newcomer',
    timestamp: '2026-02-03T00:00:00Z',
    pullRequest: { number: 7 },
    review: { id: 77, state: 'approved', body: null },
  });
});

test('deliveries the bot has no use for are ignored with a reason', () => {
  assert.deepEqual(normalizeWebhook('push', 'd', {}), { status: 'ignored', reason: 'unsupported-event:push' });
  assert.deepEqual(normalizeWebhook('issues', 'd', { ...envelope, action: 'labeled' }), {
    status: 'ignored',
    reason: 'unsupported-action:issues.labeled',
  });
  assert.deepEqual(
    normalizeWebhook('issue_comment', 'd', {
      ...envelope,
      sender: { login: 'helper[bot]', type: 'Bot' },
      action: 'created',
    }),
    { status: 'ignored', reason: 'bot-sender' },
  );
});

test('a missing installation is carried as null', () => {
  const result = normalizeWebhook(
    'pull_request',
    'd',
    { repository: envelope.repository, sender: envelope.sender, action: 'opened', pull_request: pullRequest },
    fixedNow,
  );

  assert.equal(result.status === 'event' && result.installationId, null);
});

test('malformed payloads raise a ValidationError naming the fields', () => {
  assert.throws(
    () => normalizeWebhook('pull_request', 'd', { ...envelope, action: 'opened', pull_request: { number: 7 } }),
    (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.equal(error.message, 'Malformed pull_request payload');
      assert.deepEqual(error.issues, ['pull_request.head: Required', 'pull_request.user: Required']);
      return true;
    },
  );
  assert.throws(() => normalizeWebhook('issues', 'd', { action: 'opened' }), ValidationError);
});
