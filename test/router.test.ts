'use strict';

import test from 'node:test';
import assert from 'node:assert/strict';

import { DEFAULT_SIZE_THRESHOLDS } from '../src/classifiers/size';
import { route, selectPullRequestClassifiers } from '../src/router';
import type { RouteOptions } from '../src/router';
import { getDefaultTaxonomy } from '../src/taxonomy';
import type { BotEvent } from '../src/types';
import { REPOSITORY, changedFile, issueComment, issueOpened, pullRequestDetails, pullRequestOpened } from './fakes';

const options: RouteOptions = {
  classifierContext: {
    taxonomy: getDefaultTaxonomy(),
    sizeThresholds: DEFAULT_SIZE_THRESHOLDS,
    ownershipRules: [{ prefix: '*', owners: ['zoe'] }],
  },
  securityScanning: true,
  ownershipReviewers: true,
};

const files = [changedFile('app.py', { additions: 10, addedLines: ['eval(x)'] })];

function review(body: string | null): BotEvent {
  return {
    kind: 'PullRequestReviewSubmitted',
    deliveryId: 'delivery-4',
    repository: REPOSITORY,
    actor: 'maintainer',
    timestamp: '2026-01-01T00:00:00Z',
    pullRequest: { number: 7 },
    review: { id: 77, state: 'commented', body },
  };
}

test('opened pull requests run every pull request classifier', () => {
  const result = route(pullRequestOpened({ files }), options);

  assert.equal(result.type, 'findings');
  if (result.type !== 'findings') {
    return;
  }
  assert.equal(result.scope, 'pull-request');
  assert.equal(result.welcomeCandidate, true);
  assert.equal(result.securityScanned, true);
  assert.deepEqual(result.failedClassifiers, []);
  assert.deepEqual(
    result.findings.map((finding) => [finding.category, finding.value]),
    [
      ['language', 'python'],
      ['ownership', 'zoe'],
      ['security', 'dangerous-call'],
      ['size', 'small'],
    ],
  );
});

test('switched-off classifiers are left out', () => {
  const narrowed = { ...options, securityScanning: false, ownershipReviewers: false };

  assert.deepEqual(
    selectPullRequestClassifiers(narrowed).map((classifier) => classifier.id),
    ['language', 'content', 'size'],
  );

  const result = route(pullRequestOpened({ files }), narrowed);
  assert.equal(result.type === 'findings' && result.securityScanned, false);
  assert.deepEqual(
    result.type === 'findings' ? result.findings.map((finding) => finding.category) : [],
    ['language', 'size'],
  );
});

test('updated pull requests are classified but never welcomed', () => {
  const updated: BotEvent = {
    kind: 'PullRequestUpdated',
    deliveryId: 'delivery-6',
    repository: REPOSITORY,
    actor: 'newcomer',
    timestamp: '2026-01-01T00:00:00Z',
    pullRequest: pullRequestDetails({ files }),
  };
  const result = route(updated, options);

  assert.equal(result.type === 'findings' && result.welcomeCandidate, false);
});

test('pull requests without fetched files are skipped', () => {
  assert.deepEqual(route(pullRequestOpened(), options), { type: 'skipped', reason: 'files-not-hydrated' });
});

test('merged pull requests route to the thank-you path', () => {
  const event: BotEvent = {
    kind: 'PullRequestMerged',
    deliveryId: 'delivery-5',
    repository: REPOSITORY,
    actor: 'maintainer',
    timestamp: '2026-01-01T00:00:00Z',
    pullRequest: { number: 7, title: 'Add CSV export', author: 'newcomer' },
  };

  assert.deepEqual(route(event, options), { type: 'merged' });
});

test('opened issues run the triage classifiers', () => {
  const result = route(issueOpened('App crashes on save', 'Steps below'), options);

  assert.equal(result.type, 'findings');
  if (result.type !== 'findings') {
    return;
  }
  assert.equal(result.scope, 'issue');
  assert.equal(result.securityScanned, false);
  assert.deepEqual(
    result.findings.map((finding) => finding.label),
    ['bug'],
  );
});

test('comments route to commands, rejections or nothing', () => {
  assert.deepEqual(route(issueComment('/assign @alice'), options), {
    type: 'command',
    command: { name: 'assign', args: ['@alice'], invoker: 'maintainer' },
    commentKey: 'command:555',
  });
  assert.deepEqual(route(issueComment('/nope', { commentId: 9 }), options), {
    type: 'command-rejected',
    rejection: { name: 'nope', reason: 'unknown-command' },
    commentKey: 'command:9',
  });
  assert.deepEqual(route(issueComment('Looks good to me'), options), { type: 'skipped', reason: 'no-command' });
});

test('review bodies are parsed for commands under their own key', () => {
  assert.deepEqual(route(review('/help'), options), {
    type: 'command',
    command: { name: 'help', args: [], invoker: 'maintainer' },
    commentKey: 'command:review-77',
  });
  assert.deepEqual(route(review(null), options), { type: 'skipped', reason: 'empty-review-body' });
  assert.deepEqual(route(review(''), options), { type: 'skipped', reason: 'empty-review-body' });
});
