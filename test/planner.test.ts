'use strict';

import test from 'node:test';
import assert from 'node:assert/strict';

import { createFinding } from '../src/classifiers/finding';
import {
  JOKES,
  buildAnalysisSection,
  buildHelpComment,
  buildIssueSuggestionsComment,
  buildRequirementsSection,
  buildSecuritySection,
  buildWelcomeSection,
  commentMarker,
  pickFromPool,
} from '../src/comments';
import { emptyPlan, isEmptyPlan, planActions, selectReviewers } from '../src/planner';
import type { PlanContext } from '../src/planner';
import type { RouterResult } from '../src/router';
import type { BotEvent, Command, Finding, MergedPullRequest } from '../src/types';
import { REPOSITORY, changedFile, issueComment, issueOpened, pullRequestDetails, pullRequestOpened } from './fakes';

const credential = createFinding({
  category: 'security',
  severity: 'critical',
  value: 'hardcoded-credential',
  file: 'app.py',
  evidence: 'password = "***"',
});

const sqlWarning = createFinding({
  category: 'security',
  severity: 'warn',
  value: 'sql-injection-risk',
  file: 'db.py',
  evidence: 'cursor.execute("SELECT " + x)',
});

function pullRequestFindings(findings: Finding[], overrides: Partial<Extract<RouterResult, { type: 'findings' }>> = {}) {
  const result: RouterResult = {
    type: 'findings',
    scope: 'pull-request',
    findings,
    failedClassifiers: [],
    welcomeCandidate: true,
    securityScanned: true,
    ...overrides,
  };
  return result;
}

function contextFor(event: BotEvent, overrides: Partial<PlanContext> = {}): PlanContext {
  return { event, maxReviewers: 3, welcome: false, recentMerges: [], ...overrides };
}

const baseFindings = [
  createFinding({ category: 'language', severity: 'info', value: 'python', evidence: 'app.py' }),
  createFinding({ category: 'size', severity: 'info', value: 'medium', evidence: '75 lines changed' }),
  createFinding({ category: 'ownership', severity: 'info', value: 'zoe', evidence: '*' }),
  createFinding({ category: 'ownership', severity: 'info', value: 'newcomer', evidence: 'src/' }),
  createFinding({ category: 'ownership', severity: 'info', value: 'carol', evidence: 'src/' }),
  createFinding({ category: 'ownership', severity: 'info', value: 'alice', evidence: 'src/api/' }),
  createFinding({ category: 'ownership', severity: 'info', value: 'bob', evidence: 'src/api/' }),
];

test('pull request findings become labels, reviewers, a status check and a report', () => {
  const plan = planActions(pullRequestFindings([...baseFindings, credential]), contextFor(pullRequestOpened()));

  assert.deepEqual(plan, {
    labelsToAdd: ['lang:python', 'security:hardcoded-credential', 'size:medium'],
    labelsToRemove: ['size:large', 'size:small', 'size:xlarge'],
    reviewersToRequest: ['alice', 'bob', 'carol'],
    assigneesToAdd: [],
    issueState: null,
    statusCheck: { context: 'security-scan', state: 'failure', description: '1 issue(s) found' },
    commentKey: 'pr-report:abc123',
    commentBody: [
      '🔒 **Security Scan Results:**',
      '',
      '- 🚨 **Hardcoded credential** in `app.py`',
      '  `password = "***"`',
      '',
      '💡 Please review these potential issues before merging. This scan is pattern-based and can report false positives.',
    ].join('\n'),
  });
});

test('planning is deterministic and independent of finding order', () => {
  const context = contextFor(pullRequestOpened());
  const first = planActions(pullRequestFindings([...baseFindings, credential]), context);
  const second = planActions(pullRequestFindings([credential, ...baseFindings].reverse()), context);

  assert.equal(JSON.stringify(first), JSON.stringify(second));
  assert.deepEqual(Object.keys(first), [
    'labelsToAdd',
    'labelsToRemove',
    'reviewersToRequest',
    'assigneesToAdd',
    'issueState',
    'statusCheck',
    'commentKey',
    'commentBody',
  ]);
});

test('warnings alone keep the security status green but are still counted', () => {
  const plan = planActions(pullRequestFindings([sqlWarning, credential]), contextFor(pullRequestOpened()));
  const warningsOnly = planActions(pullRequestFindings([sqlWarning]), contextFor(pullRequestOpened()));
  const clean = planActions(pullRequestFindings(baseFindings), contextFor(pullRequestOpened()));

  assert.deepEqual(plan.statusCheck, { context: 'security-scan', state: 'failure', description: '2 issue(s) found' });
  assert.deepEqual(warningsOnly.statusCheck, {
    context: 'security-scan',
    state: 'success',
    description: '1 issue(s) found',
  });
  assert.deepEqual(clean.statusCheck, { context: 'security-scan', state: 'success', description: 'No issues found' });
  assert.equal(clean.commentBody, null);
  assert.equal(clean.commentKey, null);
});

test('a crashed security classifier reports an error status', () => {
  const plan = planActions(
    pullRequestFindings(baseFindings, { failedClassifiers: ['security'] }),
    contextFor(pullRequestOpened()),
  );

  assert.deepEqual(plan.statusCheck, { context: 'security-scan', state: 'error', description: 'Security scan failed' });
});

test('no status check is planned when scanning is switched off', () => {
  const plan = planActions(pullRequestFindings(baseFindings, { securityScanned: false }), contextFor(pullRequestOpened()));

  assert.equal(plan.statusCheck, null);
});

test('stale size labels are only removed when a size finding exists', () => {
  const withoutSize = baseFindings.filter((finding) => finding.category !== 'size');
  const plan = planActions(pullRequestFindings(withoutSize), contextFor(pullRequestOpened()));

  assert.deepEqual(plan.labelsToRemove, []);
});

test('the welcome section is appended once for first-time contributors', () => {
  const welcomeOnly = planActions(pullRequestFindings(baseFindings), contextFor(pullRequestOpened(), { welcome: true }));
  const withReport = planActions(
    pullRequestFindings([...baseFindings, credential]),
    contextFor(pullRequestOpened(), { welcome: true }),
  );

  assert.equal(welcomeOnly.commentKey, 'pr-report:abc123');
  assert.equal(welcomeOnly.commentBody, buildWelcomeSection('newcomer'));
  assert.ok(welcomeOnly.commentBody?.startsWith(`${commentMarker('welcome')}\n🎉 Welcome @newcomer!`));
  assert.equal(
    withReport.commentBody,
    `${buildSecuritySection([credential])}\n\n---\n\n${buildWelcomeSection('newcomer')}`,
  );
});

test('reviewers exclude the author case-insensitively and respect the cap', () => {
  assert.deepEqual(selectReviewers(baseFindings, 'NewComer', 10), ['alice', 'bob', 'carol', 'zoe']);
  assert.deepEqual(selectReviewers(baseFindings, 'alice', 2), ['bob', 'carol']);
  assert.deepEqual(selectReviewers(baseFindings, 'alice', 0), []);
});

test('issue findings add labels and ask for missing details', () => {
  const result: RouterResult = {
    type: 'findings',
    scope: 'issue',
    findings: [
      createFinding({ category: 'priority', severity: 'critical', value: 'urgent', evidence: 'urgent' }),
      createFinding({ category: 'classification', severity: 'info', value: 'bug', evidence: 'crash' }),
    ],
    failedClassifiers: [],
    welcomeCandidate: false,
    securityScanned: false,
  };

  assert.deepEqual(planActions(result, contextFor(issueOpened('Crash', 'urgent'))), {
    ...emptyPlan(),
    labelsToAdd: ['bug', 'priority:urgent'],
    commentKey: 'issue-suggestions',
    commentBody: buildIssueSuggestionsComment(['more-detail']),
  });

  const detailed = planActions(
    { ...result, findings: [] },
    contextFor(issueOpened('Export stalls', 'Exporting a large table stalls the browser tab for about a minute.')),
  );
  assert.deepEqual(detailed, emptyPlan());
});

test('opened pull requests get an analysis and requirements report ahead of other sections', () => {
  const files = [changedFile('app.py', { additions: 10 })];
  const opened = pullRequestOpened({ files });
  const updated: BotEvent = {
    kind: 'PullRequestUpdated',
    deliveryId: 'delivery-8',
    repository: REPOSITORY,
    actor: 'newcomer',
    timestamp: '2026-01-02T00:00:00Z',
    pullRequest: pullRequestDetails({ files }),
  };
  const findings = [...baseFindings, credential];

  const openedPlan = planActions(pullRequestFindings(findings), contextFor(opened, { welcome: true }));
  const updatedPlan = planActions(pullRequestFindings(findings), contextFor(updated));

  assert.equal(
    openedPlan.commentBody,
    [
      buildAnalysisSection({
        complexity: { score: 0, totalLines: 10, fileCount: 1, riskLevel: 'low' },
        breakingFiles: [],
        languages: ['python'],
      }),
      buildRequirementsSection([{ kind: 'missing-tests' }]),
      buildSecuritySection([credential]),
      buildWelcomeSection('newcomer'),
    ].join('\n\n---\n\n'),
  );
  assert.ok(openedPlan.commentBody?.startsWith('📊 **PR Analysis:**\n\n- **Files changed:** 1\n'));
  assert.equal(updatedPlan.commentBody, buildSecuritySection([credential]));
});

function planFor(command: Command, overrides: Partial<PlanContext> = {}) {
  return planActions(
    { type: 'command', command, commentKey: 'command:555' },
    contextFor(issueComment(`/${command.name}`), overrides),
  );
}

test('command plans carry their effect and a confirmation', () => {
  assert.deepEqual(planFor({ name: 'assign', args: ['@alice'], invoker: 'maintainer' }), {
    ...emptyPlan(),
    assigneesToAdd: ['alice'],
    commentKey: 'command:555',
    commentBody: '✅ Assigned to @alice',
  });
  assert.deepEqual(planFor({ name: 'label', args: ['needs-review'], invoker: 'maintainer' }), {
    ...emptyPlan(),
    labelsToAdd: ['needs-review'],
    commentKey: 'command:555',
    commentBody: '🏷️ Added label: `needs-review`',
  });
  assert.deepEqual(planFor({ name: 'close', args: [], invoker: 'maintainer' }), {
    ...emptyPlan(),
    issueState: 'closed',
    commentKey: 'command:555',
    commentBody: '🔒 Closed by @maintainer',
  });
  assert.equal(planFor({ name: 'reopen', args: [], invoker: 'maintainer' }).issueState, 'open');
  assert.equal(planFor({ name: 'help', args: [], invoker: 'maintainer' }).commentBody, buildHelpComment());
});

test('the help reference lists every command', () => {
  const help = buildHelpComment();

  assert.equal(help.split('\n')[0], '🤖 **Available Commands:**');
  assert.ok(help.includes('- `/assign @user` - Assign the issue or pull request to a user'));
  assert.ok(help.includes('- `/motivate` - A little inspiration'));
});

test('changelog lists up to ten recent merges', () => {
  const merges: MergedPullRequest[] = Array.from({ length: 12 }, (_, index) => ({
    number: 100 - index,
    title: `Change ${index}`,
    author: 'alice',
    mergedAt: '2026-01-01T00:00:00Z',
  }));
  const command: Command = { name: 'changelog', args: [], invoker: 'maintainer' };

  const body = planFor(command, { recentMerges: merges }).commentBody ?? '';
  const lines = body.split('\n');

  assert.equal(lines[0], '# Recent Changes');
  assert.equal(lines.length, 12);
  assert.equal(lines[2], '- Change 0 (#100) by @alice');
  assert.equal(lines[11], '- Change 9 (#91) by @alice');
  assert.equal(planFor(command).commentBody, '# Recent Changes\n\nNo recently merged pull requests.');
});

test('fun commands pick a stable entry for the same comment', () => {
  const command: Command = { name: 'joke', args: [], invoker: 'maintainer' };
  const first = planFor(command).commentBody;

  assert.equal(first, planFor(command).commentBody);
  assert.equal(first, `😄 ${pickFromPool(JOKES, 'command:555')}`);
  assert.ok(JOKES.some((joke) => first === `😄 ${joke}`));
});

test('rejected commands reply with a hint', () => {
  const unknown = planActions(
    { type: 'command-rejected', rejection: { name: 'nope', reason: 'unknown-command' }, commentKey: 'command:9' },
    contextFor(issueComment('/nope')),
  );
  const invalid = planActions(
    { type: 'command-rejected', rejection: { name: 'assign', reason: 'invalid-arguments' }, commentKey: 'command:9' },
    contextFor(issueComment('/assign')),
  );

  assert.equal(unknown.commentKey, 'command:9');
  assert.equal(unknown.commentBody, `🤔 \`/nope\` isn't a command I know.\n\n${buildHelpComment()}`);
  assert.equal(
    invalid.commentBody,
    "⚠️ I couldn't run `/assign` with those arguments. Usage: `/assign @user` - Assign the issue or pull request to a user",
  );
});

test('merged pull requests get a thank-you comment', () => {
  const event: BotEvent = {
    kind: 'PullRequestMerged',
    deliveryId: 'delivery-9',
    repository: REPOSITORY,
    actor: 'maintainer',
    timestamp: '2026-01-01T00:00:00Z',
    pullRequest: { number: 7, title: 'Add CSV export', author: 'newcomer' },
  };

  assert.deepEqual(planActions({ type: 'merged' }, contextFor(event)), {
    ...emptyPlan(),
    commentKey: 'merged-thanks',
    commentBody: '🎉 Thanks @newcomer! Your contribution has been merged. Great work! 🚀',
  });
});

test('skipped routes plan nothing', () => {
  const plan = planActions({ type: 'skipped', reason: 'no-command' }, contextFor(issueComment('hello')));

  assert.ok(isEmptyPlan(plan));
});
