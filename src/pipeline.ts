'use strict';

import type { ClassifierContext } from './classifiers/registry';
import { WELCOME_COMMENT_KEY } from './comments';
import type { PipelineConfig } from './config';
import { sleep } from './core/utils';
import { dispatch, summarizeOutcome } from './dispatcher';
import type { DispatchTarget } from './dispatcher';
import { createChildLogger } from './logger';
import type { Logger } from './logger';
import { CHANGELOG_LIMIT, isEmptyPlan, planActions } from './planner';
import { failedOutcome, retryTransient } from './retry';
import type { RetryResult, RetryRunner } from './retry';
import { route } from './router';
import type { RouterResult } from './router';
import type { Taxonomy } from './taxonomy';
import type {
  ActionKind,
  ActionOutcome,
  BotEvent,
  DispatchOutcome,
  IssueTarget,
  MergedPullRequest,
  PlatformCapability,
  PullRequestEvent,
} from './types';

export type PipelineSettings = Pick<
  PipelineConfig,
  | 'autoAssignReviewers'
  | 'securityScanning'
  | 'welcomeNewContributors'
  | 'sizeThresholds'
  | 'ownershipRules'
  | 'maxReviewers'
  | 'retry'
>;

export interface PipelineDependencies {
  capability: PlatformCapability;
  config: PipelineSettings;
  taxonomy: Taxonomy;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface Pipeline {
  handle: (event: BotEvent) => Promise<DispatchOutcome>;
}

export function getIssueTarget(event: BotEvent): IssueTarget {
  switch (event.kind) {
    case 'PullRequestOpened':
    case 'PullRequestUpdated':
    case 'PullRequestMerged':
    case 'PullRequestReviewSubmitted':
      return { repository: event.repository, number: event.pullRequest.number };
    case 'IssueOpened':
    case 'IssueCommentCreated':
      return { repository: event.repository, number: event.issue.number };
  }
}

export function getDispatchTarget(event: BotEvent): DispatchTarget {
  const isPullRequestEvent = event.kind === 'PullRequestOpened' || event.kind === 'PullRequestUpdated';
  return {
    deliveryId: event.deliveryId,
    issue: getIssueTarget(event),
    commit: isPullRequestEvent ? { repository: event.repository, sha: event.pullRequest.headSha } : null,
  };
}

/**
 * One delivery, end to end: hydrate, route, gather platform facts, plan,
 * dispatch. Platform reads are retried like actions; a read that still fails
 * is reported in the outcome as a failed `fetch-*` action. `handle` itself
 * only rejects on programming errors.
 */
export function createPipeline(deps: PipelineDependencies): Pipeline {
  const { capability, config, taxonomy } = deps;
  const classifierContext: ClassifierContext = {
    taxonomy,
    sizeThresholds: config.sizeThresholds,
    ownershipRules: config.ownershipRules,
  };

  async function readFact<T>(
    action: ActionKind,
    target: string,
    operation: () => Promise<T>,
    runner: RetryRunner,
    failures: ActionOutcome[],
  ): Promise<RetryResult<T>> {
    const result = await retryTransient(operation, runner, { action, target });
    if (result.status === 'failed') {
      runner.logger.warn(
        { action, target, attempts: result.attempts, kind: result.error.kind, reason: result.error.message },
        'Platform read failed',
      );
      failures.push(failedOutcome(action, target, result.attempts, result.error));
    }

    return result;
  }

  async function hydrate(
    event: PullRequestEvent,
    runner: RetryRunner,
    failures: ActionOutcome[],
  ): Promise<PullRequestEvent | null> {
    if (event.pullRequest.files !== null) {
      return event;
    }

    const result = await readFact(
      'fetch-files',
      `#${event.pullRequest.number}`,
      () => capability.fetchChangedFiles(getIssueTarget(event)),
      runner,
      failures,
    );
    if (result.status === 'failed') {
      return null;
    }

    return { ...event, pullRequest: { ...event.pullRequest, files: result.value } };
  }

  async function shouldWelcome(
    event: BotEvent,
    result: RouterResult,
    runner: RetryRunner,
    failures: ActionOutcome[],
  ): Promise<boolean> {
    if (!config.welcomeNewContributors || result.type !== 'findings' || !result.welcomeCandidate) {
      return false;
    }

    if (event.kind !== 'PullRequestOpened') {
      return false;
    }

    const author = event.pullRequest.author;
    const contributed = await readFact(
      'fetch-contributor-history',
      `@${author}`,
      () => capability.fetchPriorContribution(author, event.repository),
      runner,
      failures,
    );
    if (contributed.status === 'failed' || contributed.value) {
      return false;
    }

    const welcomed = await readFact(
      'fetch-comments',
      WELCOME_COMMENT_KEY,
      () => capability.hasBotComment(getIssueTarget(event), WELCOME_COMMENT_KEY),
      runner,
      failures,
    );
    return welcomed.status === 'ok' && !welcomed.value;
  }

  async function loadRecentMerges(
    event: BotEvent,
    result: RouterResult,
    runner: RetryRunner,
    failures: ActionOutcome[],
  ): Promise<MergedPullRequest[]> {
    if (result.type !== 'command' || result.command.name !== 'changelog') {
      return [];
    }

    const merges = await readFact(
      'fetch-recent-merges',
      `${event.repository.owner}/${event.repository.name}`,
      () => capability.fetchRecentMerges(event.repository, CHANGELOG_LIMIT),
      runner,
      failures,
    );
    return merges.status === 'ok' ? merges.value : [];
  }

  async function handle(incoming: BotEvent): Promise<DispatchOutcome> {
    const log = createChildLogger(deps.logger, {
      deliveryId: incoming.deliveryId,
      eventKind: incoming.kind,
      repo: `${incoming.repository.owner}/${incoming.repository.name}`,
    });
    const runner: RetryRunner = { retry: config.retry, logger: log, sleep: deps.sleep ?? sleep };
    const failures: ActionOutcome[] = [];

    const event =
      incoming.kind === 'PullRequestOpened' || incoming.kind === 'PullRequestUpdated'
        ? await hydrate(incoming, runner, failures)
        : incoming;

    if (!event) {
      log.warn('Changed files unavailable; nothing dispatched');
      return summarizeOutcome(incoming.deliveryId, failures);
    }

    const result = route(event, {
      classifierContext,
      securityScanning: config.securityScanning,
      ownershipReviewers: config.autoAssignReviewers,
      onClassifierError: (classifierId, error) => {
        log.error({ classifierId, err: error }, 'Classifier failed');
      },
    });

    if (result.type === 'skipped') {
      log.info({ reason: result.reason }, 'Event skipped');
      return summarizeOutcome(event.deliveryId, failures);
    }

    log.info({ route: result.type }, 'Event routed');

    const [welcome, recentMerges] = await Promise.all([
      shouldWelcome(event, result, runner, failures),
      loadRecentMerges(event, result, runner, failures),
    ]);

    const plan = planActions(result, {
      event,
      maxReviewers: config.maxReviewers,
      welcome,
      recentMerges,
    });

    if (isEmptyPlan(plan)) {
      log.info({ route: result.type }, 'Nothing to dispatch');
      return summarizeOutcome(event.deliveryId, failures);
    }

    const dispatched = await dispatch(plan, capability, getDispatchTarget(event), {
      retry: config.retry,
      logger: log,
      sleep: runner.sleep,
    });

    const outcome = summarizeOutcome(event.deliveryId, [...failures, ...dispatched.actions]);
    log.info(
      { applied: outcome.applied, skipped: outcome.skipped, failed: outcome.failed },
      'Delivery handled',
    );
    return outcome;
  }

  return { handle };
}
