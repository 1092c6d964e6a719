'use strict';

import { sleep as defaultSleep } from './core/utils';
import { classifyPlatformError } from './errors';
import type { Logger } from './logger';
import { DEFAULT_RETRY_POLICY, attemptLimit, backOff, failedOutcome, retryAfterOf } from './retry';
import type { RetryPolicy, RetryRunner } from './retry';
import type {
  ActionKind,
  ActionOutcome,
  ActionPlan,
  CommitTarget,
  DispatchOutcome,
  EffectResult,
  EffectResults,
  IssueTarget,
  PlatformCapability,
} from './types';

export interface DispatchTarget {
  readonly deliveryId: string;
  readonly issue: IssueTarget;
  /** Head commit for status checks; `null` outside pull request events. */
  readonly commit: CommitTarget | null;
}

export interface DispatchOptions {
  readonly retry?: RetryPolicy;
  readonly logger: Logger;
  readonly sleep?: (ms: number) => Promise<void>;
}

type InvokeEffects = (items: readonly string[]) => Promise<EffectResults>;

function toOutcome(action: ActionKind, target: string, attempts: number, effect: EffectResult): ActionOutcome {
  switch (effect.status) {
    case 'applied':
      return { action, target, attempts, result: { status: 'applied' } };
    case 'unchanged':
      return { action, target, attempts, result: { status: 'skipped', reason: effect.reason } };
    case 'failed':
      return failedOutcome(action, target, attempts, classifyPlatformError(effect.error));
  }
}

/**
 * Applies one action kind to a set of items. Items that fail transiently are
 * retried as a group; everything else is settled after the attempt that
 * produced it. Never throws.
 */
async function runAction(
  action: ActionKind,
  items: readonly string[],
  invoke: InvokeEffects,
  runner: RetryRunner,
): Promise<ActionOutcome[]> {
  const settled = new Map<string, ActionOutcome>();
  let pending = [...items];
  const maxAttempts = attemptLimit(runner.retry);

  for (let attempt = 1; pending.length > 0; attempt++) {
    const finalAttempt = attempt >= maxAttempts;
    let effects: EffectResults;
    try {
      effects = await invoke(pending);
    } catch (error) {
      const thrown: Record<string, EffectResult> = {};
      for (const item of pending) {
        thrown[item] = { status: 'failed', error };
      }
      effects = thrown;
    }

    const retryable: string[] = [];
    let retryAfterMs: number | null = null;

    for (const item of pending) {
      const effect: EffectResult = effects[item] ?? {
        status: 'failed',
        error: new Error(`No result reported for ${action} ${item}`),
      };

      if (effect.status === 'failed' && !finalAttempt) {
        const classified = classifyPlatformError(effect.error);
        if (classified.kind === 'transient') {
          retryable.push(item);
          const itemRetryAfterMs = retryAfterOf(classified);
          if (itemRetryAfterMs !== null) {
            retryAfterMs = Math.max(retryAfterMs ?? 0, itemRetryAfterMs);
          }
          continue;
        }
      }

      const outcome = toOutcome(action, item, attempt, effect);
      if (outcome.result.status === 'failed') {
        runner.logger.warn(
          { action, target: item, attempts: attempt, kind: outcome.result.kind, reason: outcome.result.message },
          'Action failed',
        );
      }
      settled.set(item, outcome);
    }

    if (retryable.length > 0) {
      await backOff(runner, attempt, retryAfterMs, { action, targets: retryable });
    }

    pending = retryable;
  }

  return items.flatMap((item) => {
    const outcome = settled.get(item);
    return outcome ? [outcome] : [];
  });
}

function single(key: string, effect: () => Promise<EffectResult>): InvokeEffects {
  return async () => ({ [key]: await effect() });
}

function skipped(action: ActionKind, target: string, reason: string): ActionOutcome {
  return { action, target, attempts: 0, result: { status: 'skipped', reason } };
}

export function summarizeOutcome(deliveryId: string, actions: readonly ActionOutcome[]): DispatchOutcome {
  const count = (status: ActionOutcome['result']['status']) =>
    actions.filter((outcome) => outcome.result.status === status).length;

  return {
    deliveryId,
    actions,
    applied: count('applied'),
    skipped: count('skipped'),
    failed: count('failed'),
  };
}

/**
 * Executes a plan in a fixed order: labels-remove, labels-add, assignees,
 * reviewer requests, status check, issue state, comment. The comment goes
 * last so it is only posted after the effects it describes were attempted.
 */
export async function dispatch(
  plan: ActionPlan,
  capability: PlatformCapability,
  target: DispatchTarget,
  options: DispatchOptions,
): Promise<DispatchOutcome> {
  const runner: RetryRunner = {
    retry: options.retry ?? DEFAULT_RETRY_POLICY,
    logger: options.logger,
    sleep: options.sleep ?? defaultSleep,
  };
  const issue = target.issue;
  const actions: ActionOutcome[] = [];

  actions.push(
    ...(await runAction(
      'label-remove',
      plan.labelsToRemove,
      async (labels) => (await capability.applyLabels(issue, [], labels)).removed,
      runner,
    )),
  );

  actions.push(
    ...(await runAction(
      'label-add',
      plan.labelsToAdd,
      async (labels) => (await capability.applyLabels(issue, labels, [])).added,
      runner,
    )),
  );

  actions.push(
    ...(await runAction(
      'assignee',
      plan.assigneesToAdd,
      (assignees) => capability.addAssignees(issue, assignees),
      runner,
    )),
  );

  actions.push(
    ...(await runAction(
      'reviewer',
      plan.reviewersToRequest,
      (reviewers) => capability.requestReviewers(issue, reviewers),
      runner,
    )),
  );

  const statusCheck = plan.statusCheck;
  if (statusCheck) {
    const commit = target.commit;
    if (commit) {
      actions.push(
        ...(await runAction(
          'status-check',
          [statusCheck.context],
          single(statusCheck.context, () => capability.setStatusCheck(commit, statusCheck)),
          runner,
        )),
      );
    } else {
      actions.push(skipped('status-check', statusCheck.context, 'no-commit'));
    }
  }

  const issueState = plan.issueState;
  if (issueState) {
    actions.push(
      ...(await runAction(
        'issue-state',
        [issueState],
        single(issueState, () => capability.closeOrReopen(issue, issueState)),
        runner,
      )),
    );
  }

  const { commentKey, commentBody } = plan;
  if (commentKey && commentBody) {
    actions.push(
      ...(await runAction(
        'comment',
        [commentKey],
        single(commentKey, () => capability.postComment(issue, commentKey, commentBody)),
        runner,
      )),
    );
  }

  return summarizeOutcome(target.deliveryId, actions);
}
