'use strict';

import {
  ISSUE_CLASSIFIERS,
  PULL_REQUEST_CLASSIFIERS,
  executeClassifiers,
} from './classifiers/registry';
import type {
  Classifier,
  ClassifierContext,
  ClassifierId,
  OnClassifierError,
  PullRequestInput,
} from './classifiers/registry';
import { parseCommandLine } from './commands';
import type { BotEvent, Command, CommandRejection, Finding } from './types';

export interface RouteOptions {
  readonly classifierContext: ClassifierContext;
  readonly securityScanning: boolean;
  readonly ownershipReviewers: boolean;
  readonly onClassifierError?: OnClassifierError;
}

export type RouterResult =
  | {
      type: 'findings';
      scope: 'pull-request' | 'issue';
      findings: readonly Finding[];
      failedClassifiers: readonly ClassifierId[];
      welcomeCandidate: boolean;
      securityScanned: boolean;
    }
  | { type: 'command'; command: Command; commentKey: string }
  | { type: 'command-rejected'; rejection: CommandRejection; commentKey: string }
  | { type: 'merged' }
  | { type: 'skipped'; reason: string };

export function selectPullRequestClassifiers(
  options: Pick<RouteOptions, 'securityScanning' | 'ownershipReviewers'>,
): Classifier<PullRequestInput>[] {
  return PULL_REQUEST_CLASSIFIERS.filter((classifier) => {
    if (classifier.id === 'security') {
      return options.securityScanning;
    }

    if (classifier.id === 'ownership') {
      return options.ownershipReviewers;
    }

    return true;
  });
}

function routeCommandText(body: string, invoker: string, commentKey: string): RouterResult {
  const parsed = parseCommandLine(body, invoker);
  switch (parsed.status) {
    case 'parsed':
      return { type: 'command', command: parsed.command, commentKey };
    case 'rejected':
      return { type: 'command-rejected', rejection: parsed.rejection, commentKey };
    default:
      return { type: 'skipped', reason: 'no-command' };
  }
}

/**
 * Decides what an event is worth. Commands are exclusive of passive
 * classification: a comment or review that carries one never runs the
 * classifiers.
 */
export function route(event: BotEvent, options: RouteOptions): RouterResult {
  const kind: string = event.kind;

  switch (event.kind) {
    case 'PullRequestOpened':
    case 'PullRequestUpdated': {
      const { files } = event.pullRequest;
      if (files === null) {
        return { type: 'skipped', reason: 'files-not-hydrated' };
      }

      const { findings, failedClassifiers } = executeClassifiers({
        classifiers: selectPullRequestClassifiers(options),
        input: { files },
        context: options.classifierContext,
        onClassifierError: options.onClassifierError,
      });

      return {
        type: 'findings',
        scope: 'pull-request',
        findings,
        failedClassifiers,
        welcomeCandidate: event.kind === 'PullRequestOpened',
        securityScanned: options.securityScanning,
      };
    }

    case 'PullRequestMerged':
      return { type: 'merged' };

    case 'IssueOpened': {
      const { findings, failedClassifiers } = executeClassifiers({
        classifiers: ISSUE_CLASSIFIERS,
        input: { title: event.issue.title, body: event.issue.body },
        context: options.classifierContext,
        onClassifierError: options.onClassifierError,
      });

      return {
        type: 'findings',
        scope: 'issue',
        findings,
        failedClassifiers,
        welcomeCandidate: false,
        securityScanned: false,
      };
    }

    case 'IssueCommentCreated':
      return routeCommandText(event.comment.body, event.actor, `command:${event.comment.id}`);

    case 'PullRequestReviewSubmitted':
      if (!event.review.body) {
        return { type: 'skipped', reason: 'empty-review-body' };
      }

      return routeCommandText(event.review.body, event.actor, `command:review-${event.review.id}`);

    default:
      return { type: 'skipped', reason: `unsupported-event:${kind}` };
  }
}
