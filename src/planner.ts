'use strict';

import { analyzePullRequest, checkPullRequestRequirements, suggestIssueImprovements } from './analysis';
import { SIZE_LABELS } from './classifiers/size';
import {
  JOKES,
  MOTIVATIONAL_QUOTES,
  buildAnalysisSection,
  buildChangelogComment,
  buildHelpComment,
  buildIssueSuggestionsComment,
  buildMergedThanksComment,
  buildRejectionComment,
  buildRequirementsSection,
  buildSecuritySection,
  buildWelcomeSection,
  pickFromPool,
} from './comments';
import { sortedUnique } from './core/utils';
import type { RouterResult } from './router';
import type {
  ActionPlan,
  BotEvent,
  Command,
  Finding,
  IssueState,
  MergedPullRequest,
  StatusCheck,
} from './types';

export const SECURITY_STATUS_CONTEXT = 'security-scan';
export const MERGED_THANKS_KEY = 'merged-thanks';
export const CHANGELOG_LIMIT = 10;
export const ISSUE_SUGGESTIONS_KEY = 'issue-suggestions';

const REPORT_SEPARATOR = '\n\n---\n\n';

export interface PlanContext {
  readonly event: BotEvent;
  readonly maxReviewers: number;
  /** First-time contributor with no welcome posted yet. */
  readonly welcome: boolean;
  readonly recentMerges: readonly MergedPullRequest[];
}

interface PlanFields {
  labelsToAdd?: readonly string[];
  labelsToRemove?: readonly string[];
  reviewersToRequest?: readonly string[];
  assigneesToAdd?: readonly string[];
  issueState?: IssueState | null;
  statusCheck?: StatusCheck | null;
  commentKey?: string | null;
  commentBody?: string | null;
}

// Fixed key order and sorted sets: equal inputs serialize to identical plans.
function buildPlan(fields: PlanFields = {}): ActionPlan {
  return {
    labelsToAdd: sortedUnique(fields.labelsToAdd ?? []),
    labelsToRemove: sortedUnique(fields.labelsToRemove ?? []),
    reviewersToRequest: sortedUnique(fields.reviewersToRequest ?? []),
    assigneesToAdd: sortedUnique(fields.assigneesToAdd ?? []),
    issueState: fields.issueState ?? null,
    statusCheck: fields.statusCheck ?? null,
    commentKey: fields.commentBody ? (fields.commentKey ?? null) : null,
    commentBody: fields.commentKey ? (fields.commentBody ?? null) : null,
  };
}

export function emptyPlan(): ActionPlan {
  return buildPlan();
}

export function isEmptyPlan(plan: ActionPlan): boolean {
  return (
    plan.labelsToAdd.length === 0 &&
    plan.labelsToRemove.length === 0 &&
    plan.reviewersToRequest.length === 0 &&
    plan.assigneesToAdd.length === 0 &&
    plan.issueState === null &&
    plan.statusCheck === null &&
    plan.commentBody === null
  );
}

function collectLabels(findings: readonly Finding[]): string[] {
  const labels: string[] = [];
  for (const finding of findings) {
    if (finding.label) {
      labels.push(finding.label);
    }
  }

  return labels;
}

export function selectReviewers(findings: readonly Finding[], author: string, maxReviewers: number): string[] {
  const authorLogin = author.toLowerCase();
  const owners = findings
    .filter((finding) => finding.category === 'ownership')
    .map((finding) => finding.value)
    .filter((owner) => owner.toLowerCase() !== authorLogin);

  return sortedUnique(owners).slice(0, Math.max(0, maxReviewers));
}

export function buildSecurityStatus(
  findings: readonly Finding[],
  securityFailed: boolean,
): StatusCheck {
  if (securityFailed) {
    return { context: SECURITY_STATUS_CONTEXT, state: 'error', description: 'Security scan failed' };
  }

  const securityFindings = findings.filter((finding) => finding.category === 'security');
  const hasCritical = securityFindings.some((finding) => finding.severity === 'critical');
  const description =
    securityFindings.length > 0 ? `${securityFindings.length} issue(s) found` : 'No issues found';

  return {
    context: SECURITY_STATUS_CONTEXT,
    state: hasCritical ? 'failure' : 'success',
    description,
  };
}

function planFindings(result: Extract<RouterResult, { type: 'findings' }>, context: PlanContext): ActionPlan {
  const { event } = context;
  const labelsToAdd = collectLabels(result.findings);

  if (event.kind === 'IssueOpened') {
    const suggestions = suggestIssueImprovements(event.issue.title, event.issue.body);
    return buildPlan({
      labelsToAdd,
      commentKey: ISSUE_SUGGESTIONS_KEY,
      commentBody: suggestions.length > 0 ? buildIssueSuggestionsComment(suggestions) : null,
    });
  }

  if (result.scope === 'issue' || (event.kind !== 'PullRequestOpened' && event.kind !== 'PullRequestUpdated')) {
    return buildPlan({ labelsToAdd });
  }

  const pullRequest = event.pullRequest;
  const hasSizeLabel = labelsToAdd.some((label) => SIZE_LABELS.includes(label));
  const labelsToRemove = hasSizeLabel ? SIZE_LABELS.filter((label) => !labelsToAdd.includes(label)) : [];

  const securityFindings = result.findings.filter((finding) => finding.category === 'security');
  const sections: string[] = [];

  // Summary and requirements are posted once, when the pull request opens.
  const files = pullRequest.files ?? [];
  if (event.kind === 'PullRequestOpened' && files.length > 0) {
    const languages = result.findings
      .filter((finding) => finding.category === 'language')
      .map((finding) => finding.value);
    sections.push(buildAnalysisSection(analyzePullRequest(files, languages)));

    const gaps = checkPullRequestRequirements(files);
    if (gaps.length > 0) {
      sections.push(buildRequirementsSection(gaps));
    }
  }

  if (securityFindings.length > 0) {
    sections.push(buildSecuritySection(securityFindings));
  }

  if (context.welcome) {
    sections.push(buildWelcomeSection(pullRequest.author));
  }

  return buildPlan({
    labelsToAdd,
    labelsToRemove,
    reviewersToRequest: selectReviewers(result.findings, pullRequest.author, context.maxReviewers),
    statusCheck: result.securityScanned
      ? buildSecurityStatus(result.findings, result.failedClassifiers.includes('security'))
      : null,
    commentKey: `pr-report:${pullRequest.headSha}`,
    commentBody: sections.length > 0 ? sections.join(REPORT_SEPARATOR) : null,
  });
}

export function planCommand(command: Command, commentKey: string, context: PlanContext): ActionPlan {
  switch (command.name) {
    case 'help':
      return buildPlan({ commentKey, commentBody: buildHelpComment() });

    case 'assign': {
      const login = command.args[0].replace(/^@/, '');
      return buildPlan({ assigneesToAdd: [login], commentKey, commentBody: `✅ Assigned to @${login}` });
    }

    case 'label': {
      const label = command.args[0];
      return buildPlan({ labelsToAdd: [label], commentKey, commentBody: `🏷️ Added label: \`${label}\`` });
    }

    case 'close':
      return buildPlan({ issueState: 'closed', commentKey, commentBody: `🔒 Closed by @${command.invoker}` });

    case 'reopen':
      return buildPlan({ issueState: 'open', commentKey, commentBody: `🔓 Reopened by @${command.invoker}` });

    case 'changelog':
      return buildPlan({
        commentKey,
        commentBody: buildChangelogComment(context.recentMerges.slice(0, CHANGELOG_LIMIT)),
      });

    case 'joke':
      return buildPlan({ commentKey, commentBody: `😄 ${pickFromPool(JOKES, commentKey)}` });

    case 'motivate':
      return buildPlan({ commentKey, commentBody: `💪 ${pickFromPool(MOTIVATIONAL_QUOTES, commentKey)}` });
  }
}

/**
 * Turns a routing decision into the set of effects it authorizes. Pure: the
 * pipeline gathers every platform fact (first-time contributor, recent
 * merges) before calling this.
 */
export function planActions(result: RouterResult, context: PlanContext): ActionPlan {
  switch (result.type) {
    case 'findings':
      return planFindings(result, context);
    case 'command':
      return planCommand(result.command, result.commentKey, context);
    case 'command-rejected':
      return buildPlan({ commentKey: result.commentKey, commentBody: buildRejectionComment(result.rejection) });
    case 'merged':
      if (context.event.kind !== 'PullRequestMerged') {
        return emptyPlan();
      }

      return buildPlan({
        commentKey: MERGED_THANKS_KEY,
        commentBody: buildMergedThanksComment(context.event.pullRequest.author),
      });
    case 'skipped':
      return emptyPlan();
  }
}
