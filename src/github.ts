'use strict';

import { detectLanguage } from './classifiers/language';
import { commentMarker } from './comments';
import { normalizePath, withTimeout } from './core/utils';
import { isHttpStatus } from './errors';
import { getDefaultTaxonomy } from './taxonomy';
import type { Taxonomy } from './taxonomy';
import type {
  ChangedFile,
  CommitTarget,
  EffectResult,
  GithubClient,
  GithubCombinedStatus,
  GithubIssue,
  GithubIssueComment,
  GithubLabel,
  GithubPullRequest,
  GithubPullRequestFile,
  GithubRequestedReviewers,
  GithubSearchResult,
  IssueState,
  IssueTarget,
  MergedPullRequest,
  PlatformCapability,
  RepositoryParams,
  RepositoryRef,
  StatusCheck,
} from './types';

type RequestMethod = (route: string, params: Record<string, unknown>) => Promise<{ data: unknown }>;

const MAX_PAGES = 100;

export function createFallbackPaginate(): GithubClient['paginate'] {
  return async function fallbackPaginate<TParams extends object, TItem>(
    route: (params: TParams) => Promise<{ data: TItem[] }>,
    params: TParams,
  ): Promise<TItem[]> {
    const results: TItem[] = [];
    const requestedPerPage: unknown = Reflect.get(params, 'per_page');
    const requestedPage: unknown = Reflect.get(params, 'page');
    const perPage = typeof requestedPerPage === 'number' ? requestedPerPage : 100;
    let page = typeof requestedPage === 'number' ? requestedPage : 1;

    for (let fetched = 0; fetched < MAX_PAGES; fetched++) {
      const response = await route({ ...params, per_page: perPage, page });
      if (!response || !Array.isArray(response.data)) {
        return results;
      }

      results.push(...response.data);
      if (response.data.length < perPage) {
        return results;
      }

      page += 1;
    }

    return results;
  };
}

function hasRequestMethod(value: unknown): value is { request: RequestMethod } {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, 'request') === 'function';
}

/**
 * Installation clients from `@octokit/app` only guarantee `request`; the REST
 * surface the bot needs is rebuilt on top of it.
 */
export function createRestCompatClient(octokit: unknown): GithubClient {
  if (!hasRequestMethod(octokit)) {
    throw new Error('Octokit request client is unavailable for webhook event.');
  }

  const request: RequestMethod = octokit.request.bind(octokit);
  const requestRoute = <TData>(route: string, params: object): Promise<{ data: TData }> =>
    request(route, { ...params }) as Promise<{ data: TData }>;

  return {
    rest: {
      pulls: {
        list: (params) => requestRoute<GithubPullRequest[]>('GET /repos/{owner}/{repo}/pulls', params),
        listFiles: (params) =>
          requestRoute<GithubPullRequestFile[]>('GET /repos/{owner}/{repo}/pulls/{pull_number}/files', params),
        listRequestedReviewers: (params) =>
          requestRoute<GithubRequestedReviewers>(
            'GET /repos/{owner}/{repo}/pulls/{pull_number}/requested_reviewers',
            params,
          ),
        requestReviewers: (params) =>
          requestRoute<unknown>('POST /repos/{owner}/{repo}/pulls/{pull_number}/requested_reviewers', params),
      },
      issues: {
        get: (params) => requestRoute<GithubIssue>('GET /repos/{owner}/{repo}/issues/{issue_number}', params),
        update: (params) => requestRoute<unknown>('PATCH /repos/{owner}/{repo}/issues/{issue_number}', params),
        listLabelsOnIssue: (params) =>
          requestRoute<GithubLabel[]>('GET /repos/{owner}/{repo}/issues/{issue_number}/labels', params),
        addLabels: (params) =>
          requestRoute<unknown>('POST /repos/{owner}/{repo}/issues/{issue_number}/labels', params),
        removeLabel: (params) =>
          requestRoute<unknown>('DELETE /repos/{owner}/{repo}/issues/{issue_number}/labels/{name}', params),
        addAssignees: (params) =>
          requestRoute<unknown>('POST /repos/{owner}/{repo}/issues/{issue_number}/assignees', params),
        listComments: (params) =>
          requestRoute<GithubIssueComment[]>('GET /repos/{owner}/{repo}/issues/{issue_number}/comments', params),
        createComment: (params) =>
          requestRoute<unknown>('POST /repos/{owner}/{repo}/issues/{issue_number}/comments', params),
      },
      repos: {
        createCommitStatus: (params) => requestRoute<unknown>('POST /repos/{owner}/{repo}/statuses/{sha}', params),
        getCombinedStatusForRef: (params) =>
          requestRoute<GithubCombinedStatus>('GET /repos/{owner}/{repo}/commits/{ref}/status', params),
      },
      search: {
        issuesAndPullRequests: (params) => requestRoute<GithubSearchResult>('GET /search/issues', params),
      },
    },
    paginate: createFallbackPaginate(),
  };
}

/**
 * Content of the `+` lines of a unified diff, without the marker. A `+++`
 * line is a file header only before the first `@@` hunk.
 */
export function extractAddedLines(patch: string | null | undefined): string[] {
  if (!patch) {
    return [];
  }

  const added: string[] = [];
  let inHunk = false;
  for (const line of patch.split('\n')) {
    if (line.startsWith('@@')) {
      inHunk = true;
    } else if (line.startsWith('+') && (inHunk || !line.startsWith('+++'))) {
      added.push(line.slice(1));
    }
  }

  return added;
}

export function toChangedFile(
  file: GithubPullRequestFile,
  taxonomy: Pick<Taxonomy, 'languages' | 'shebangs'>,
): ChangedFile {
  const path = normalizePath(file.filename);
  const addedLines = extractAddedLines(file.patch);
  return {
    path,
    additions: file.additions ?? 0,
    deletions: file.deletions ?? 0,
    language: detectLanguage(path, addedLines, taxonomy),
    addedLines,
  };
}

function toRepositoryParams(repository: RepositoryRef): RepositoryParams {
  return { owner: repository.owner, repo: repository.name };
}

function sameLogin(a: string | null | undefined, b: string): boolean {
  return (a ?? '').toLowerCase() === b.toLowerCase();
}

export interface GithubCapabilityOptions {
  taxonomy?: Taxonomy;
  timeoutMs?: number;
}

/**
 * Platform capability over the REST API. Every mutation first reads the
 * current state so that repeating it reports `unchanged` instead of failing or
 * duplicating.
 */
export function createGithubCapability(
  github: GithubClient,
  { taxonomy = getDefaultTaxonomy(), timeoutMs = 10_000 }: GithubCapabilityOptions = {},
): PlatformCapability {
  const call = <TValue>(operation: () => Promise<TValue>): Promise<TValue> => withTimeout(operation(), timeoutMs);

  const settle = async (operation: () => Promise<unknown>): Promise<EffectResult> => {
    try {
      await call(operation);
      return { status: 'applied' };
    } catch (error) {
      return { status: 'failed', error };
    }
  };

  const listComments = (target: IssueTarget) =>
    call(() =>
      github.paginate(github.rest.issues.listComments, {
        ...toRepositoryParams(target.repository),
        issue_number: target.number,
        per_page: 100,
      }),
    );

  const hasBotComment = async (target: IssueTarget, key: string): Promise<boolean> => {
    const marker = commentMarker(key);
    const comments = await listComments(target);
    return comments.some((comment) => typeof comment.body === 'string' && comment.body.includes(marker));
  };

  return {
    async fetchChangedFiles(target: IssueTarget): Promise<ChangedFile[]> {
      const files = await call(() =>
        github.paginate(github.rest.pulls.listFiles, {
          ...toRepositoryParams(target.repository),
          pull_number: target.number,
          per_page: 100,
        }),
      );

      return files.map((file) => toChangedFile(file, taxonomy));
    },

    async fetchPriorContribution(actor: string, repository: RepositoryRef): Promise<boolean> {
      const { data } = await call(() =>
        github.rest.search.issuesAndPullRequests({
          q: `repo:${repository.owner}/${repository.name} is:pr is:merged author:${actor}`,
          per_page: 1,
        }),
      );

      return data.total_count > 0;
    },

    hasBotComment,

    async fetchRecentMerges(repository: RepositoryRef, limit: number): Promise<MergedPullRequest[]> {
      const { data } = await call(() =>
        github.rest.pulls.list({
          ...toRepositoryParams(repository),
          state: 'closed',
          sort: 'updated',
          direction: 'desc',
          per_page: Math.min(100, Math.max(20, limit * 2)),
        }),
      );

      const merges: MergedPullRequest[] = [];
      for (const pullRequest of data) {
        if (!pullRequest.merged_at) {
          continue;
        }

        merges.push({
          number: pullRequest.number,
          title: pullRequest.title ?? '',
          author: pullRequest.user?.login ?? 'ghost',
          mergedAt: pullRequest.merged_at,
        });
        if (merges.length >= limit) {
          break;
        }
      }

      return merges;
    },

    async applyLabels(target: IssueTarget, add: readonly string[], remove: readonly string[]) {
      const params = { ...toRepositoryParams(target.repository), issue_number: target.number };
      const current = await call(() =>
        github.paginate(github.rest.issues.listLabelsOnIssue, { ...params, per_page: 100 }),
      );
      const present = new Set(current.map((label) => label.name ?? ''));

      const removed: Record<string, EffectResult> = {};
      for (const name of remove) {
        if (!present.has(name)) {
          removed[name] = { status: 'unchanged', reason: 'label-not-present' };
          continue;
        }

        const result = await settle(() => github.rest.issues.removeLabel({ ...params, name }));
        removed[name] =
          result.status === 'failed' && isHttpStatus(result.error, 404)
            ? { status: 'unchanged', reason: 'label-not-present' }
            : result;
      }

      const added: Record<string, EffectResult> = {};
      for (const name of add) {
        added[name] = present.has(name)
          ? { status: 'unchanged', reason: 'label-already-present' }
          : await settle(() => github.rest.issues.addLabels({ ...params, labels: [name] }));
      }

      return { added, removed };
    },

    async addAssignees(target: IssueTarget, assignees: readonly string[]) {
      const params = { ...toRepositoryParams(target.repository), issue_number: target.number };
      const { data: issue } = await call(() => github.rest.issues.get(params));
      const assigned = (issue.assignees ?? []).map((user) => user.login ?? '');

      const results: Record<string, EffectResult> = {};
      for (const login of assignees) {
        results[login] = assigned.some((existing) => sameLogin(existing, login))
          ? { status: 'unchanged', reason: 'already-assigned' }
          : await settle(() => github.rest.issues.addAssignees({ ...params, assignees: [login] }));
      }

      return results;
    },

    async requestReviewers(target: IssueTarget, reviewers: readonly string[]) {
      const params = { ...toRepositoryParams(target.repository), pull_number: target.number };
      const { data } = await call(() => github.rest.pulls.listRequestedReviewers(params));
      const requested = (data.users ?? []).map((user) => user.login ?? '');

      const results: Record<string, EffectResult> = {};
      for (const login of reviewers) {
        results[login] = requested.some((existing) => sameLogin(existing, login))
          ? { status: 'unchanged', reason: 'already-requested' }
          : await settle(() => github.rest.pulls.requestReviewers({ ...params, reviewers: [login] }));
      }

      return results;
    },

    async postComment(target: IssueTarget, key: string, body: string): Promise<EffectResult> {
      if (await hasBotComment(target, key)) {
        return { status: 'unchanged', reason: 'comment-already-posted' };
      }

      await call(() =>
        github.rest.issues.createComment({
          ...toRepositoryParams(target.repository),
          issue_number: target.number,
          body: `${commentMarker(key)}\n${body}`,
        }),
      );
      return { status: 'applied' };
    },

    async setStatusCheck(target: CommitTarget, check: StatusCheck): Promise<EffectResult> {
      const params = toRepositoryParams(target.repository);
      const { data } = await call(() => github.rest.repos.getCombinedStatusForRef({ ...params, ref: target.sha }));
      const existing = (data.statuses ?? []).find((status) => status.context === check.context);
      if (existing && existing.state === check.state && (existing.description ?? '') === check.description) {
        return { status: 'unchanged', reason: 'status-unchanged' };
      }

      await call(() =>
        github.rest.repos.createCommitStatus({
          ...params,
          sha: target.sha,
          state: check.state,
          context: check.context,
          description: check.description,
        }),
      );
      return { status: 'applied' };
    },

    async closeOrReopen(target: IssueTarget, state: IssueState): Promise<EffectResult> {
      const params = { ...toRepositoryParams(target.repository), issue_number: target.number };
      const { data: issue } = await call(() => github.rest.issues.get(params));
      if (issue.state === state) {
        return { status: 'unchanged', reason: `already-${state}` };
      }

      await call(() => github.rest.issues.update({ ...params, state }));
      return { status: 'applied' };
    },
  };
}
