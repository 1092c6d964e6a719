'use strict';

export type EnvMap = NodeJS.ProcessEnv | Record<string, string | undefined>;

// GitHub REST shapes. Only the fields the bot reads are modelled.

export interface GithubLabel {
  name?: string | null;
}

export interface GithubUser {
  login?: string | null;
  type?: string | null;
}

export interface GithubPullRequest {
  number: number;
  title?: string | null;
  html_url?: string | null;
  merged_at?: string | null;
  user?: GithubUser | null;
}

export interface GithubPullRequestFile {
  filename: string;
  status?: string;
  additions?: number;
  deletions?: number;
  patch?: string | null;
}

export interface GithubIssue {
  number: number;
  state?: string | null;
  labels?: Array<GithubLabel | string> | null;
  assignees?: GithubUser[] | null;
}

export interface GithubIssueComment {
  id: number;
  body?: string | null;
}

export interface GithubRequestedReviewers {
  users?: GithubUser[] | null;
}

export interface GithubCommitStatus {
  context: string;
  state: string;
  description?: string | null;
}

export interface GithubCombinedStatus {
  statuses?: GithubCommitStatus[] | null;
}

export interface GithubSearchResult {
  total_count: number;
}

export interface RepositoryParams {
  owner: string;
  repo: string;
}

export interface PullNumberParams extends RepositoryParams {
  pull_number: number;
}

export interface PullListParams extends RepositoryParams {
  state: string;
  sort?: string;
  direction?: string;
  per_page?: number;
  page?: number;
}

export interface PullListFilesParams extends PullNumberParams {
  per_page?: number;
  page?: number;
}

export interface RequestReviewersParams extends PullNumberParams {
  reviewers: string[];
}

export interface IssueNumberParams extends RepositoryParams {
  issue_number: number;
}

export interface AddLabelsParams extends IssueNumberParams {
  labels: string[];
}

export interface RemoveLabelParams extends IssueNumberParams {
  name: string;
}

export interface AddAssigneesParams extends IssueNumberParams {
  assignees: string[];
}

export interface UpdateIssueParams extends IssueNumberParams {
  state: IssueState;
}

export interface CreateCommentParams extends IssueNumberParams {
  body: string;
}

export interface CreateCommitStatusParams extends RepositoryParams {
  sha: string;
  state: StatusState;
  context: string;
  description: string;
}

export interface RefParams extends RepositoryParams {
  ref: string;
}

export interface SearchIssuesParams {
  q: string;
  per_page?: number;
}

export type PaginatedRoute<TParams extends object, TItem> = (
  params: TParams,
) => Promise<{ data: TItem[] }>;

export interface GithubRestPulls {
  list: (params: PullListParams) => Promise<{ data: GithubPullRequest[] }>;
  listFiles: (params: PullListFilesParams) => Promise<{ data: GithubPullRequestFile[] }>;
  listRequestedReviewers: (params: PullNumberParams) => Promise<{ data: GithubRequestedReviewers }>;
  requestReviewers: (params: RequestReviewersParams) => Promise<unknown>;
}

export interface GithubRestIssues {
  get: (params: IssueNumberParams) => Promise<{ data: GithubIssue }>;
  update: (params: UpdateIssueParams) => Promise<unknown>;
  listLabelsOnIssue: (
    params: IssueNumberParams & { per_page?: number; page?: number },
  ) => Promise<{ data: GithubLabel[] }>;
  addLabels: (params: AddLabelsParams) => Promise<unknown>;
  removeLabel: (params: RemoveLabelParams) => Promise<unknown>;
  addAssignees: (params: AddAssigneesParams) => Promise<unknown>;
  listComments: (params: IssueNumberParams & { per_page?: number; page?: number }) => Promise<{
    data: GithubIssueComment[];
  }>;
  createComment: (params: CreateCommentParams) => Promise<unknown>;
}

export interface GithubRestRepos {
  createCommitStatus: (params: CreateCommitStatusParams) => Promise<unknown>;
  getCombinedStatusForRef: (params: RefParams) => Promise<{ data: GithubCombinedStatus }>;
}

export interface GithubRestSearch {
  issuesAndPullRequests: (params: SearchIssuesParams) => Promise<{ data: GithubSearchResult }>;
}

export interface GithubClient {
  rest: {
    pulls: GithubRestPulls;
    issues: GithubRestIssues;
    repos: GithubRestRepos;
    search: GithubRestSearch;
  };
  paginate: <TParams extends object, TItem>(
    route: PaginatedRoute<TParams, TItem>,
    params: TParams,
  ) => Promise<TItem[]>;
}

// Pipeline domain.

export interface RepositoryRef {
  owner: string;
  name: string;
}

/** An issue or pull request; pull requests share the issue number space. */
export interface IssueTarget {
  repository: RepositoryRef;
  number: number;
}

export interface CommitTarget {
  repository: RepositoryRef;
  sha: string;
}

export interface ChangedFile {
  readonly path: string;
  readonly additions: number;
  readonly deletions: number;
  /** Detected from the extension, or the shebang of the first added line. */
  readonly language: string | null;
  readonly addedLines: readonly string[];
}

export interface PullRequestDetails {
  readonly number: number;
  readonly title: string;
  readonly body: string;
  readonly headSha: string;
  readonly author: string;
  /** `null` until the pipeline has fetched the changed files. */
  readonly files: readonly ChangedFile[] | null;
}

interface EventBase {
  readonly deliveryId: string;
  readonly repository: RepositoryRef;
  readonly actor: string;
  readonly timestamp: string;
}

export interface PullRequestOpenedEvent extends EventBase {
  readonly kind: 'PullRequestOpened';
  readonly pullRequest: PullRequestDetails;
}

export interface PullRequestUpdatedEvent extends EventBase {
  readonly kind: 'PullRequestUpdated';
  readonly pullRequest: PullRequestDetails;
}

export interface PullRequestMergedEvent extends EventBase {
  readonly kind: 'PullRequestMerged';
  readonly pullRequest: {
    readonly number: number;
    readonly title: string;
    readonly author: string;
  };
}

export interface IssueOpenedEvent extends EventBase {
  readonly kind: 'IssueOpened';
  readonly issue: {
    readonly number: number;
    readonly title: string;
    readonly body: string;
  };
}

export interface IssueCommentCreatedEvent extends EventBase {
  readonly kind: 'IssueCommentCreated';
  readonly issue: {
    readonly number: number;
    readonly isPullRequest: boolean;
  };
  readonly comment: {
    readonly id: number;
    readonly body: string;
  };
}

export interface PullRequestReviewSubmittedEvent extends EventBase {
  readonly kind: 'PullRequestReviewSubmitted';
  readonly pullRequest: {
    readonly number: number;
  };
  readonly review: {
    readonly id: number;
    readonly state: string;
    readonly body: string | null;
  };
}

export type BotEvent =
  | PullRequestOpenedEvent
  | PullRequestUpdatedEvent
  | PullRequestMergedEvent
  | IssueOpenedEvent
  | IssueCommentCreatedEvent
  | PullRequestReviewSubmittedEvent;

export type PullRequestEvent = PullRequestOpenedEvent | PullRequestUpdatedEvent;

export type FindingCategory =
  | 'language'
  | 'size'
  | 'security'
  | 'priority'
  | 'classification'
  | 'ownership';

export type Severity = 'info' | 'warn' | 'critical';

export interface Finding {
  readonly category: FindingCategory;
  readonly severity: Severity;
  readonly value: string;
  /** Derived from category and value; `null` for findings that never become labels. */
  readonly label: string | null;
  readonly file: string | null;
  readonly evidence: string | null;
}

export type CommandName =
  | 'help'
  | 'assign'
  | 'label'
  | 'close'
  | 'reopen'
  | 'changelog'
  | 'joke'
  | 'motivate';

export interface Command {
  readonly name: CommandName;
  readonly args: readonly string[];
  readonly invoker: string;
}

export type CommandRejectionReason = 'unknown-command' | 'invalid-arguments';

export interface CommandRejection {
  readonly name: string;
  readonly reason: CommandRejectionReason;
}

export type IssueState = 'open' | 'closed';

export type StatusState = 'success' | 'failure' | 'error' | 'pending';

export interface StatusCheck {
  readonly context: string;
  readonly state: StatusState;
  readonly description: string;
}

/** Set-valued fields are sorted and de-duplicated. */
export interface ActionPlan {
  readonly labelsToAdd: readonly string[];
  readonly labelsToRemove: readonly string[];
  readonly reviewersToRequest: readonly string[];
  readonly assigneesToAdd: readonly string[];
  readonly issueState: IssueState | null;
  readonly statusCheck: StatusCheck | null;
  readonly commentKey: string | null;
  readonly commentBody: string | null;
}

export interface MergedPullRequest {
  readonly number: number;
  readonly title: string;
  readonly author: string;
  readonly mergedAt: string;
}

export type EffectResult =
  | { status: 'applied' }
  | { status: 'unchanged'; reason: string }
  | { status: 'failed'; error: unknown };

export type EffectResults = Readonly<Record<string, EffectResult>>;

export interface LabelEffects {
  added: EffectResults;
  removed: EffectResults;
}

/** Everything the pipeline needs from the hosting platform. */
export interface PlatformCapability {
  fetchChangedFiles: (target: IssueTarget) => Promise<ChangedFile[]>;
  fetchPriorContribution: (actor: string, repository: RepositoryRef) => Promise<boolean>;
  hasBotComment: (target: IssueTarget, key: string) => Promise<boolean>;
  fetchRecentMerges: (repository: RepositoryRef, limit: number) => Promise<MergedPullRequest[]>;
  applyLabels: (
    target: IssueTarget,
    add: readonly string[],
    remove: readonly string[],
  ) => Promise<LabelEffects>;
  addAssignees: (target: IssueTarget, assignees: readonly string[]) => Promise<EffectResults>;
  requestReviewers: (target: IssueTarget, reviewers: readonly string[]) => Promise<EffectResults>;
  postComment: (target: IssueTarget, key: string, body: string) => Promise<EffectResult>;
  setStatusCheck: (target: CommitTarget, check: StatusCheck) => Promise<EffectResult>;
  closeOrReopen: (target: IssueTarget, state: IssueState) => Promise<EffectResult>;
}

export type ActionKind =
  | 'label-remove'
  | 'label-add'
  | 'assignee'
  | 'reviewer'
  | 'status-check'
  | 'issue-state'
  | 'comment'
  | 'fetch-files'
  | 'fetch-contributor-history'
  | 'fetch-comments'
  | 'fetch-recent-merges';

export type FailureKind = 'transient' | 'permanent';

export type ActionResult =
  | { status: 'applied' }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; kind: FailureKind; message: string };

export interface ActionOutcome {
  readonly action: ActionKind;
  readonly target: string;
  readonly attempts: number;
  readonly result: ActionResult;
}

export interface DispatchOutcome {
  readonly deliveryId: string;
  readonly actions: readonly ActionOutcome[];
  readonly applied: number;
  readonly skipped: number;
  readonly failed: number;
}
