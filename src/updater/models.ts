import { type RepoChangeOperation } from '../operations/models';

/**
 * Request to bring one repository up to date.
 */
export interface RepoUpdateRequest {
  repository: string;
  branchName: string;
  operation: RepoChangeOperation;
  commitMessage: string;
  pullRequestTitle: string;
  pullRequestBody: string;
  /**
   * Names this request's part of the pull request body, e.g. the solutions directory.
   * Parts written by requests with other names are kept.
   */
  pullRequestSection: string;
  labels: string[];
  /** Analyse and commit locally but push nothing and leave pull requests alone. */
  dryRun: boolean;
}

/**
 * Drives update requests for the repositories of one organisation.
 */
export interface RepoUpdater {
  readonly org: string;

  /**
   * Run the operation against a fresh checkout of the repository and raise or refresh a
   * pull request for the changes.
   * @returns the pull request reference, or `undefined` when the working copy did not change
   */
  update(request: RepoUpdateRequest): Promise<string | undefined>;
}

/**
 * Establishes authenticated sessions scoped to an organisation.
 */
export interface OrgSessionProvider {
  connect(org: string): Promise<RepoUpdater>;
}

const DRY_RUN_SCHEME = 'dry-run://';

/** The reference reported for a pull request that a dry run would have raised. */
export function dryRunPullRequestReference(org: string, repository: string, branchName: string): string {
  return `${DRY_RUN_SCHEME}${org}/${repository}/${branchName}`;
}

export function isDryRunPullRequestReference(reference: string): boolean {
  return reference.startsWith(DRY_RUN_SCHEME);
}
