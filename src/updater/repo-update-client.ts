import { join } from 'node:path';

import { type GitHubApiClient } from '../github/client';
import { GitWorkingCopy, type GitAuthor, type WorkingCopyFactory } from '../git/working-copy';
import { create } from '../logger';
import { withTemporaryDirectory } from '../utils/temp';
import { dryRunPullRequestReference, type RepoUpdater, type RepoUpdateRequest } from './models';

const logger = create({ name: 'updater' });

/** The hosting API calls the update client makes. */
export type PullRequestApi = Pick<
  GitHubApiClient,
  'getRepository' | 'findOpenPullRequest' | 'createPullRequest' | 'updatePullRequest' | 'addLabels'
>;

export type RepoUpdateClientOptions = {
  org: string;
  /** Token used for git over HTTPS. */
  token: string;
  api: PullRequestApi;
  /** Identity of the commits. */
  author: GitAuthor;
  workingCopyFactory?: WorkingCopyFactory;
};

/**
 * Updates repositories of one organisation on GitHub: clones, runs the change operation on the
 * update branch, and when files changed commits, pushes and creates or updates the pull request.
 */
export class RepoUpdateClient implements RepoUpdater {
  public readonly org: string;
  private readonly token: string;
  private readonly api: PullRequestApi;
  private readonly author: GitAuthor;
  private readonly workingCopyFactory: WorkingCopyFactory;

  constructor({ org, token, api, author, workingCopyFactory = GitWorkingCopy.clone }: RepoUpdateClientOptions) {
    this.org = org;
    this.token = token;
    this.api = api;
    this.author = author;
    this.workingCopyFactory = workingCopyFactory;
  }

  public async update(request: RepoUpdateRequest): Promise<string | undefined> {
    const { repository, branchName, operation, dryRun } = request;
    const slug = `${this.org}/${repository}`;

    const repo = await this.api.getRepository(this.org, repository);
    if (repo.archived) {
      throw new Error(`Repository '${slug}' is archived`);
    }

    return await withTemporaryDirectory('fleet-deps-', async (directory) => {
      const copy = await this.workingCopyFactory({
        url: repo.clone_url,
        branch: repo.default_branch,
        directory: join(directory, repository),
        token: this.token,
      });

      // a branch left open by a previous run is reused so that its pull request gets updated
      const existsRemotely = await copy.remoteBranchExists(branchName);
      await copy.checkoutBranch(branchName, existsRemotely);
      logger.debug(`${existsRemotely ? 'Reusing' : 'Created'} branch '${branchName}' in '${slug}'`);

      const changed = await operation.execute(copy.directory);
      if (!(await copy.hasChanges())) {
        if (changed) {
          logger.warn(
            `The ${operation.ecosystem} operation reported changes but the working copy of '${slug}' is clean`,
          );
        }
        logger.info(`No changes to '${slug}'`);
        return undefined;
      }

      await copy.commitAll(request.commitMessage, this.author);
      if (dryRun) {
        logger.info(`Dry run; skipping push and pull request for '${slug}'`);
        return dryRunPullRequestReference(this.org, repository, branchName);
      }

      await copy.push(branchName);

      const existing = await this.api.findOpenPullRequest(this.org, repository, branchName);
      const pullRequest = existing
        ? await this.api.updatePullRequest({
            owner: this.org,
            repository,
            pullRequestNumber: existing.number,
            title: request.pullRequestTitle,
            body: mergePullRequestBody(existing.body, request.pullRequestSection, request.pullRequestBody),
          })
        : await this.api.createPullRequest({
            owner: this.org,
            repository,
            head: branchName,
            base: repo.default_branch,
            title: request.pullRequestTitle,
            body: mergePullRequestBody(undefined, request.pullRequestSection, request.pullRequestBody),
          });
      await this.api.addLabels(this.org, repository, pullRequest.number, request.labels);

      return pullRequest.html_url;
    });
  }
}

const SECTION_MARKER = /^<!-- section: (.+?) -->\r?$/gm;

/**
 * Put `text` into the section named `section` of a pull request body, replacing that section
 * when present and appending it otherwise. Text outside any section is dropped.
 */
export function mergePullRequestBody(existing: string | null | undefined, section: string, text: string): string {
  const sections = new Map<string, string>();
  const current = existing ?? '';
  const markers = [...current.matchAll(SECTION_MARKER)];
  markers.forEach((marker, i) => {
    const start = (marker.index ?? 0) + marker[0].length;
    const end = i + 1 < markers.length ? (markers[i + 1].index ?? current.length) : current.length;
    sections.set(marker[1], current.slice(start, end).trim());
  });
  sections.set(section, text.trim());

  return [...sections].map(([name, body]) => `<!-- section: ${name} -->\n${body}`).join('\n\n');
}
