import axios, { type AxiosInstance } from 'axios';
import { type ZodType } from 'zod/v4';

import { create, type Logger } from '../logger';
import { sendRequestWithRetry } from '../utils/http';
import {
  GitHubInstallationSchema,
  GitHubInstallationTokenSchema,
  GitHubPullRequestSchema,
  GitHubRepositorySchema,
  type GitHubInstallation,
  type GitHubInstallationToken,
  type GitHubPullRequest,
  type GitHubRepository,
  type ICreatePullRequest,
  type IUpdatePullRequest,
} from './models';

export type GitHubApiClientOptions = {
  /** Base URL of the REST API, for GitHub Enterprise Server. */
  baseUrl?: string;
  /** Delay between retries of temporary failures. */
  retryDelay?: number;
};

/**
 * Wrapper for the GitHub REST API with the calls needed to manage update pull requests.
 * The access token may be a personal access token, an installation token, or an app JWT.
 */
export class GitHubApiClient {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  private readonly retryDelay?: number;

  public static readonly API_URL = 'https://api.github.com';
  public static readonly API_VERSION = '2022-11-28';

  constructor(accessToken: string, { baseUrl = GitHubApiClient.API_URL, retryDelay }: GitHubApiClientOptions = {}) {
    this.http = axios.create({
      baseURL: baseUrl.replace(/\/$/, ''), // trim trailing slash
      headers: {
        'Accept': 'application/vnd.github+json',
        'Authorization': `Bearer ${accessToken}`,
        'X-GitHub-Api-Version': GitHubApiClient.API_VERSION,
      },
      // statuses are checked when sending so that temporary failures can be retried
      validateStatus: () => true,
    });
    this.logger = create({ name: 'github' });
    this.retryDelay = retryDelay;
  }

  /**
   * Get a repository.
   * @param owner
   * @param repository
   */
  public async getRepository(owner: string, repository: string): Promise<GitHubRepository> {
    return await this.get(`/repos/${owner}/${repository}`, GitHubRepositorySchema);
  }

  /**
   * Find the open pull request whose head is the given branch of the same repository.
   * @returns the pull request, or `undefined` when none is open
   */
  public async findOpenPullRequest(
    owner: string,
    repository: string,
    branch: string,
  ): Promise<GitHubPullRequest | undefined> {
    const pullRequests = await this.get(`/repos/${owner}/${repository}/pulls`, GitHubPullRequestSchema.array(), {
      state: 'open',
      head: `${owner}:${branch}`,
    });
    return pullRequests[0];
  }

  /**
   * Create a new pull request.
   * @param pr
   */
  public async createPullRequest(pr: ICreatePullRequest): Promise<GitHubPullRequest> {
    this.logger.info(`Creating pull request '${pr.title}' to merge '${pr.head}' into '${pr.base}'...`);
    const pullRequest = await this.post(`/repos/${pr.owner}/${pr.repository}/pulls`, GitHubPullRequestSchema, {
      title: pr.title,
      body: pr.body,
      head: pr.head,
      base: pr.base,
    });
    this.logger.info(`Created pull request #${pullRequest.number}.`);
    return pullRequest;
  }

  /**
   * Update the title and body of a pull request.
   * @param pr
   */
  public async updatePullRequest(pr: IUpdatePullRequest): Promise<GitHubPullRequest> {
    this.logger.info(`Updating pull request #${pr.pullRequestNumber}...`);
    return await this.patch(
      `/repos/${pr.owner}/${pr.repository}/pulls/${pr.pullRequestNumber}`,
      GitHubPullRequestSchema,
      { title: pr.title, body: pr.body },
    );
  }

  /**
   * Add labels to a pull request (labels live on the issue behind it).
   */
  public async addLabels(
    owner: string,
    repository: string,
    pullRequestNumber: number,
    labels: string[],
  ): Promise<void> {
    if (!labels.length) return;
    await this.post(`/repos/${owner}/${repository}/issues/${pullRequestNumber}/labels`, undefined, { labels });
  }

  /**
   * Get the installation of the authenticated app on an organisation.
   * Requires an app JWT.
   * @param org
   */
  public async getOrganisationInstallation(org: string): Promise<GitHubInstallation> {
    return await this.get(`/orgs/${org}/installation`, GitHubInstallationSchema);
  }

  /**
   * Create an installation access token.
   * Requires an app JWT.
   * @param installationId
   */
  public async createInstallationAccessToken(installationId: number): Promise<GitHubInstallationToken> {
    return await this.post(`/app/installations/${installationId}/access_tokens`, GitHubInstallationTokenSchema);
  }

  private async get<T>(url: string, schema: ZodType<T>, params?: Record<string, string>): Promise<T> {
    const data = await sendRequestWithRetry('GET', url, () => this.http.get(url, { params }), this.retryOptions());
    return await schema.parseAsync(data);
  }

  private async post<T>(url: string, schema: ZodType<T>, body?: unknown): Promise<T>;
  private async post(url: string, schema: undefined, body?: unknown): Promise<void>;
  private async post<T>(url: string, schema: ZodType<T> | undefined, body?: unknown): Promise<T | void> {
    const data = await sendRequestWithRetry('POST', url, () => this.http.post(url, body), this.retryOptions());
    if (schema) return await schema.parseAsync(data);
  }

  private async patch<T>(url: string, schema: ZodType<T>, body?: unknown): Promise<T> {
    const data = await sendRequestWithRetry('PATCH', url, () => this.http.patch(url, body), this.retryOptions());
    return await schema.parseAsync(data);
  }

  private retryOptions() {
    return { logger: this.logger, retryDelay: this.retryDelay };
  }
}
