import { z } from 'zod/v4';

export const GitHubRepositorySchema = z.object({
  name: z.string(),
  full_name: z.string(),
  default_branch: z.string(),
  clone_url: z.string(),
  html_url: z.string(),
  archived: z.boolean().optional(),
});
export type GitHubRepository = z.infer<typeof GitHubRepositorySchema>;

export const GitHubPullRequestSchema = z.object({
  number: z.number(),
  html_url: z.string(),
  state: z.string(),
  title: z.string(),
  body: z.string().nullish(),
  head: z.object({ ref: z.string() }),
  base: z.object({ ref: z.string() }),
});
export type GitHubPullRequest = z.infer<typeof GitHubPullRequestSchema>;

export const GitHubInstallationSchema = z.object({
  id: z.number(),
});
export type GitHubInstallation = z.infer<typeof GitHubInstallationSchema>;

export const GitHubInstallationTokenSchema = z.object({
  token: z.string(),
  expires_at: z.string(),
});
export type GitHubInstallationToken = z.infer<typeof GitHubInstallationTokenSchema>;

/**
 * Pull request creation request
 */
export interface ICreatePullRequest {
  owner: string;
  repository: string;
  /** Branch holding the changes. */
  head: string;
  /** Branch the changes should be merged into. */
  base: string;
  title: string;
  body: string;
}

/**
 * Pull request update request
 */
export interface IUpdatePullRequest {
  owner: string;
  repository: string;
  pullRequestNumber: number;
  title: string;
  body: string;
}
