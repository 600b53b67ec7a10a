import { SignJWT } from 'jose';
import { createPrivateKey, type KeyObject } from 'node:crypto';

import { SessionError } from '../errors';
import { type GitAuthor } from '../git/working-copy';
import { create } from '../logger';
import { type OrgSessionProvider, type RepoUpdater } from '../updater/models';
import { RepoUpdateClient } from '../updater/repo-update-client';
import { GitHubApiClient, type GitHubApiClientOptions } from './client';

const logger = create({ name: 'auth' });

/** Supplies access tokens scoped to an organisation. */
export interface TokenProvider {
  getToken(org: string): Promise<string>;
}

/**
 * Uses the same token, e.g. a personal access token, for every organisation.
 */
export class StaticTokenProvider implements TokenProvider {
  constructor(private readonly token: string) {}

  public async getToken(): Promise<string> {
    return this.token;
  }
}

export type GitHubAppTokenProviderOptions = {
  appId: string;
  /** PEM encoded private key of the app (PKCS#1 or PKCS#8). */
  privateKey: string;
  api?: GitHubApiClientOptions;
  /** Current time; replaced in tests. */
  now?: () => Date;
};

/**
 * Mints installation access tokens for a GitHub App installed on each organisation.
 * Tokens are cached until shortly before they expire.
 */
export class GitHubAppTokenProvider implements TokenProvider {
  private readonly appId: string;
  private readonly privateKeyPem: string;
  private privateKey?: KeyObject;
  private readonly api?: GitHubApiClientOptions;
  private readonly now: () => Date;
  private readonly tokens = new Map<string, { token: string; expiresAt: number }>();

  // refresh tokens this long before they expire
  public static readonly EXPIRY_MARGIN_MS = 5 * 60_000;

  constructor({ appId, privateKey, api, now = () => new Date() }: GitHubAppTokenProviderOptions) {
    this.appId = appId;
    this.privateKeyPem = privateKey;
    this.api = api;
    this.now = now;
  }

  public async getToken(org: string): Promise<string> {
    const cached = this.tokens.get(org);
    if (cached && cached.expiresAt - GitHubAppTokenProvider.EXPIRY_MARGIN_MS > this.now().getTime()) {
      return cached.token;
    }

    const client = new GitHubApiClient(await this.createAppJwt(), this.api);
    const installation = await client.getOrganisationInstallation(org);
    logger.debug(`Minting token for installation ${installation.id} on '${org}'`);
    const { token, expires_at } = await client.createInstallationAccessToken(installation.id);
    this.tokens.set(org, { token, expiresAt: Date.parse(expires_at) });
    return token;
  }

  /**
   * Create the JWT that authenticates as the app itself.
   * See: https://docs.github.com/en/apps/creating-github-apps/authenticating-with-a-github-app/generating-a-json-web-token-jwt-for-a-github-app
   */
  public async createAppJwt(): Promise<string> {
    const seconds = Math.floor(this.now().getTime() / 1000);
    return await new SignJWT({})
      .setProtectedHeader({ alg: 'RS256' })
      .setIssuer(this.appId)
      .setIssuedAt(seconds - 60) // allow for clock drift
      .setExpirationTime(seconds + 9 * 60) // the maximum is 10 minutes
      .sign(this.getPrivateKey());
  }

  // parsed on first use; a bad key fails each session that needs it
  private getPrivateKey(): KeyObject {
    if (!this.privateKey) {
      // secrets stores often keep the newlines of a PEM escaped
      const pem = this.privateKeyPem.replace(/\\n/g, '\n');
      // GitHub hands out PKCS#1 keys which jose does not import, a KeyObject takes either
      this.privateKey = createPrivateKey(pem);
    }
    return this.privateKey;
  }
}

/**
 * Pick the token provider from the environment: a GitHub App when its id and key are set,
 * otherwise a plain token.
 * @returns `undefined` when no credentials are configured
 */
export function getTokenProviderFromEnvironment(env: NodeJS.ProcessEnv = process.env): TokenProvider | undefined {
  const appId = env.GITHUB_APP_ID;
  const privateKey = env.GITHUB_APP_PRIVATE_KEY;
  if (appId && privateKey) {
    return new GitHubAppTokenProvider({ appId, privateKey });
  }
  if (env.GITHUB_TOKEN) {
    return new StaticTokenProvider(env.GITHUB_TOKEN);
  }
  return undefined;
}

export type GitHubSessionProviderOptions = {
  tokens: TokenProvider | undefined;
  author: GitAuthor;
  api?: GitHubApiClientOptions;
};

/**
 * Opens GitHub sessions: one update client per organisation, authenticated with that
 * organisation's token.
 */
export class GitHubSessionProvider implements OrgSessionProvider {
  constructor(private readonly options: GitHubSessionProviderOptions) {}

  public async connect(org: string): Promise<RepoUpdater> {
    const { tokens, author, api } = this.options;
    if (!tokens) {
      throw new SessionError(
        `No GitHub credentials configured for '${org}'; set GITHUB_APP_ID and GITHUB_APP_PRIVATE_KEY, or GITHUB_TOKEN`,
        org,
      );
    }

    let token: string;
    try {
      token = await tokens.getToken(org);
    } catch (e) {
      throw new SessionError(`Unable to authenticate with '${org}': ${e instanceof Error ? e.message : e}`, org, {
        cause: e,
      });
    }

    return new RepoUpdateClient({ org, token, api: new GitHubApiClient(token, api), author });
  }
}
