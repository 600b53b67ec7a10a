import { type ChangeReport } from '../operations/models';

/**
 * Run-level counters and flags.
 * Invariant: `repos_updated <= repos_analysed`.
 */
export type RunMetadata = {
  start_time: string;
  /** `null` until the report is sealed. */
  end_time: string | null;
  is_dry_run: boolean;
  /** Starts `true`; cleared by any organisation or repository failure. */
  success: boolean;
  /** Repositories whose update completed, with or without changes. */
  repos_analysed: number;
  /** Repositories for which a pull request reference was produced. */
  repos_updated: number;
};

export type ChangeReportEntry = {
  /** Description of the roster entry that produced the report. */
  description: string;
  report: ChangeReport;
};

export type UpdatedOutcome = {
  reports: ChangeReportEntry[];
  pull_request: string;
};

export type ErroredOutcome = {
  error: string;
};

/** Repositories without changes have no outcome. */
export type RepoOutcome = UpdatedOutcome | ErroredOutcome;

export type RunReport = {
  metadata: RunMetadata;
  repos: Record<string, RepoOutcome>;
};

export function isErroredOutcome(outcome: RepoOutcome): outcome is ErroredOutcome {
  return 'error' in outcome;
}

export function repoKey(org: string, repository: string): string {
  return `${org}/${repository}`;
}

export type RunReportBuilderOptions = {
  dryRun: boolean;
  now?: () => Date;
};

/**
 * Accumulates the outcomes of a run. Owned by the loop for the duration of the run and
 * sealed once at the end, after which the report is frozen.
 */
export class RunReportBuilder {
  private readonly now: () => Date;
  private readonly metadata: RunMetadata;
  private readonly repos: Record<string, RepoOutcome> = {};
  private sealed?: RunReport;

  constructor({ dryRun, now = () => new Date() }: RunReportBuilderOptions) {
    this.now = now;
    this.metadata = {
      start_time: now().toISOString(),
      end_time: null,
      is_dry_run: dryRun,
      success: true,
      repos_analysed: 0,
      repos_updated: 0,
    };
  }

  /**
   * Record a repository that produced a change report and a pull request.
   * A repository already updated in this run keeps its earlier reports and takes the
   * latest pull request reference.
   */
  public recordUpdated(org: string, repository: string, entry: ChangeReportEntry, pullRequest: string): void {
    this.ensureOpen();
    const key = repoKey(org, repository);
    const existing = this.repos[key];
    const reports = existing && !isErroredOutcome(existing) ? existing.reports : [];
    this.repos[key] = { reports: [...reports, entry], pull_request: pullRequest };

    this.metadata.repos_analysed++;
    if (pullRequest) this.metadata.repos_updated++;
  }

  /** Record a repository that was analysed without producing changes. */
  public recordNoChange(): void {
    this.ensureOpen();
    this.metadata.repos_analysed++;
  }

  /** Record a repository failure; replaces anything recorded for the repository. */
  public recordError(org: string, repository: string, error: string): void {
    this.ensureOpen();
    this.repos[repoKey(org, repository)] = { error };
    this.metadata.success = false;
  }

  /** Record a failure that skipped a whole roster entry. */
  public recordOrgFailure(): void {
    this.ensureOpen();
    this.metadata.success = false;
  }

  /**
   * Stamp the end time and return the finished report.
   * The report is frozen and nothing more can be recorded.
   */
  public seal(): RunReport {
    if (this.sealed) return this.sealed;

    this.metadata.end_time = this.now().toISOString();
    this.sealed = deepFreeze({ metadata: this.metadata, repos: this.repos });
    return this.sealed;
  }

  private ensureOpen(): void {
    if (this.sealed) {
      throw new Error('The run report has already been sealed');
    }
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
