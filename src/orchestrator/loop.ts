import { join } from 'node:path';

import { resolveNuGetUpdateSettings, type NuGetUpdateSettings, type RepoConfigEntry } from '../config/roster';
import { ConsistencyFaultError, errorMessage } from '../errors';
import { create } from '../logger';
import { type ChangeReport, type RepoChangeOperation } from '../operations/models';
import { type ReportSink } from '../persistence/report-sink';
import { isDryRunPullRequestReference, type OrgSessionProvider, type RepoUpdater } from '../updater/models';
import { convertPlaceholder } from '../utils/placeholder';
import { withTemporaryDirectory } from '../utils/temp';
import { RunReportBuilder, type RunReport } from './report';

const logger = create({ name: 'orchestrator' });

export type RunOptions = {
  roster: RepoConfigEntry[];
  branchName: string;
  /** Title of the pull requests; `${{ solutionsDir }}`, `${{ org }}` and `${{ repository }}` are replaced. */
  pullRequestTitle: string;
  dryRun: boolean;
};

/** Creates the change operation for one repository, writing its report to `reportPath`. */
export type OperationFactory = (settings: NuGetUpdateSettings, reportPath: string) => RepoChangeOperation;

export type RunDependencies = {
  sessions: OrgSessionProvider;
  createOperation: OperationFactory;
  sink: ReportSink;
  now?: () => Date;
};

export type RunResult = {
  report: RunReport;
  exitCode: number;
};

/** What became of one repository; failures are values here, never thrown. */
export type RepositoryResult =
  | { kind: 'updated'; report: ChangeReport; pullRequest: string }
  | { kind: 'no-change' }
  | { kind: 'errored'; error: unknown };

type RepositoryContext = {
  updater: RepoUpdater;
  repository: string;
  settings: NuGetUpdateSettings;
  options: RunOptions;
  createOperation: OperationFactory;
};

/**
 * Run NuGet dependency updates over every repository in the roster.
 * A failure to open an organisation session skips that roster entry, a failure of a repository
 * is recorded against that repository, and neither stops the rest of the run.
 */
export async function runDependencyUpdates(options: RunOptions, dependencies: RunDependencies): Promise<RunResult> {
  const { roster, dryRun } = options;
  const { sessions, createOperation, sink, now } = dependencies;
  const builder = new RunReportBuilder({ dryRun, now });

  if (dryRun) {
    logger.info('Dry run; no branches, pull requests or uploads will be changed');
  }

  for (const entry of roster) {
    const { org } = entry;

    let updater: RepoUpdater;
    try {
      updater = await sessions.connect(org);
    } catch (e) {
      logger.error({ err: e, org }, `Unable to open a session for '${org}'; skipping ${entry.name.join(', ')}`);
      builder.recordOrgFailure();
      continue;
    }

    const settings = resolveNuGetUpdateSettings(entry);
    if (!settings) {
      logger.debug(`NuGet dependency updates are not enabled for ${org}/${entry.name.join(', ')}`);
      continue;
    }

    for (const repository of entry.name) {
      logger.info(`Processing '${org}/${repository}' (${settings.solutionsDir})`);
      const result = await processRepository({ updater, repository, settings, options, createOperation });

      switch (result.kind) {
        case 'updated':
          if (isDryRunPullRequestReference(result.pullRequest)) {
            logger.info(`Dry run; '${org}/${repository}' would open or update a pull request`);
          } else {
            logger.info(`Updated '${org}/${repository}': ${result.pullRequest}`);
          }
          builder.recordUpdated(
            org,
            repository,
            { description: entry.description, report: result.report },
            result.pullRequest,
          );
          break;
        case 'no-change':
          logger.info(`No dependency updates for '${org}/${repository}'`);
          builder.recordNoChange();
          break;
        case 'errored':
          if (result.error instanceof ConsistencyFaultError) {
            logger.error({ err: result.error, org, repository, kind: 'consistency-fault' }, result.error.message);
          } else {
            logger.error({ err: result.error, org, repository }, `Updating '${org}/${repository}' failed`);
          }
          builder.recordError(org, repository, errorMessage(result.error));
          break;
      }
    }
  }

  const report = builder.seal();
  const { metadata } = report;
  logger.info(
    `Run finished: ${metadata.repos_analysed} analysed, ${metadata.repos_updated} updated, ` +
      `${metadata.success ? 'no failures' : 'with failures'}`,
  );

  let persisted = true;
  try {
    await sink.persist(report, { dryRun });
  } catch (e) {
    logger.error({ err: e }, 'Unable to persist the run report');
    persisted = false;
  }

  return { report, exitCode: metadata.success && persisted ? 0 : 1 };
}

/**
 * Update one repository and classify what happened.
 * The report location is removed before this resolves, whatever the result.
 */
export async function processRepository({
  updater,
  repository,
  settings,
  options,
  createOperation,
}: RepositoryContext): Promise<RepositoryResult> {
  const { org } = updater;
  const slug = `${org}/${repository}`;

  try {
    return await withTemporaryDirectory<RepositoryResult>('fleet-deps-report-', async (directory) => {
      const operation = createOperation(settings, join(directory, 'outdated.json'));
      const pullRequest = await updater.update({
        repository,
        branchName: options.branchName,
        operation,
        commitMessage: `Update NuGet dependencies in '${settings.solutionsDir}'`,
        pullRequestTitle: pullRequestTitle(options.pullRequestTitle, org, repository, settings),
        pullRequestBody: pullRequestBody(settings),
        pullRequestSection: settings.solutionsDir,
        labels: [],
        dryRun: options.dryRun,
      });
      const report = await operation.readReport();

      if (report && pullRequest) return { kind: 'updated', report, pullRequest };
      if (!report && !pullRequest) return { kind: 'no-change' };
      throw new ConsistencyFaultError(
        report
          ? `A change report was produced for '${slug}' but no pull request`
          : `Pull request ${pullRequest} was produced for '${slug}' without a change report`,
      );
    });
  } catch (e) {
    return { kind: 'errored', error: e };
  }
}

export function pullRequestTitle(
  template: string,
  org: string,
  repository: string,
  { solutionsDir }: NuGetUpdateSettings,
): string {
  const variables = new Map([
    ['solutionsDir', solutionsDir],
    ['org', org],
    ['repository', repository],
  ]);
  return convertPlaceholder({ input: template, variableFinder: (name) => variables.get(name) });
}

export function pullRequestBody({ solutionsDir, versionLock, exclusions, inclusions }: NuGetUpdateSettings): string {
  const lines = [
    `Updates the NuGet dependencies of the projects in \`${solutionsDir}\`.`,
    '',
    `- Version lock: ${versionLock}`,
  ];
  if (inclusions.length) lines.push(`- Included packages: ${inclusions.join(', ')}`);
  if (exclusions.length) lines.push(`- Excluded packages: ${exclusions.join(', ')}`);
  return lines.join('\n');
}
