import { Command, Option } from 'commander';
import { z } from 'zod/v4';

import { loadRoster, type RepoConfigEntry } from '../../config/roster';
import { ConfigurationError } from '../../errors';
import { getTokenProviderFromEnvironment, GitHubSessionProvider } from '../../github/auth';
import { GitHubApiClient } from '../../github/client';
import { create } from '../../logger';
import { NuGetDependencyUpdateOperation } from '../../operations/nuget';
import { runDependencyUpdates } from '../../orchestrator/loop';
import { RunReportSink } from '../../persistence/report-sink';
import { handlerOptions, type HandlerOptions } from './base';

const logger = create({ name: 'cli' });

export const DEFAULT_PULL_REQUEST_TITLE = "Update NuGet dependencies in '${{ solutionsDir }}'";

const schema = z.object({
  configDirectory: z.string(),
  branchName: z.string().min(1),
  prTitle: z.string().min(1),
  dryRun: z.boolean().optional(),
  outputDirectory: z.string(),
  skipUpload: z.boolean().optional(),
  toolTimeoutMinutes: z.coerce.number().positive().optional(),
  gitUserName: z.string().min(1),
  gitUserEmail: z.string().min(1),
  dotnetOutdated: z.string().min(1),
  githubApiUrl: z.url(),
});
type Options = z.infer<typeof schema>;

async function handler({ options, error }: HandlerOptions<Options>) {
  const { configDirectory, branchName, prTitle, outputDirectory, toolTimeoutMinutes, dotnetOutdated } = options;
  // the scheduled workflow switches dry runs on through the environment
  const dryRun = options.dryRun ?? process.env.DRYRUN_MODE?.toLowerCase() === 'true';

  let roster: RepoConfigEntry[];
  try {
    roster = await loadRoster(configDirectory);
  } catch (e) {
    if (e instanceof ConfigurationError) {
      error(e.message);
      return;
    }
    throw e;
  }
  logger.info(`Loaded ${roster.length} roster entries from ${configDirectory}`);

  const tokens = getTokenProviderFromEnvironment();
  if (!tokens) {
    logger.warn('No GitHub credentials configured; every organisation will fail to connect');
  }

  const { exitCode } = await runDependencyUpdates(
    { roster, branchName, pullRequestTitle: prTitle, dryRun },
    {
      sessions: new GitHubSessionProvider({
        tokens,
        author: { name: options.gitUserName, email: options.gitUserEmail },
        api: { baseUrl: options.githubApiUrl },
      }),
      createOperation: (settings, reportPath) =>
        new NuGetDependencyUpdateOperation(settings, reportPath, {
          toolPath: dotnetOutdated,
          timeoutMinutes: toolTimeoutMinutes,
        }),
      sink: new RunReportSink({ outputDirectory, skipUpload: options.skipUpload }),
    },
  );
  process.exitCode = exitCode;
}

export const command = new Command('run')
  .description('Run NuGet dependency updates for every repository in the roster.')
  .addOption(
    new Option('-c, --config-directory <DIR>', 'Directory holding the roster files.')
      .env('CONFIG_DIRECTORY')
      .default('config/sample'),
  )
  .option('--branch-name <NAME>', 'Branch the updates are pushed to.', 'bot/nuget-dependency-updates')
  .option(
    '--pr-title <TEMPLATE>',
    'Title of the pull requests.\nSupports ${{ solutionsDir }}, ${{ org }} and ${{ repository }}.',
    DEFAULT_PULL_REQUEST_TITLE,
  )
  .option('--dry-run', 'Commit locally only; no pushes, pull requests or uploads. Also set by DRYRUN_MODE=true.')
  .option('-o, --output-directory <DIR>', 'Directory the run report is written to.', '.')
  .option('--skip-upload', 'Keep the run report local.')
  .option('--tool-timeout-minutes <MINUTES>', 'Stop dotnet-outdated when it runs for longer than this.')
  .option('--git-user-name <NAME>', 'Author of the update commits.', 'fleet-deps-bot')
  .option('--git-user-email <EMAIL>', 'Email of the update commits.', 'fleet-deps-bot@users.noreply.github.com')
  .option('--dotnet-outdated <PATH>', 'The dotnet-outdated executable.', NuGetDependencyUpdateOperation.TOOL_NAME)
  .addOption(
    new Option('--github-api-url <URL>', 'GitHub REST API, for GitHub Enterprise Server.')
      .env('GITHUB_API_URL')
      .default(GitHubApiClient.API_URL),
  )
  .action(async (input, command) => await handler(await handlerOptions({ schema, input, command })));
