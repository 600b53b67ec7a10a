import { existsSync } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod/v4';

import { type NuGetUpdateSettings } from '../config/roster';
import { CommandFailedError } from '../errors';
import { create } from '../logger';
import { exec, type CommandRunner } from '../utils/exec';
import { type RepoChangeOperation } from './models';

const logger = create({ name: 'nuget' });

// Shape of the JSON written by `dotnet-outdated --output-format json`
export const OutdatedDependencySchema = z.object({
  Name: z.string(),
  ResolvedVersion: z.string(),
  LatestVersion: z.string(),
  UpgradeSeverity: z.string().optional(),
});

export const OutdatedTargetFrameworkSchema = z.object({
  Name: z.string(),
  Dependencies: OutdatedDependencySchema.array(),
});

export const OutdatedProjectSchema = z.object({
  Name: z.string(),
  FilePath: z.string(),
  TargetFrameworks: OutdatedTargetFrameworkSchema.array(),
});

export const NuGetOutdatedReportSchema = z.object({
  Projects: OutdatedProjectSchema.array(),
});
export type NuGetOutdatedReport = z.infer<typeof NuGetOutdatedReportSchema>;

export type NuGetDependencyUpdateOptions = {
  /** The dotnet-outdated executable. */
  toolPath?: string;
  /** Kill the tool when it runs for longer than this. */
  timeoutMinutes?: number;
  runner?: CommandRunner;
};

/**
 * Brings NuGet package references up to date using dotnet-outdated.
 */
export class NuGetDependencyUpdateOperation implements RepoChangeOperation {
  public readonly ecosystem = 'nuget';
  private readonly toolPath: string;
  private readonly timeoutMs?: number;
  private readonly runner: CommandRunner;

  public static readonly TOOL_NAME = 'dotnet-outdated';

  constructor(
    private readonly settings: NuGetUpdateSettings,
    private readonly reportPath: string,
    {
      toolPath = NuGetDependencyUpdateOperation.TOOL_NAME,
      timeoutMinutes,
      runner = exec,
    }: NuGetDependencyUpdateOptions = {},
  ) {
    this.toolPath = toolPath;
    this.timeoutMs = timeoutMinutes ? timeoutMinutes * 60_000 : undefined;
    this.runner = runner;
  }

  /**
   * Compile the dotnet-outdated arguments.
   * See: https://github.com/dotnet-outdated/dotnet-outdated#usage
   */
  public buildArguments(workingDirectory: string): string[] {
    const { solutionsDir, checkOnly, versionLock, inclusions, exclusions } = this.settings;
    const args = [
      join(workingDirectory, solutionsDir),
      '--version-lock',
      versionLock,
      '--output',
      this.reportPath,
      '--output-format',
      'json',
    ];
    if (!checkOnly) {
      args.push('--upgrade');
    }
    for (const name of inclusions) {
      args.push('--include', name);
    }
    for (const name of exclusions) {
      args.push('--exclude', name);
    }
    return args;
  }

  public async execute(workingDirectory: string): Promise<boolean> {
    const args = this.buildArguments(workingDirectory);
    const { solutionsDir, versionLock } = this.settings;
    logger.info(`Analysing NuGet dependencies in '${solutionsDir}' (version lock: ${versionLock})`);

    const { exitCode, stderr } = await this.runner(this.toolPath, args, {
      cwd: workingDirectory,
      timeoutMs: this.timeoutMs,
      logger,
    });
    if (exitCode !== 0) {
      throw new CommandFailedError(
        `${NuGetDependencyUpdateOperation.TOOL_NAME} failed with exit code ${exitCode}`,
        this.toolPath,
        exitCode,
        stderr,
      );
    }

    const report = await this.loadReport();
    const outdated = report ? countDependencies(report) : 0;
    if (this.settings.checkOnly) {
      if (report && outdated > 0) {
        for (const line of describeReport(report)) logger.info(line);
      }
      logger.info(`Check only; found ${outdated} outdated package reference(s), no files were changed`);
      return false;
    }

    logger.info(`Upgraded ${outdated} package reference(s)`);
    return outdated > 0;
  }

  public async readReport(): Promise<NuGetOutdatedReport | undefined> {
    // nothing was changed in check-only mode, so there is nothing to report for a pull request
    if (this.settings.checkOnly) return undefined;
    return await this.loadReport();
  }

  // dotnet-outdated only writes the output file when outdated packages are found
  private async loadReport(): Promise<NuGetOutdatedReport | undefined> {
    if (!existsSync(this.reportPath) || (await stat(this.reportPath)).size === 0) {
      return undefined;
    }
    const contents = await readFile(this.reportPath, 'utf-8');
    return await NuGetOutdatedReportSchema.parseAsync(JSON.parse(contents));
  }
}

/** Count the outdated package references across all projects and target frameworks. */
export function countDependencies(report: NuGetOutdatedReport): number {
  return report.Projects.flatMap((p) => p.TargetFrameworks).flatMap((f) => f.Dependencies).length;
}

/** Summarise a report as one line per outdated package reference. */
export function describeReport(report: NuGetOutdatedReport): string[] {
  return report.Projects.flatMap((p) =>
    p.TargetFrameworks.flatMap((f) =>
      f.Dependencies.map((d) => `${p.Name} [${f.Name}]: ${d.Name} ${d.ResolvedVersion} -> ${d.LatestVersion}`),
    ),
  );
}
