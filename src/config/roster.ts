import * as yaml from 'js-yaml';
import { existsSync } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { z } from 'zod/v4';

import { ConfigurationError } from '../errors';

/** Name of the feature block that enables NuGet dependency updates for an entry. */
export const NUGET_DEPENDENCY_UPDATES_FEATURE = 'nugetDependencyUpdates';

export const ROSTER_FILE_EXTENSIONS = ['.yml', '.yaml'];

export const VersionLockSchema = z.enum(['Major', 'Minor', 'None']);
export type VersionLock = z.infer<typeof VersionLockSchema>;

export const NuGetDependencyUpdatesConfigSchema = z.object({
  enabled: z.boolean().optional(),
  solutionsDir: z.string().optional(),
  checkOnly: z.boolean().optional(),
  versionLock: VersionLockSchema.optional(),
  exclusions: z.string().array().optional(),
  inclusions: z.string().array().optional(),
});
export type NuGetDependencyUpdatesConfig = z.infer<typeof NuGetDependencyUpdatesConfigSchema>;

/** Settings of each feature an entry may carry, keyed by feature name. */
export type RepoFeatures = {
  [NUGET_DEPENDENCY_UPDATES_FEATURE]?: NuGetDependencyUpdatesConfig;
};

/** One record of the roster: a set of repositories in an organisation sharing the same settings. */
export type RepoConfigEntry = {
  org: string;
  name: string[];
  description: string;
  features: RepoFeatures;
};

export const RepoConfigEntrySchema = z
  .object({
    org: z.string().min(1),
    // a single repository may be written without the list
    name: z.union([z.string().min(1), z.string().min(1).array().min(1)]),
    description: z.string().default(''),
    [NUGET_DEPENDENCY_UPDATES_FEATURE]: NuGetDependencyUpdatesConfigSchema.optional(),
  })
  .transform(
    ({ org, name, description, nugetDependencyUpdates }): RepoConfigEntry => ({
      org,
      name: typeof name === 'string' ? [name] : name,
      description,
      features: { nugetDependencyUpdates },
    }),
  );

/** Effective settings of the NuGet feature once defaults are applied. */
export type NuGetUpdateSettings = {
  solutionsDir: string;
  checkOnly: boolean;
  versionLock: VersionLock;
  exclusions: string[];
  inclusions: string[];
};

/**
 * Get the effective NuGet update settings for an entry.
 * @returns `undefined` when the feature is missing or not enabled
 */
export function resolveNuGetUpdateSettings(entry: RepoConfigEntry): NuGetUpdateSettings | undefined {
  const config = entry.features.nugetDependencyUpdates;
  if (config?.enabled !== true) return undefined;

  return {
    solutionsDir: config.solutionsDir || '.',
    checkOnly: config.checkOnly ?? false,
    versionLock: config.versionLock ?? 'Minor',
    exclusions: [...(config.exclusions ?? [])],
    inclusions: [...(config.inclusions ?? [])],
  };
}

export type ParseRosterOptions = {
  /** Contents of a roster file. */
  contents: string;

  /** Path of the file, used in error messages. */
  path: string;
};

/**
 * Parse the contents of a single roster file, a YAML list of entries.
 * An empty file yields no entries.
 */
export async function parseRoster({ contents, path }: ParseRosterOptions): Promise<RepoConfigEntry[]> {
  let data: unknown;
  try {
    data = yaml.load(contents, { filename: path });
  } catch (e) {
    throw new ConfigurationError(`Roster file '${path}' is not valid YAML: ${e instanceof Error ? e.message : e}`);
  }
  if (data === undefined || data === null) return [];

  const result = await RepoConfigEntrySchema.array().safeParseAsync(data);
  if (!result.success) {
    throw new ConfigurationError(`Roster file '${path}' is invalid:\n${z.prettifyError(result.error)}`);
  }
  return result.data;
}

/**
 * Load the roster from every YAML file directly under a directory.
 * Files are read in name order and their entries concatenated.
 * @param directory the configuration directory
 */
export async function loadRoster(directory: string): Promise<RepoConfigEntry[]> {
  if (!existsSync(directory)) {
    throw new ConfigurationError(`Configuration directory '${directory}' does not exist`);
  }
  if (!(await stat(directory)).isDirectory()) {
    throw new ConfigurationError(`Configuration directory '${directory}' is not a directory`);
  }

  const files = (await readdir(directory, { withFileTypes: true }))
    .filter((f) => f.isFile() && ROSTER_FILE_EXTENSIONS.includes(extname(f.name).toLowerCase()))
    .map((f) => f.name)
    .sort();

  const entries: RepoConfigEntry[] = [];
  for (const file of files) {
    const path = join(directory, file);
    const contents = await readFile(path, 'utf-8');
    entries.push(...(await parseRoster({ contents, path })));
  }
  return entries;
}
