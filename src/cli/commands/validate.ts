import { Command, Option } from 'commander';
import { z } from 'zod/v4';

import { loadRoster, resolveNuGetUpdateSettings, type RepoConfigEntry } from '../../config/roster';
import { ConfigurationError } from '../../errors';
import { create } from '../../logger';
import { handlerOptions, type HandlerOptions } from './base';

const logger = create({ name: 'cli' });

const schema = z.object({
  configDirectory: z.string(),
});
type Options = z.infer<typeof schema>;

export function describeRoster(roster: RepoConfigEntry[]): string[] {
  const repositories = roster.reduce((count, entry) => count + entry.name.length, 0);
  const lines = [`Roster valid: ${roster.length} entries covering ${repositories} repositories.`];
  for (const entry of roster) {
    const settings = resolveNuGetUpdateSettings(entry);
    const target = `${entry.org}/${entry.name.join(', ')}`;
    if (!settings) {
      lines.push(`- ${target}: NuGet dependency updates disabled`);
      continue;
    }
    const mode = settings.checkOnly ? ', check only' : '';
    lines.push(`- ${target}: '${settings.solutionsDir}' (version lock ${settings.versionLock}${mode})`);
  }
  return lines;
}

async function handler({ options, error }: HandlerOptions<Options>) {
  const { configDirectory } = options;

  logger.info(`Validating roster in ${configDirectory}`);
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

  for (const line of describeRoster(roster)) {
    logger.info(line);
  }
}

export const command = new Command('validate')
  .description('Validate the roster of repositories.')
  .addOption(
    new Option('-c, --config-directory <DIR>', 'Directory holding the roster files.')
      .env('CONFIG_DIRECTORY')
      .default('config/sample'),
  )
  .action(async (input, command) => await handler(await handlerOptions({ schema, input, command })));
