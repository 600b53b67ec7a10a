#!/usr/bin/env node

import { Command } from 'commander';

import packageJson from '../../package.json';
import { run, validate } from './commands';

const root = new Command();

root.name('fleet-deps').description('Raise NuGet dependency update pull requests across a fleet of repositories.');
root.usage();
root.version(packageJson.version, '--version');
root.addCommand(run);
root.addCommand(validate);

const args = process.argv;

// If no command is provided, show help
if (!args.slice(2).length) {
  root.help();
}

await root.parseAsync(args);
