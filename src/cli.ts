#!/usr/bin/env node

import { Command } from 'commander';
import { VERSION, heldBackPackages, heldBackBy, printHeldBack, findPackagesOnHost } from './index.js';
import { compareNames } from './checker/held-back-by.js';
import { collect, parseNewVersions } from './utils/cli-options.js';
import { HeldByReport } from './schemas/output.schema.js';
import { prettyPrint, toHeldBackReport } from './utils/serializer.js';
import { withErrorHandling } from './utils/errors.js';
import { logger, LogLevel } from './utils/logger.js';

interface RegistryOptions {
  registry?: string[];
}

interface HeldBackCommandOptions extends RegistryOptions {
  newVersion?: string[];
  json?: boolean;
  color?: boolean;
}

interface HeldBackByCommandOptions extends RegistryOptions {
  at?: string;
  json?: boolean;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('compat-holdback')
    .description('Find packages whose compat bounds hold back the latest release of a dependency')
    .version(VERSION)
    .option('--verbose', 'log debug output to stderr')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
        logger.setLevel(LogLevel.DEBUG);
      }
    });

  program
    .command('held-back')
    .description('List every package that holds back one of its dependencies')
    .option('--new-version <package=version>', 'treat an unregistered version as released (repeatable)', collect)
    .option('--registry <dir>', 'registry directory to read (repeatable, later wins)', collect)
    .option('--json', 'print a JSON report')
    .option('--color', 'force colored output')
    .option('--no-color', 'disable colored output')
    .action(
      withErrorHandling((options: HeldBackCommandOptions) => {
        const holdMap = heldBackPackages({
          registries: options.registry,
          newVersions: parseNewVersions(options.newVersion ?? []),
        });
        if (options.json) {
          process.stdout.write(`${prettyPrint(toHeldBackReport(holdMap))}\n`);
          return;
        }
        printHeldBack(process.stdout, holdMap, { color: options.color ?? process.stdout.isTTY });
      }),
    );

  program
    .command('held-back-by')
    .description('List the packages holding back <name>')
    .argument('<name>', 'package name')
    .option('--at <version>', 'check an unregistered version of <name> instead of its latest')
    .option('--registry <dir>', 'registry directory to read (repeatable, later wins)', collect)
    .option('--json', 'print a JSON report')
    .action(
      withErrorHandling((name: string, options: HeldBackByCommandOptions) => {
        const heldBy = heldBackBy(name, options.at, { registries: options.registry });
        if (options.json) {
          const report = HeldByReport.parse({ package: name, version: options.at, heldBy });
          process.stdout.write(`${prettyPrint(report)}\n`);
          return;
        }
        for (const holder of heldBy) {
          process.stdout.write(`${holder}\n`);
        }
      }),
    );

  program
    .command('find-packages')
    .description('List packages in repositories you can push to (needs GITHUB_AUTH)')
    .action(
      withErrorHandling(async () => {
        const names = await findPackagesOnHost();
        for (const name of [...names].sort(compareNames)) {
          process.stdout.write(`${name}\n`);
        }
      }),
    );

  return program;
}

await createProgram().parseAsync(process.argv);
