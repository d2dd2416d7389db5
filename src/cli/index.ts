#!/usr/bin/env tsx

import { Cli, Builtins } from 'clipanion';
import { FetchCommand } from './commands/fetch.ts';
import { ListCommand } from './commands/list.ts';
import { InfoCommand } from './commands/info.ts';
import { CompareCommand } from './commands/compare.ts';
import { ImportCommand } from './commands/import.ts';
import { DescribeCommand } from './commands/describe.ts';

const cli = new Cli({
  binaryLabel: 'fundlens',
  binaryName: 'fundlens',
  binaryVersion: '0.1.0',
});

cli.register(FetchCommand);
cli.register(ListCommand);
cli.register(InfoCommand);
cli.register(CompareCommand);
cli.register(ImportCommand);
cli.register(DescribeCommand);
cli.register(Builtins.HelpCommand);
cli.register(Builtins.VersionCommand);

void cli.runExit(process.argv.slice(2));
