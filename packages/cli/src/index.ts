#!/usr/bin/env node

import { Command } from 'commander';
import { ShowCommand } from './commands/show/show-command';
import { TaskCommand } from './commands/task/task-command';
import { MetadataCommand } from './commands/metadata/metadata-command';
import { IssueCommand } from './commands/issue/issue-command';
import { DependencyInjectionService } from './services/dependency-injection';
import type { GlobalOptions } from './interfaces/command';

const program = new Command();

program
  .name('statebox')
  .description('StateBox - persistent state of release workflows')
  .version('0.1.0')
  .option('--local <dir>', 'Keep state documents in a local directory instead of GitHub')
  .option('--repo <owner/repo>', 'GitHub repository holding state documents')
  .option('--branch <ref>', 'Branch holding state documents')
  .hook('preAction', () => {
    DependencyInjectionService.getInstance().configure(program.opts<GlobalOptions>());
  });

new ShowCommand().register(program);
new TaskCommand().register(program);
new MetadataCommand().register(program);
new IssueCommand().register(program);

program.parseAsync().catch((error: unknown) => {
  console.error('❌ Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
