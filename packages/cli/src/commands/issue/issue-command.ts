import type { Command } from 'commander';
import type { IssueEntry } from '@statebox/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * Issue Command Options interfaces
 */
export interface IssueAddOptions extends BaseCommandOptions {
  /** Set by --non-blocker (commander negation of --blocker) */
  blocker?: boolean;
  tasks?: string;
}

export interface IssueResolveOptions extends BaseCommandOptions {
  resolution: string;
}

export interface IssueListOptions extends BaseCommandOptions {
  unresolved?: boolean;
  blockers?: boolean;
  task?: string;
}

export type IssueBlockersOptions = BaseCommandOptions;

export function formatIssue(issue: IssueEntry): string {
  const marker = issue.resolved ? '✅' : issue.blocker ? '🚫' : '⚠️';
  const scope = issue.relatedTasks.length > 0 ? issue.relatedTasks.join(', ') : 'general';
  const lines = [`${marker} ${issue.description} [${scope}] (reported ${issue.reportedAt})`];
  if (issue.resolved) {
    lines.push(`   Resolved ${issue.resolvedAt ?? '-'}: ${issue.resolution ?? ''}`);
  }
  return lines.join('\n');
}

function formatIssues(issues: IssueEntry[], emptyMessage: string): string {
  return issues.length === 0 ? emptyMessage : issues.map(formatIssue).join('\n');
}

function parseTaskList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

/**
 * IssueCommand - blockers and non-blocking issues of a release
 */
export class IssueCommand extends BaseCommand {

  register(program: Command): void {
    const issue = program
      .command('issue')
      .description('Report, resolve and list release issues')
      .addHelpText('after', `
RULES:
  A task can have at most one unresolved blocker.
  Issues without tasks are general and affect the whole release.

EXAMPLES:
  statebox issue add 4.19.1 "Stage push failed" -t push-to-cdn-staging
  statebox issue resolve 4.19.1 "stage push" -r "Retried after mirror fix"
  statebox issue list 4.19.1 --unresolved
`);

    issue
      .command('add <release> <description>')
      .description('Report an issue (blocking by default)')
      .option('--non-blocker', 'Report a non-blocking issue')
      .option('-t, --tasks <tasks>', 'Related task names (comma-separated)')
      .option('--json', 'Output in JSON format')
      .option('-v, --verbose', 'Show error details')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (release: string, description: string, options: IssueAddOptions & { nonBlocker?: boolean }) => {
        await this.executeAdd(release, description, { ...options, blocker: !options.nonBlocker });
      });

    issue
      .command('resolve <release> <text>')
      .description('Resolve the issue matching the text (exact, else unique substring)')
      .requiredOption('-r, --resolution <text>', 'How the issue was resolved')
      .option('--json', 'Output in JSON format')
      .option('-v, --verbose', 'Show error details')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (release: string, text: string, options: IssueResolveOptions) => {
        await this.executeResolve(release, text, options);
      });

    issue
      .command('list <release>')
      .alias('ls')
      .description('List issues')
      .option('--unresolved', 'Only unresolved issues')
      .option('--blockers', 'Only blocking issues')
      .option('-t, --task <task>', 'Only issues related to a task')
      .option('--json', 'Output in JSON format')
      .option('-v, --verbose', 'Show error details')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (release: string, options: IssueListOptions) => {
        await this.executeList(release, options);
      });

    issue
      .command('blockers <release> [task]')
      .description('Show the blocker of a task, or the general blockers')
      .option('--json', 'Output in JSON format')
      .option('-v, --verbose', 'Show error details')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (release: string, taskName: string | undefined, options: IssueBlockersOptions) => {
        await this.executeBlockers(release, taskName, options);
      });
  }

  async executeAdd(release: string, description: string, options: IssueAddOptions): Promise<void> {
    await this.run(options, async () => {
      const stateBox = await this.getStateBox(release);
      const issue = await stateBox.addIssue(description, {
        blocker: options.blocker ?? true,
        relatedTasks: parseTaskList(options.tasks),
      });

      this.handleSuccess(issue, options, 'Issue recorded', formatIssue(issue));
    });
  }

  async executeResolve(release: string, text: string, options: IssueResolveOptions): Promise<void> {
    await this.run(options, async () => {
      const stateBox = await this.getStateBox(release);
      const issue = await stateBox.resolveIssue(text, options.resolution);

      this.handleSuccess(issue, options, 'Issue resolved', formatIssue(issue));
    });
  }

  async executeList(release: string, options: IssueListOptions): Promise<void> {
    await this.run(options, async () => {
      const stateBox = await this.getStateBox(release);
      const issues = await stateBox.getIssues({
        unresolvedOnly: options.unresolved ?? false,
        blockersOnly: options.blockers ?? false,
        ...(options.task !== undefined ? { taskName: options.task } : {}),
      });

      this.handleSuccess(issues, options, undefined, formatIssues(issues, `No issues for ${release}`));
    });
  }

  async executeBlockers(release: string, taskName: string | undefined, options: IssueBlockersOptions): Promise<void> {
    await this.run(options, async () => {
      const stateBox = await this.getStateBox(release);
      if (taskName !== undefined) {
        const blocker = await stateBox.getTaskBlocker(taskName);
        this.handleSuccess(
          blocker,
          options,
          undefined,
          blocker ? formatIssue(blocker) : `No unresolved blocker for ${taskName}`,
        );
        return;
      }

      const blockers = await stateBox.getGeneralBlockers();
      this.handleSuccess(blockers, options, undefined, formatIssues(blockers, `No general blockers for ${release}`));
    });
  }
}
