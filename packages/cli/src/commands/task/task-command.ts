import { promises as fs } from 'fs';
import * as path from 'path';
import type { Command } from 'commander';
import { TASK_DISPLAY_NAMES } from '@statebox/core';
import type { IssueEntry, TaskEntry } from '@statebox/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * Task Command Options interfaces
 */
export interface TaskUpdateOptions extends BaseCommandOptions {
  status?: string;
  result?: string;
  resultFile?: string;
}

export type TaskShowOptions = BaseCommandOptions;

export type TaskListOptions = BaseCommandOptions;

export function formatTask(task: TaskEntry, blocker: IssueEntry | null = null): string {
  const lines = [
    `📋 Task: ${task.name} (${TASK_DISPLAY_NAMES[task.name]})`,
    `📊 Status: ${task.status}`,
    `🕐 Started: ${task.startedAt ?? '-'}`,
    `🏁 Completed: ${task.completedAt ?? '-'}`,
  ];
  if (blocker) {
    lines.push(`🚫 Blocker: ${blocker.description}`);
  }
  if (task.result) {
    lines.push('📄 Result:', task.result);
  }
  return lines.join('\n');
}

/**
 * TaskCommand - progress of the workflow steps of a release
 */
export class TaskCommand extends BaseCommand {

  register(program: Command): void {
    const task = program
      .command('task')
      .description('Record and inspect workflow task progress')
      .addHelpText('after', `
STATUSES:
  Not Started → In Progress → Pass | Fail

EXAMPLES:
  statebox task update 4.19.1 stage-testing -s "In Progress"
  statebox task update 4.19.1 stage-testing -s Pass --result-file stage.log
  statebox task show 4.19.1 stage-testing
`);

    task
      .command('update <release> <task>')
      .description('Set the status and/or result of a task')
      .option('-s, --status <status>', 'Not Started, In Progress, Pass or Fail')
      .option('-r, --result <text>', 'Command output to store (e-mail addresses are redacted)')
      .option('--result-file <path>', 'Read the result from a file')
      .option('--json', 'Output in JSON format')
      .option('-v, --verbose', 'Show error details')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (release: string, taskName: string, options: TaskUpdateOptions) => {
        await this.executeUpdate(release, taskName, options);
      });

    task
      .command('show <release> <task>')
      .description('Show one task')
      .option('--json', 'Output in JSON format')
      .option('-v, --verbose', 'Show error details')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (release: string, taskName: string, options: TaskShowOptions) => {
        await this.executeShow(release, taskName, options);
      });

    task
      .command('list <release>')
      .alias('ls')
      .description('List recorded tasks')
      .option('--json', 'Output in JSON format')
      .option('-v, --verbose', 'Show error details')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (release: string, options: TaskListOptions) => {
        await this.executeList(release, options);
      });
  }

  async executeUpdate(release: string, taskName: string, options: TaskUpdateOptions): Promise<void> {
    await this.run(options, async () => {
      if (options.result !== undefined && options.resultFile !== undefined) {
        throw new Error('Use either --result or --result-file, not both');
      }
      const result = options.resultFile !== undefined
        ? await this.readResultFile(options.resultFile)
        : options.result;
      if (options.status === undefined && result === undefined) {
        throw new Error('Nothing to update: pass --status and/or --result');
      }

      const stateBox = await this.getStateBox(release);
      await stateBox.updateTask(taskName, {
        ...(options.status !== undefined ? { status: options.status } : {}),
        ...(result !== undefined ? { result } : {}),
      });
      const task = await stateBox.getTask(taskName);
      if (!task) {
        throw new Error(`Task not found after update: ${taskName}`);
      }

      this.handleSuccess(task, options, `Task ${taskName} updated`, formatTask(task));
    });
  }

  async executeShow(release: string, taskName: string, options: TaskShowOptions): Promise<void> {
    await this.run(options, async () => {
      const stateBox = await this.getStateBox(release);
      const task = await stateBox.getTask(taskName);
      if (!task) {
        throw new Error(`Task ${taskName} has no recorded progress for ${release}`);
      }
      const blocker = await stateBox.getTaskBlocker(taskName);

      this.handleSuccess({ ...task, blocker }, options, undefined, formatTask(task, blocker));
    });
  }

  async executeList(release: string, options: TaskListOptions): Promise<void> {
    await this.run(options, async () => {
      const stateBox = await this.getStateBox(release);
      const { tasks } = await stateBox.load();

      const text = tasks.length === 0
        ? `No tasks recorded for ${release}`
        : tasks.map((task) => `${task.status.padEnd(12)} ${task.name}`).join('\n');
      this.handleSuccess(tasks, options, undefined, text);
    });
  }

  private async readResultFile(filePath: string): Promise<string> {
    const resolved = path.isAbsolute(filePath) ? filePath : path.resolve(process.cwd(), filePath);
    try {
      return await fs.readFile(resolved, 'utf-8');
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        throw new Error(`Result file not found: ${resolved}`);
      }
      throw error;
    }
  }
}
