import type { Command } from 'commander';
import { encodeStateDocument } from '@statebox/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export type ShowOptions = BaseCommandOptions;

/**
 * ShowCommand - prints the whole state document of a release
 */
export class ShowCommand extends BaseCommand {

  register(program: Command): void {
    program
      .command('show <release>')
      .description('Show the state document (YAML, or JSON with --json)')
      .option('--json', 'Output in JSON format')
      .option('-v, --verbose', 'Show error details')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (release: string, options: ShowOptions) => {
        await this.execute(release, options);
      });
  }

  async execute(release: string, options: ShowOptions): Promise<void> {
    await this.run(options, async () => {
      const stateBox = await this.getStateBox(release);
      const exists = await stateBox.exists();
      const document = await stateBox.load();

      const header = exists ? `# ${stateBox.getPath()}` : `# ${stateBox.getPath()} (not created yet)`;
      this.handleSuccess(document, options, undefined, `${header}\n${encodeStateDocument(document).trimEnd()}`);
    });
  }
}
