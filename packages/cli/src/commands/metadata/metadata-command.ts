import type { Command } from 'commander';
import * as yaml from 'js-yaml';
import type { MetadataScalar, MetadataValue } from '@statebox/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export type MetadataGetOptions = BaseCommandOptions;

export type MetadataSetOptions = BaseCommandOptions;

function isScalar(value: unknown): value is MetadataScalar {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value);
}

/**
 * Parses a CLI value as YAML: `123` is a number, `{rpm: 1}` a mapping,
 * anything else a string. Mappings may hold scalars only.
 */
export function parseMetadataValue(raw: string): MetadataValue {
  let parsed: unknown;
  try {
    parsed = yaml.load(raw, { schema: yaml.JSON_SCHEMA });
  } catch {
    // not YAML: keep the text
    return raw;
  }
  if (parsed === undefined) {
    return raw;
  }
  if (isScalar(parsed)) {
    return parsed;
  }
  if (typeof parsed === 'object' && !Array.isArray(parsed)) {
    const mapping: { [key: string]: MetadataScalar } = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (!isScalar(value)) {
        throw new Error(`Nested value for "${key}" is not supported; metadata mappings hold scalars only`);
      }
      mapping[key] = value;
    }
    return mapping;
  }
  throw new Error(`Unsupported metadata value: ${raw}`);
}

function formatValue(value: unknown): string {
  return yaml.dump(value, { lineWidth: -1 }).trimEnd();
}

/**
 * MetadataCommand - release metadata (ticket, advisories, builds, ...)
 */
export class MetadataCommand extends BaseCommand {

  register(program: Command): void {
    const metadata = program
      .command('metadata')
      .alias('meta')
      .description('Read and update release metadata');

    metadata
      .command('get <release> [key]')
      .description('Show all metadata or one key')
      .option('--json', 'Output in JSON format')
      .option('-v, --verbose', 'Show error details')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (release: string, key: string | undefined, options: MetadataGetOptions) => {
        await this.executeGet(release, key, options);
      });

    metadata
      .command('set <release> <key> <value>')
      .description('Set a metadata key; mappings are merged into the existing value')
      .addHelpText('after', `
EXAMPLES:
  statebox metadata set 4.19.1 jiraTicket ART-12345
  statebox metadata set 4.19.1 advisoryIds "{rpm: 12345, rhcos: 12346}"
`)
      .option('--json', 'Output in JSON format')
      .option('-v, --verbose', 'Show error details')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (release: string, key: string, value: string, options: MetadataSetOptions) => {
        await this.executeSet(release, key, value, options);
      });
  }

  async executeGet(release: string, key: string | undefined, options: MetadataGetOptions): Promise<void> {
    await this.run(options, async () => {
      const stateBox = await this.getStateBox(release);
      if (key === undefined) {
        const metadata = await stateBox.getMetadata();
        this.handleSuccess(metadata, options, undefined, formatValue(metadata));
        return;
      }

      const value = await stateBox.getMetadata(key);
      if (value === undefined) {
        throw new Error(`Metadata key not found: ${key}`);
      }
      this.handleSuccess({ [key]: value }, options, undefined, formatValue(value));
    });
  }

  async executeSet(release: string, key: string, rawValue: string, options: MetadataSetOptions): Promise<void> {
    await this.run(options, async () => {
      const value = parseMetadataValue(rawValue);
      const stateBox = await this.getStateBox(release);
      await stateBox.updateMetadata({ [key]: value });
      const updated = await stateBox.getMetadata(key);

      this.handleSuccess({ [key]: updated }, options, `Metadata ${key} updated`, formatValue(updated));
    });
  }
}
