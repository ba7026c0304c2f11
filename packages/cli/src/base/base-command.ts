/**
 * Base Command Class for the StateBox CLI
 *
 * Shared output and error handling. Commands resolve StateBox instances
 * through the dependency service so tests can swap them.
 */

import type { Command } from 'commander';
import { isStateBoxError } from '@statebox/core';
import type { StateBox } from '@statebox/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand {

  protected readonly dependencyService = DependencyInjectionService.getInstance();

  /**
   * Register the command with Commander.js
   */
  abstract register(program: Command): void;

  protected async getStateBox(release: string): Promise<StateBox> {
    return this.dependencyService.getStateBox(release);
  }

  /**
   * Runs a command body, routing any failure through handleError
   */
  protected async run(options: TOptions, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      this.handleError(describeError(error), options, error instanceof Error ? error : undefined);
    }
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        ...(isStateBoxError(error) ? { detail: error.detail } : {}),
        exitCode
      }, null, 2));
    } else {
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (isVerbose && error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently.
   * `text` is the human rendering of `data`; JSON mode prints `data` instead.
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string, text?: string): void {
    const isJson = options.json || false;
    const isQuiet = options.quiet || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
      return;
    }
    if (isQuiet) {
      return;
    }
    if (message) {
      console.log(`✅ ${message}`);
    }
    if (text) {
      console.log(text);
    }
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
