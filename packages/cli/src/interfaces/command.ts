import type { Command } from 'commander';

/**
 * Program-level flags selecting the backend; applied before any subcommand runs.
 */
export interface GlobalOptions {
  /** Directory for the filesystem backend (wins over GitHub settings) */
  local?: string;
  /** owner/repo on GitHub */
  repo?: string;
  branch?: string;
}

/**
 * Output flags shared by every subcommand
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export interface ICommand {
  register(program: Command): void;
}
