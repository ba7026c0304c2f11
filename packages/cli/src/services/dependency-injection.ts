import {
  createLogger,
  createStateBox,
  loadStateBoxConfig,
} from '@statebox/core';
import type { StateBox, StateBoxConfig, StateBoxConfigOverrides } from '@statebox/core';
import type { GlobalOptions } from '../interfaces/command';

/**
 * Dependency Injection Service for the StateBox CLI
 *
 * Resolves configuration once per process and hands out one StateBox per
 * release, so several commands in one run share a cache.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private overrides: StateBoxConfigOverrides = {};
  private config: StateBoxConfig | null = null;
  private readonly stateBoxes = new Map<string, StateBox>();

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Resets the singleton instance (useful for testing)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Applies global flags. Drops anything resolved with the previous flags.
   */
  configure(options: GlobalOptions): void {
    this.overrides = {
      ...(options.local ? { localDir: options.local } : {}),
      ...(options.repo ? { repository: options.repo } : {}),
      ...(options.branch ? { branch: options.branch } : {}),
    };
    this.config = null;
    this.stateBoxes.clear();
  }

  getConfig(): StateBoxConfig {
    if (!this.config) {
      this.config = loadStateBoxConfig(process.env, this.overrides);
    }
    return this.config;
  }

  /**
   * StateBox bound to `release` on the configured backend
   */
  async getStateBox(release: string): Promise<StateBox> {
    const existing = this.stateBoxes.get(release);
    if (existing) {
      return existing;
    }

    const stateBox = createStateBox(release, this.getConfig(), {
      logger: createLogger('[StateBox] ', undefined, 'warn'),
    });
    this.stateBoxes.set(release, stateBox);
    return stateBox;
  }
}
