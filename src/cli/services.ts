/**
 * CLI Services
 *
 * What the commands need from the rest of the application. The program
 * is created with {@link defaultServices}; tests pass in-memory fakes.
 *
 * @module cli/services
 */

import { loadConfig, type AppConfig } from '../config/index.js';
import type { Logger } from '../logging/index.js';
import type { PipelineDependencies } from '../pipeline/index.js';
import type { PriceLookup } from '../purchasing/index.js';

export interface CliServices {
  loadConfig(): AppConfig;
  createPipelineDependencies(config: AppConfig, logger: Logger): Promise<PipelineDependencies>;
  createPriceLookup(): Promise<PriceLookup>;
}

/**
 * Real configuration and clients. The Gemini, transcript and Yahoo Finance
 * SDKs load on first use.
 */
export const defaultServices: CliServices = {
  loadConfig: () => loadConfig(),

  async createPipelineDependencies(config, logger) {
    const { createPipelineDependencies } = await import('../pipeline/dependencies.js');
    return createPipelineDependencies(config, logger);
  },

  async createPriceLookup() {
    const { createPriceLookup } = await import('../pipeline/dependencies.js');
    return createPriceLookup();
  },
};
