// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Module
 *
 * - types.ts     - Type definitions (WorkspaceConfig, ResolvedConfig, PipelineConfig)
 * - loader.ts    - File I/O (config file discovery and parsing)
 * - validator.ts - Warnings and fatal ConfigError checks
 * - merger.ts    - Config merging with priority handling, freezing
 *
 * Usage:
 *   import { resolveConfig } from './config/index.js';
 *   const config = resolveConfig({ cwd: process.cwd() });
 */

import { logger } from '../logger.js';
import { loadConfigFile, loadGlobalConfig, loadWorkspaceConfig } from './loader.js';
import { freezeConfig, mergeConfig, type CLIOptions } from './merger.js';
import { assertValidConfig, validateConfig } from './validator.js';
import type { PipelineConfig } from './types.js';

export type {
  ChunkStrategy,
  EmbeddingProviderName,
  GenerationProviderName,
  IndexBackend,
  WorkspaceConfig,
  ResolvedConfig,
  PipelineConfig,
} from './types.js';

export {
  CONFIG_FILES,
  loadGlobalConfig,
  loadWorkspaceConfig,
  loadConfigFile,
} from './loader.js';

export { validateConfig, assertValidConfig, assertWindow } from './validator.js';

export { getDefaultConfig, mergeConfig, freezeConfig } from './merger.js';
export type { CLIOptions } from './merger.js';

/**
 * Load, merge, validate and freeze configuration in one step.
 * Warnings are logged; fatal problems throw ConfigError.
 */
export function resolveConfig(options: {
  cwd?: string;
  configPath?: string;
  globalDir?: string;
  cli?: CLIOptions;
  /** Environment for DECKLENS_HOME (default: process.env) */
  env?: NodeJS.ProcessEnv;
} = {}): PipelineConfig {
  const global = loadGlobalConfig(options.globalDir, options.env).config;
  const workspace = options.configPath
    ? loadConfigFile(options.configPath)
    : loadWorkspaceConfig(options.cwd).config;

  for (const layer of [global, workspace]) {
    if (!layer) continue;
    for (const warning of validateConfig(layer)) {
      logger.warn(warning);
    }
  }

  const resolved = mergeConfig(global, workspace, options.cli, options.env);
  assertValidConfig(resolved);
  return freezeConfig(resolved);
}
