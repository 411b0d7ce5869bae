// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Loader
 *
 * Functions for loading configuration files from disk.
 * Handles global and workspace configuration files.
 */

import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../logger.js';
import { DecklensPaths } from '../paths.js';
import type { WorkspaceConfig } from './types.js';

/**
 * Configuration file names (checked in order).
 */
export const CONFIG_FILES = ['.decklens.json', '.decklens/config.json', 'decklens.config.json'];

/**
 * Read and parse one config file. Returns null (with a warning) on parse errors.
 */
function readConfigFile(configPath: string): WorkspaceConfig | null {
  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      logger.warn(`Ignoring ${configPath}: expected a JSON object`);
      return null;
    }
    return parsed as WorkspaceConfig;
  } catch (error) {
    logger.warn(`Failed to parse ${configPath}: ${error instanceof Error ? error.message : error}`);
    return null;
  }
}

/**
 * Load global configuration from ~/.decklens/config.json.
 * @param overrideDir - Optional directory override for testing
 */
export function loadGlobalConfig(overrideDir?: string, env?: NodeJS.ProcessEnv): {
  config: WorkspaceConfig | null;
  configPath: string | null;
} {
  const configPath = overrideDir
    ? path.join(overrideDir, 'config.json')
    : DecklensPaths.globalConfig(env);

  if (fs.existsSync(configPath)) {
    return { config: readConfigFile(configPath), configPath };
  }
  return { config: null, configPath: null };
}

/**
 * Find and load workspace configuration from the given directory.
 * Searches for .decklens.json, .decklens/config.json, or decklens.config.json
 */
export function loadWorkspaceConfig(cwd: string = process.cwd()): {
  config: WorkspaceConfig | null;
  configPath: string | null;
} {
  for (const fileName of CONFIG_FILES) {
    const configPath = path.join(cwd, fileName);
    if (fs.existsSync(configPath)) {
      return { config: readConfigFile(configPath), configPath };
    }
  }
  return { config: null, configPath: null };
}

/**
 * Load configuration from an explicit path (the CLI's --config option).
 */
export function loadConfigFile(configPath: string): WorkspaceConfig | null {
  if (!fs.existsSync(configPath)) {
    logger.warn(`Config file not found: ${configPath}`);
    return null;
  }
  return readConfigFile(configPath);
}
