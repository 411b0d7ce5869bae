// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Centralized path management.
 *
 * All ~/.decklens paths are defined here. DECKLENS_HOME overrides the base
 * directory (tests point it at a temporary directory).
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the base directory (~/.decklens unless DECKLENS_HOME is set).
 */
export function getDecklensHome(env: NodeJS.ProcessEnv = process.env): string {
  if (env.DECKLENS_HOME) {
    return env.DECKLENS_HOME;
  }
  return join(homedir(), '.decklens');
}

/**
 * Path getters, computed at call time so environment overrides apply.
 * Callers with their own environment (the CLI) pass it in.
 */
export const DecklensPaths = {
  home: (env?: NodeJS.ProcessEnv): string => getDecklensHome(env),

  /** Global config file (~/.decklens/config.json) */
  globalConfig: (env?: NodeJS.ProcessEnv): string => join(getDecklensHome(env), 'config.json'),

  /** Default data directory for persistent indexes */
  data: (env?: NodeJS.ProcessEnv): string => join(getDecklensHome(env), 'data'),

  /** Folder of one vectra collection */
  collection: (dataDir: string, collection: string): string => join(dataDir, 'index', collection),

  /** Manifest stored beside a collection folder */
  manifest: (dataDir: string, collection: string): string =>
    join(dataDir, 'index', `${collection}-manifest.json`),
};
