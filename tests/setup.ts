// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Vitest global setup.
 *
 * Points DECKLENS_HOME at a throwaway directory so no test reads or writes
 * the user's ~/.decklens, and turns off colors so formatted output can be
 * compared as plain text.
 */

import chalk from 'chalk';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

process.env.DECKLENS_HOME = fs.mkdtempSync(path.join(os.tmpdir(), 'decklens-home-'));
delete process.env.OPENAI_API_KEY;
delete process.env.ANTHROPIC_API_KEY;
chalk.level = 0;
