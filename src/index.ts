#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { runCli } from './cli/program.js';

const exitCode = await runCli(process.argv, {
  out: (line) => process.stdout.write(line + '\n'),
  cwd: process.cwd(),
  env: process.env,
});
process.exitCode = exitCode;
