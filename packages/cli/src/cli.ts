#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   longflag --file scores.csv --id Person --time Time --value Score --threshold 3
 *   longflag --config ./longflag.json
 */

import { runCli } from './run.js';

process.exitCode = await runCli(process.argv.slice(2));
