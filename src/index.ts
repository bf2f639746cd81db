#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Usage:
 *   Production: node dist/index.js <dir>
 *   Development: npx tsx src/index.ts <dir>
 */

import { runCli } from './cli.js';

process.exitCode = runCli(process.argv.slice(2));
