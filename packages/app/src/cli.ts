#!/usr/bin/env node

/**
 * CLI entry point for the barvault command
 */

import 'dotenv/config';
import { runCli } from './program.js';

process.exitCode = await runCli(process.argv.slice(2), { attachGlobalHandlers: true });
