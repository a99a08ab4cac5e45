#!/usr/bin/env node
/**
 * Flatten-merge: merge folders globally, then drop every folder and keep each URL once
 *
 * Usage:
 *   bookmark-flatten-merge bookmarks.html [-o out.html]
 */

// .env must be loaded before the logger reads LOG_LEVEL
import 'dotenv/config';
import { runCleanupCli } from './cleanup-cli.js';

process.exitCode = runCleanupCli(process.argv.slice(2), 'flatten-merge');
