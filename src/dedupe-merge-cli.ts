#!/usr/bin/env node
/**
 * Dedupe-merge: merge same-named folders (sibling or global scope) and drop repeated URLs
 *
 * Usage:
 *   bookmark-dedupe-merge bookmarks.html [--merge-scope sibling|global] [-o out.html]
 */

// .env must be loaded before the logger reads LOG_LEVEL
import 'dotenv/config';
import { runCleanupCli } from './cleanup-cli.js';

process.exitCode = runCleanupCli(process.argv.slice(2), 'dedupe-merge');
