/**
 * Cleanup pipeline: load, merge folders, optionally flatten, write
 */

import { extname } from 'path';
import { DEFAULT_CONFIG } from './config.js';
import type { OutputConfig } from './config.js';
import { findDuplicateLinks } from './duplicate-resolver.js';
import { flattenFolder } from './flattener.js';
import { mergeFolders } from './folder-merger.js';
import { logger } from './logger.js';
import { loadBookmarkFile } from './netscape-parser.js';
import { writeBookmarkFile } from './netscape-writer.js';
import { calculateTreeStatistics } from './statistics.js';
import type { TreeStatistics } from './statistics.js';
import { collectLinks } from './types.js';
import type { BookmarkTree, CleanupMode, MergeScope } from './types.js';

export interface CleanupOptions {
  inputPath: string;
  mode: CleanupMode;
  /** Ignored in flatten-merge mode, which always merges globally */
  scope?: MergeScope;
  outputPath?: string;
  suffixes?: OutputConfig;
}

export interface TransformResult {
  scope: MergeScope;
  foldersMerged: number;
  duplicateLinksRemoved: number;
  foldersDiscarded: number;
}

export interface CleanupSummary extends TransformResult {
  mode: CleanupMode;
  inputPath: string;
  outputPath: string;
  bytesWritten: number;
  before: TreeStatistics;
  after: TreeStatistics;
}

/**
 * Insert `suffix` before the extension: bookmarks.html -> bookmarks.dedup.html.
 * A name without an extension gets the suffix appended.
 */
export function deriveOutputPath(inputPath: string, suffix: string): string {
  const extension = extname(inputPath);
  if (!extension) {
    return `${inputPath}${suffix}`;
  }
  return `${inputPath.slice(0, -extension.length)}${suffix}${extension}`;
}

export function suffixForMode(mode: CleanupMode, suffixes: OutputConfig = DEFAULT_CONFIG.output): string {
  return mode === 'flatten-merge' ? suffixes.flattenSuffix : suffixes.dedupeSuffix;
}

/**
 * In-memory transform for one mode. Mutates `tree`.
 */
export function transformTree(tree: BookmarkTree, mode: CleanupMode, scope: MergeScope = 'sibling'): TransformResult {
  const effectiveScope: MergeScope = mode === 'flatten-merge' ? 'global' : scope;

  if (logger.getMinLevel() === 'debug') {
    for (const group of findDuplicateLinks(collectLinks(tree.root))) {
      logger.debug(
        `Duplicate URL kept once: ${group.key}`,
        { kept: group.kept.title, dropped: group.dropped.map(link => link.title) },
        'BookmarkCleanup'
      );
    }
  }

  const merge = mergeFolders(tree.root, effectiveScope);
  const result: TransformResult = {
    scope: effectiveScope,
    foldersMerged: merge.foldersMerged,
    duplicateLinksRemoved: merge.linksDroppedInMerges + merge.linksDroppedGlobally,
    foldersDiscarded: 0,
  };

  if (mode === 'flatten-merge') {
    const flatten = flattenFolder(tree.root);
    result.foldersDiscarded = flatten.foldersDiscarded;
    result.duplicateLinksRemoved += flatten.duplicateLinksRemoved;
  }

  return result;
}

/**
 * Run one mode over one file. Nothing is written unless every step succeeds.
 */
export function cleanupBookmarkFile(options: CleanupOptions): CleanupSummary {
  const outputPath = options.outputPath ?? deriveOutputPath(options.inputPath, suffixForMode(options.mode, options.suffixes));

  logger.info(`Reading ${options.inputPath}`, { mode: options.mode }, 'BookmarkCleanup');
  const tree = loadBookmarkFile(options.inputPath);
  const before = calculateTreeStatistics(tree.root);

  const result = transformTree(tree, options.mode, options.scope);
  const after = calculateTreeStatistics(tree.root);

  const bytesWritten = writeBookmarkFile(outputPath, tree);
  logger.info(`Wrote ${outputPath}`, { links: after.links, folders: after.folders }, 'BookmarkCleanup');

  return {
    mode: options.mode,
    inputPath: options.inputPath,
    outputPath,
    bytesWritten,
    before,
    after,
    ...result,
  };
}
