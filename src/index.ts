/**
 * Bookmark tidy: merge same-named folders, drop duplicate links and flatten
 * Netscape bookmark exports
 */

export * from './types.js';
export { resolveDuplicates, findDuplicateLinks, urlKey } from './duplicate-resolver.js';
export type { DuplicateGroup } from './duplicate-resolver.js';
export { mergeFolders, groupFoldersByName, dropDuplicateDirectLinks, dropDuplicateLinksInTree } from './folder-merger.js';
export type { MergeReport } from './folder-merger.js';
export { flattenFolder } from './flattener.js';
export type { FlattenReport } from './flattener.js';
export { parseBookmarksHtml, loadBookmarkFile } from './netscape-parser.js';
export { renderBookmarksHtml, writeBookmarkFile } from './netscape-writer.js';
export { writeFileAtomic } from './atomic-write.js';
export { calculateTreeStatistics } from './statistics.js';
export type { TreeStatistics } from './statistics.js';
export { cleanupBookmarkFile, transformTree, deriveOutputPath, suffixForMode } from './bookmark-cleanup.js';
export type { CleanupOptions, CleanupSummary, TransformResult } from './bookmark-cleanup.js';
export { ConfigManager, DEFAULT_CONFIG, resolveConfigPath } from './config.js';
export type { AppConfig, MergeConfig, OutputConfig } from './config.js';
export { AppError, Logger, logger } from './logger.js';
export type { ErrorCode, LogLevel } from './logger.js';
