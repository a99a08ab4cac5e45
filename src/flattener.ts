/**
 * Collapse a merged tree into a single folder of links
 */

import { logger } from './logger.js';
import { resolveDuplicates } from './duplicate-resolver.js';
import { collectLinks } from './types.js';
import type { BookmarkFolder } from './types.js';

export interface FlattenReport {
  linksCollected: number;
  foldersDiscarded: number;
  duplicateLinksRemoved: number;
}

function countFolders(folder: BookmarkFolder): number {
  let count = 0;
  for (const child of folder.children) {
    if (child.kind === 'folder') {
      count += 1 + countFolders(child);
    }
  }
  return count;
}

/**
 * Replace the root's children with every link of the tree in document order,
 * one per URL. The root keeps its own name and metadata; every other folder is dropped.
 */
export function flattenFolder(root: BookmarkFolder): FlattenReport {
  const links = collectLinks(root);
  const foldersDiscarded = countFolders(root);
  const unique = resolveDuplicates(links);

  root.children = unique;

  const report: FlattenReport = {
    linksCollected: links.length,
    foldersDiscarded,
    duplicateLinksRemoved: links.length - unique.length,
  };
  logger.debug('Flatten complete', { ...report }, 'Flattener');
  return report;
}
