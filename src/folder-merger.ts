/**
 * Same-name folder merging
 *
 * Folders are matched by exact name, either among siblings or across the whole
 * tree. The first folder of a group survives in place, keeps its own name and
 * metadata, and receives the children of the others in document order. A final
 * pass drops repeated URLs across the entire tree whatever the scope.
 */

import { logger } from './logger.js';
import { resolveDuplicates } from './duplicate-resolver.js';
import { collectLinks, isFolder, isLink } from './types.js';
import type { BookmarkFolder, BookmarkLink, MergeScope } from './types.js';

export interface MergeReport {
  scope: MergeScope;
  foldersMerged: number;
  linksDroppedInMerges: number;
  linksDroppedGlobally: number;
}

/**
 * Group folders by name: groups in first-appearance order, members in input order
 */
export function groupFoldersByName(folders: Iterable<BookmarkFolder>): Map<string, BookmarkFolder[]> {
  const groups = new Map<string, BookmarkFolder[]>();
  for (const folder of folders) {
    const group = groups.get(folder.name);
    if (group) {
      group.push(folder);
    } else {
      groups.set(folder.name, [folder]);
    }
  }
  return groups;
}

/**
 * Run the duplicate resolver over a folder's direct links. Subfolders keep their place.
 * Returns the number of links removed.
 */
export function dropDuplicateDirectLinks(folder: BookmarkFolder): number {
  const kept = new Set(resolveDuplicates(folder.children.filter(isLink)));
  const before = folder.children.length;
  folder.children = folder.children.filter(child => child.kind === 'folder' || kept.has(child));
  return before - folder.children.length;
}

/**
 * Global first-seen-wins pass over every link under `root`, in document order.
 * Returns the number of links removed.
 */
export function dropDuplicateLinksInTree(root: BookmarkFolder): number {
  const kept = new Set(resolveDuplicates(collectLinks(root)));
  return pruneLinks(root, kept);
}

function pruneLinks(folder: BookmarkFolder, kept: Set<BookmarkLink>): number {
  let removed = 0;
  folder.children = folder.children.filter(child => {
    if (child.kind === 'folder') {
      removed += pruneLinks(child, kept);
      return true;
    }
    if (kept.has(child)) return true;
    removed++;
    return false;
  });
  return removed;
}

/**
 * Merge same-name folders under `root` in place
 */
export function mergeFolders(root: BookmarkFolder, scope: MergeScope): MergeReport {
  const report: MergeReport = {
    scope,
    foldersMerged: 0,
    linksDroppedInMerges: 0,
    linksDroppedGlobally: 0,
  };

  if (scope === 'sibling') {
    mergeSiblingFolders(root, report);
  } else {
    mergeGlobalFolders(root, report);
  }

  report.linksDroppedGlobally = dropDuplicateLinksInTree(root);

  logger.debug('Folder merge complete', { ...report }, 'FolderMerger');
  return report;
}

/**
 * Post-order: a folder's subtree is merged before its own children are grouped
 */
function mergeSiblingFolders(folder: BookmarkFolder, report: MergeReport): void {
  for (const child of folder.children) {
    if (child.kind === 'folder') {
      mergeSiblingFolders(child, report);
    }
  }

  const groups = groupFoldersByName(folder.children.filter(isFolder));
  const absorbed = new Set<BookmarkFolder>();

  for (const [survivor, ...rest] of groups.values()) {
    if (rest.length === 0) continue;

    for (const duplicate of rest) {
      survivor.children.push(...duplicate.children);
      absorbed.add(duplicate);
    }
    report.foldersMerged += rest.length;

    // Concatenation can bring same-name subfolders and repeated URLs together
    mergeSiblingFolders(survivor, report);
    report.linksDroppedInMerges += dropDuplicateDirectLinks(survivor);
  }

  if (absorbed.size > 0) {
    folder.children = folder.children.filter(child => child.kind === 'link' || !absorbed.has(child));
  }
}

/**
 * Every folder below the root is grouped by name in document pre-order. Moves only
 * ever hand children to a folder that came earlier in the document, so no folder
 * can end up inside its own subtree.
 */
function mergeGlobalFolders(root: BookmarkFolder, report: MergeReport): void {
  const parents = new Map<BookmarkFolder, BookmarkFolder>();
  const ordered: BookmarkFolder[] = [];

  const visit = (folder: BookmarkFolder) => {
    for (const child of folder.children) {
      if (child.kind === 'folder') {
        parents.set(child, folder);
        ordered.push(child);
        visit(child);
      }
    }
  };
  visit(root);

  for (const [survivor, ...rest] of groupFoldersByName(ordered).values()) {
    if (rest.length === 0) continue;

    for (const duplicate of rest) {
      const parent = parents.get(duplicate);
      if (parent) {
        parent.children = parent.children.filter(child => child !== duplicate);
      }
      for (const child of duplicate.children) {
        if (child.kind === 'folder') {
          parents.set(child, survivor);
        }
      }
      survivor.children.push(...duplicate.children);
      duplicate.children = [];
    }
    report.foldersMerged += rest.length;
    report.linksDroppedInMerges += dropDuplicateDirectLinks(survivor);
  }
}
