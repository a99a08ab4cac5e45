/**
 * Core types for the bookmark tree
 */

export type MergeScope = 'sibling' | 'global';

export const MERGE_SCOPES: readonly MergeScope[] = ['sibling', 'global'];

export type CleanupMode = 'dedupe-merge' | 'flatten-merge';

/**
 * Markup attributes carried through unchanged, keyed by lower-case name, in source order.
 * The writer emits them after HREF and ADD_DATE and before ICON, so ICON always ends up last.
 */
export type PassThroughAttributes = Record<string, string>;

export interface BookmarkLink {
  kind: 'link';
  title: string;
  url: string;
  addedAt?: string;
  iconData?: string;
  description?: string;
  attributes: PassThroughAttributes;
}

export interface BookmarkFolder {
  kind: 'folder';
  name: string;
  children: BookmarkNode[];
  addedAt?: string;
  description?: string;
  attributes: PassThroughAttributes;
}

export type BookmarkNode = BookmarkLink | BookmarkFolder;

export interface BookmarkTree {
  title: string;
  root: BookmarkFolder;
}

export function isMergeScope(value: unknown): value is MergeScope {
  return typeof value === 'string' && MERGE_SCOPES.some(candidate => candidate === value);
}

export function isFolder(node: BookmarkNode): node is BookmarkFolder {
  return node.kind === 'folder';
}

export function isLink(node: BookmarkNode): node is BookmarkLink {
  return node.kind === 'link';
}

export function createFolder(
  name: string,
  children: BookmarkNode[] = [],
  extra: Partial<Omit<BookmarkFolder, 'kind' | 'name' | 'children'>> = {}
): BookmarkFolder {
  return {
    kind: 'folder',
    name,
    children,
    addedAt: extra.addedAt,
    description: extra.description,
    attributes: extra.attributes ?? {},
  };
}

export function createLink(
  title: string,
  url: string,
  extra: Partial<Omit<BookmarkLink, 'kind' | 'title' | 'url'>> = {}
): BookmarkLink {
  return {
    kind: 'link',
    title,
    url,
    addedAt: extra.addedAt,
    iconData: extra.iconData,
    description: extra.description,
    attributes: extra.attributes ?? {},
  };
}

/**
 * Every link under `folder`, depth-first pre-order (document order)
 */
export function collectLinks(folder: BookmarkFolder): BookmarkLink[] {
  const links: BookmarkLink[] = [];
  const visit = (current: BookmarkFolder) => {
    for (const child of current.children) {
      if (child.kind === 'link') {
        links.push(child);
      } else {
        visit(child);
      }
    }
  };
  visit(folder);
  return links;
}
