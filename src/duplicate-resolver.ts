/**
 * Link deduplication by URL
 * First-seen-wins: the earliest link for a URL keeps its position and metadata.
 */

import type { BookmarkLink } from './types.js';

export interface DuplicateGroup {
  key: string;
  kept: BookmarkLink;
  dropped: BookmarkLink[];
}

/**
 * Comparison key for a URL. Only surrounding whitespace is ignored;
 * `https://a.example` and `https://a.example/` stay distinct.
 */
export function urlKey(url: string): string {
  return url.trim();
}

/**
 * Keep at most one link per URL key, in input order. The input is not mutated.
 */
export function resolveDuplicates(links: readonly BookmarkLink[]): BookmarkLink[] {
  const seen = new Set<string>();
  const kept: BookmarkLink[] = [];

  for (const link of links) {
    const key = urlKey(link.url);
    if (seen.has(key)) continue;
    seen.add(key);
    kept.push(link);
  }

  return kept;
}

/**
 * URLs that occur more than once, with the link that survives and the ones that don't
 */
export function findDuplicateLinks(links: readonly BookmarkLink[]): DuplicateGroup[] {
  const groups = new Map<string, DuplicateGroup>();

  for (const link of links) {
    const key = urlKey(link.url);
    const group = groups.get(key);
    if (group) {
      group.dropped.push(link);
    } else {
      groups.set(key, { key, kept: link, dropped: [] });
    }
  }

  return [...groups.values()].filter(group => group.dropped.length > 0);
}
