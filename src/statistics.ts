import { urlKey } from './duplicate-resolver.js';
import type { BookmarkFolder } from './types.js';

export interface TreeStatistics {
  folders: number;
  links: number;
  distinctUrls: number;
}

/**
 * Counts below the root; the root folder itself is not counted
 */
export function calculateTreeStatistics(root: BookmarkFolder): TreeStatistics {
  const urls = new Set<string>();
  let folders = 0;
  let links = 0;

  const walk = (folder: BookmarkFolder) => {
    for (const child of folder.children) {
      if (child.kind === 'folder') {
        folders++;
        walk(child);
      } else {
        links++;
        urls.add(urlKey(child.url));
      }
    }
  };
  walk(root);

  return { folders, links, distinctUrls: urls.size };
}
