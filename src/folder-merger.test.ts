import { describe, it, expect } from 'vitest';
import {
  dropDuplicateDirectLinks,
  dropDuplicateLinksInTree,
  groupFoldersByName,
  mergeFolders,
} from './folder-merger.js';
import { calculateTreeStatistics } from './statistics.js';
import { createFolder, createLink } from './types.js';
import type { BookmarkFolder } from './types.js';

type Outline = Array<string | { [name: string]: Outline }>;

/** Link titles and folder names, nested */
function outline(folder: BookmarkFolder): Outline {
  return folder.children.map(child =>
    child.kind === 'link' ? child.title : { [child.name]: outline(child) }
  );
}

const link = (title: string, host: string) => createLink(title, `https://${host}.example/`);

describe('Folder Merger', () => {
  describe('groupFoldersByName', () => {
    it('should keep first-appearance order of groups and members', () => {
      const work1 = createFolder('Work');
      const home = createFolder('Home');
      const work2 = createFolder('Work');

      const groups = groupFoldersByName([work1, home, work2]);

      expect([...groups.keys()]).toEqual(['Work', 'Home']);
      expect(groups.get('Work')).toEqual([work1, work2]);
    });
  });

  describe('sibling scope', () => {
    it('should merge sibling folders and drop the repeated link', () => {
      const root = createFolder('root', [
        createFolder('Work', [link('A', 'a'), link('B', 'b')]),
        createFolder('Work', [link('B again', 'b'), link('C', 'c')]),
      ]);

      const report = mergeFolders(root, 'sibling');

      expect(outline(root)).toEqual([{ Work: ['A', 'B', 'C'] }]);
      expect(report).toEqual({
        scope: 'sibling',
        foldersMerged: 1,
        linksDroppedInMerges: 1,
        linksDroppedGlobally: 0,
      });
    });

    it('should keep the name and metadata of the first folder', () => {
      const first = createFolder('Work', [], { addedAt: '100', attributes: { last_modified: '150' } });
      const second = createFolder('Work', [], { addedAt: '200', attributes: { last_modified: '250' } });
      const root = createFolder('root', [first, second]);

      mergeFolders(root, 'sibling');

      expect(root.children).toEqual([first]);
      expect(first.addedAt).toBe('100');
      expect(first.attributes).toEqual({ last_modified: '150' });
    });

    it('should merge three or more same-named siblings in order', () => {
      const root = createFolder('root', [
        createFolder('Work', [link('A', 'a')]),
        createFolder('Work', [link('B', 'b')]),
        createFolder('Work', [link('C', 'c')]),
      ]);

      const report = mergeFolders(root, 'sibling');

      expect(outline(root)).toEqual([{ Work: ['A', 'B', 'C'] }]);
      expect(report.foldersMerged).toBe(2);
    });

    it('should leave same-named folders under different parents alone', () => {
      const root = createFolder('root', [
        createFolder('Work', [link('A', 'a')]),
        createFolder('X', [
          createFolder('Y', [createFolder('Z', [createFolder('Work', [link('D', 'd')])])]),
        ]),
      ]);

      const report = mergeFolders(root, 'sibling');

      expect(outline(root)).toEqual([
        { Work: ['A'] },
        { X: [{ Y: [{ Z: [{ Work: ['D'] }] }] }] },
      ]);
      expect(report.foldersMerged).toBe(0);
    });

    it('should merge subfolders brought together by a merge', () => {
      const root = createFolder('root', [
        createFolder('Work', [createFolder('Sub', [link('A', 'a')])]),
        createFolder('Work', [createFolder('Sub', [link('B', 'b'), link('A again', 'a')])]),
      ]);

      const report = mergeFolders(root, 'sibling');

      expect(outline(root)).toEqual([{ Work: [{ Sub: ['A', 'B'] }] }]);
      expect(report.foldersMerged).toBe(2);
      expect(report.linksDroppedInMerges).toBe(1);
    });

    it('should compare names case-sensitively', () => {
      const root = createFolder('root', [
        createFolder('Work', [link('A', 'a')]),
        createFolder('work', [link('B', 'b')]),
      ]);

      mergeFolders(root, 'sibling');

      expect(outline(root)).toEqual([{ Work: ['A'] }, { work: ['B'] }]);
    });

    it('should keep links in place around the merged folder', () => {
      const root = createFolder('root', [
        link('L1', 'l1'),
        createFolder('Work', [link('A', 'a')]),
        link('L2', 'l2'),
        createFolder('Work', [link('B', 'b')]),
        link('L3', 'l3'),
      ]);

      mergeFolders(root, 'sibling');

      expect(outline(root)).toEqual(['L1', { Work: ['A', 'B'] }, 'L2', 'L3']);
    });

    it('should remove duplicates from unrelated branches in the final pass', () => {
      const root = createFolder('root', [
        createFolder('X', [link('A', 'a')]),
        createFolder('Y', [link('A elsewhere', 'a')]),
      ]);

      const report = mergeFolders(root, 'sibling');

      expect(outline(root)).toEqual([{ X: ['A'] }, { Y: [] }]);
      expect(report.linksDroppedGlobally).toBe(1);
    });

    it('should keep empty folders', () => {
      const root = createFolder('root', [createFolder('Old'), link('A', 'a')]);

      mergeFolders(root, 'sibling');

      expect(outline(root)).toEqual([{ Old: [] }, 'A']);
    });
  });

  describe('global scope', () => {
    it('should merge a deeply nested folder into the first occurrence', () => {
      const root = createFolder('root', [
        createFolder('Work', [link('A', 'a')]),
        createFolder('X', [
          createFolder('Y', [createFolder('Z', [createFolder('Work', [link('D', 'd')])])]),
        ]),
      ]);

      const report = mergeFolders(root, 'global');

      expect(outline(root)).toEqual([
        { Work: ['A', 'D'] },
        { X: [{ Y: [{ Z: [] }] }] },
      ]);
      expect(report.foldersMerged).toBe(1);
    });

    it('should place the merged folder where the name first appears', () => {
      const root = createFolder('root', [
        createFolder('X', [createFolder('Work', [link('A', 'a')])]),
        createFolder('Work', [link('B', 'b')]),
      ]);

      mergeFolders(root, 'global');

      expect(outline(root)).toEqual([{ X: [{ Work: ['A', 'B'] }] }]);
    });

    it('should absorb a same-named folder nested inside the survivor', () => {
      const root = createFolder('root', [
        createFolder('Work', [link('A', 'a'), createFolder('Work', [link('B', 'b')])]),
      ]);

      mergeFolders(root, 'global');

      expect(outline(root)).toEqual([{ Work: ['A', 'B'] }]);
    });

    it('should resolve interleaved groups', () => {
      const root = createFolder('root', [
        createFolder('A', [createFolder('B', [link('p', 'p')])]),
        createFolder('A', [createFolder('B', [link('q', 'q')]), link('r', 'r')]),
      ]);

      const report = mergeFolders(root, 'global');

      expect(outline(root)).toEqual([{ A: [{ B: ['p', 'q'] }, 'r'] }]);
      expect(report.foldersMerged).toBe(2);
    });

    it('should never treat the root as a merge candidate', () => {
      const root = createFolder('Bookmarks', [createFolder('Bookmarks', [link('A', 'a')])]);

      mergeFolders(root, 'global');

      expect(outline(root)).toEqual([{ Bookmarks: ['A'] }]);
    });
  });

  describe('invariants', () => {
    const buildMessyTree = () =>
      createFolder('root', [
        createFolder('Work', [link('A', 'a'), link('B', 'b')]),
        createFolder('Reading', [link('C', 'c'), createFolder('Work', [link('A copy', 'a')])]),
        createFolder('Work', [link('D', 'd'), link('B copy', 'b')]),
        link('C copy', 'c'),
      ]);

    it.each(['sibling', 'global'] as const)('should be idempotent with %s scope', scope => {
      const root = buildMessyTree();
      mergeFolders(root, scope);
      const once = outline(root);

      const second = mergeFolders(root, scope);

      expect(outline(root)).toEqual(once);
      expect(second.foldersMerged).toBe(0);
      expect(second.linksDroppedInMerges + second.linksDroppedGlobally).toBe(0);
    });

    it.each(['sibling', 'global'] as const)('should keep exactly one link per input URL with %s scope', scope => {
      const root = buildMessyTree();
      const before = calculateTreeStatistics(root);

      mergeFolders(root, scope);
      const after = calculateTreeStatistics(root);

      expect(before.links).toBe(7);
      expect(after.links).toBe(before.distinctUrls);
      expect(after.distinctUrls).toBe(before.distinctUrls);
    });
  });

  describe('link passes', () => {
    it('should drop repeated direct links but leave subfolders untouched', () => {
      const nested = createFolder('Nested', [link('A nested', 'a')]);
      const folder = createFolder('F', [link('A', 'a'), nested, link('A again', 'a')]);

      expect(dropDuplicateDirectLinks(folder)).toBe(1);
      expect(outline(folder)).toEqual(['A', { Nested: ['A nested'] }]);
    });

    it('should drop repeated links across the whole tree in document order', () => {
      const root = createFolder('root', [
        createFolder('F', [link('A nested', 'a')]),
        link('A', 'a'),
      ]);

      expect(dropDuplicateLinksInTree(root)).toBe(1);
      expect(outline(root)).toEqual([{ F: ['A nested'] }]);
    });
  });
});
