/**
 * Render a bookmark tree back to Netscape bookmark markup
 */

import { writeFileAtomic } from './atomic-write.js';
import type { BookmarkFolder, BookmarkLink, BookmarkNode, BookmarkTree, PassThroughAttributes } from './types.js';

const INDENT = '    ';

const HEADER = [
  '<!DOCTYPE NETSCAPE-Bookmark-file-1>',
  '<!-- This is an automatically generated file.',
  '     It will be read and overwritten.',
  '     DO NOT EDIT! -->',
  '<META HTTP-EQUIV="Content-Type" CONTENT="text/html; charset=UTF-8">',
];

export function escapeText(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

export function escapeAttribute(value: string): string {
  return escapeText(value).replace(/"/g, '&quot;');
}

function renderAttributes(attributes: Array<[string, string | undefined]>): string {
  return attributes
    .filter((entry): entry is [string, string] => entry[1] !== undefined)
    .map(([name, value]) => ` ${name.toUpperCase()}="${escapeAttribute(value)}"`)
    .join('');
}

function passThrough(attributes: PassThroughAttributes): Array<[string, string]> {
  return Object.entries(attributes);
}

function folderAttributes(folder: BookmarkFolder): string {
  return renderAttributes([['add_date', folder.addedAt], ...passThrough(folder.attributes)]);
}

function linkAttributes(link: BookmarkLink): string {
  return renderAttributes([
    ['href', link.url],
    ['add_date', link.addedAt],
    ...passThrough(link.attributes),
    ['icon', link.iconData],
  ]);
}

function renderNode(node: BookmarkNode, depth: number, lines: string[]): void {
  const pad = INDENT.repeat(depth);

  if (node.kind === 'link') {
    lines.push(`${pad}<DT><A${linkAttributes(node)}>${escapeText(node.title)}</A>`);
    if (node.description) {
      lines.push(`${pad}<DD>${escapeText(node.description)}`);
    }
    return;
  }

  lines.push(`${pad}<DT><H3${folderAttributes(node)}>${escapeText(node.name)}</H3>`);
  if (node.description) {
    lines.push(`${pad}<DD>${escapeText(node.description)}`);
  }
  lines.push(`${pad}<DL><p>`);
  for (const child of node.children) {
    renderNode(child, depth + 1, lines);
  }
  lines.push(`${pad}</DL><p>`);
}

/**
 * Deterministic rendering: the same tree always yields the same text
 */
export function renderBookmarksHtml(tree: BookmarkTree): string {
  const { root } = tree;
  const lines = [
    ...HEADER,
    `<TITLE>${escapeText(tree.title)}</TITLE>`,
    `<H1${folderAttributes(root)}>${escapeText(root.name)}</H1>`,
    '<DL><p>',
  ];
  for (const child of root.children) {
    renderNode(child, 1, lines);
  }
  lines.push('</DL><p>');
  return lines.join('\n') + '\n';
}

/**
 * Serialize and commit the tree to `outputPath`. Returns the byte count written.
 */
export function writeBookmarkFile(outputPath: string, tree: BookmarkTree): number {
  const html = renderBookmarksHtml(tree);
  writeFileAtomic(outputPath, html);
  return Buffer.byteLength(html, 'utf-8');
}
