/**
 * Netscape bookmark file loader
 *
 *   <DL><p>
 *     <DT><H3 ADD_DATE="...">Folder</H3>
 *     <DL><p>...</DL><p>
 *     <DT><A HREF="..." ADD_DATE="...">Title</A>
 *     <DD>Optional description
 *   </DL><p>
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { Parser } from 'htmlparser2';
import { AppError, describeError, logger } from './logger.js';
import { createFolder, createLink } from './types.js';
import type { BookmarkFolder, BookmarkNode, BookmarkTree, PassThroughAttributes } from './types.js';

// Elements that must be closed explicitly for the document to count as well formed
const STRICT_ELEMENTS = new Set(['a', 'h3', 'dl', 'h1', 'title']);

type TextTarget = 'title' | 'heading' | 'folder' | 'link' | 'description' | 'ignored';

interface TextCapture {
  target: TextTarget;
  attributes: Record<string, string>;
  buffer: string;
  owner?: BookmarkNode;
}

function splitAttributes(
  attribs: Record<string, string>,
  structural: readonly string[]
): PassThroughAttributes {
  const rest: PassThroughAttributes = {};
  for (const [name, value] of Object.entries(attribs)) {
    if (!structural.includes(name)) {
      rest[name] = value;
    }
  }
  return rest;
}

/**
 * Builds the tree from parser events. Kept as a class so state mutated from
 * parser callbacks stays visible to the code that runs after `end()`.
 */
class BookmarkTreeBuilder {
  readonly root: BookmarkFolder = createFolder('');
  title = '';
  skippedAnchors = 0;
  separators = 0;
  problems: string[] = [];

  private lists: BookmarkFolder[] = [];
  private sawList = false;
  private pendingFolder: BookmarkFolder | null = null;
  // Owner of a following <DD>; null after a skipped anchor or at the start of a list
  private lastNode: BookmarkNode | null = null;
  private capture: TextCapture | null = null;

  private get currentFolder(): BookmarkFolder {
    return this.lists[this.lists.length - 1] ?? this.root;
  }

  openTag(name: string, attribs: Record<string, string>): void {
    this.finishDescription();

    switch (name) {
      case 'title':
        this.startCapture('title', attribs);
        break;
      case 'h1':
        this.startCapture('heading', attribs);
        break;
      case 'h3':
        this.flushPendingFolder();
        this.startCapture('folder', attribs);
        break;
      case 'a':
        this.flushPendingFolder();
        this.startCapture('link', attribs);
        break;
      case 'dd': {
        const owner = this.pendingFolder ?? this.lastNode;
        if (owner) {
          this.capture = { target: 'description', attributes: {}, buffer: '', owner };
        }
        break;
      }
      case 'dl':
        this.sawList = true;
        if (this.pendingFolder) {
          this.currentFolder.children.push(this.pendingFolder);
          this.lists.push(this.pendingFolder);
          this.pendingFolder = null;
        } else {
          // A list without a heading belongs to the enclosing folder
          this.lists.push(this.currentFolder);
        }
        this.lastNode = null;
        break;
      case 'hr':
        this.separators++;
        break;
    }
  }

  text(data: string): void {
    if (this.capture) {
      this.capture.buffer += data;
    }
  }

  closeTag(name: string, isImplied: boolean): void {
    if (STRICT_ELEMENTS.has(name) && isImplied) {
      this.problems.push(`Unterminated <${name.toUpperCase()}> element`);
      return;
    }

    switch (name) {
      case 'title':
      case 'h1':
      case 'h3':
      case 'a':
        this.finishCapture();
        break;
      case 'dd':
        this.finishDescription();
        break;
      case 'dl':
        this.finishDescription();
        this.flushPendingFolder();
        this.lists.pop();
        this.lastNode = this.currentFolder.children[this.currentFolder.children.length - 1] ?? null;
        break;
    }
  }

  finish(): void {
    this.finishDescription();
    this.flushPendingFolder();
    if (!this.sawList) {
      this.problems.push('No bookmark list (<DL>) found');
    }
  }

  private startCapture(target: TextTarget, attributes: Record<string, string>): void {
    this.capture = { target, attributes, buffer: '' };
  }

  private finishCapture(): void {
    const capture = this.capture;
    if (!capture || capture.target === 'description') return;
    this.capture = null;

    const text = capture.buffer.trim();
    const attributes = capture.attributes;

    switch (capture.target) {
      case 'title':
        this.title = text;
        break;
      case 'heading':
        this.root.name = text;
        this.root.addedAt = attributes.add_date;
        this.root.attributes = splitAttributes(attributes, ['add_date']);
        break;
      case 'folder':
        this.pendingFolder = createFolder(text, [], {
          addedAt: attributes.add_date,
          attributes: splitAttributes(attributes, ['add_date']),
        });
        break;
      case 'link': {
        const url = attributes.href ?? '';
        if (url.trim() === '') {
          this.skippedAnchors++;
          this.lastNode = null;
          logger.warn('Skipping anchor without HREF', { title: text }, 'NetscapeParser');
          break;
        }
        this.appendNode(
          createLink(text, url, {
            addedAt: attributes.add_date,
            iconData: attributes.icon,
            attributes: splitAttributes(attributes, ['href', 'add_date', 'icon']),
          })
        );
        break;
      }
    }
  }

  private finishDescription(): void {
    const capture = this.capture;
    if (!capture || capture.target !== 'description' || !capture.owner) return;
    this.capture = null;

    const text = capture.buffer.trim();
    if (text) {
      capture.owner.description = text;
    }
  }

  private flushPendingFolder(): void {
    if (this.pendingFolder) {
      // Heading with no list: an empty folder
      this.appendNode(this.pendingFolder);
      this.pendingFolder = null;
    }
  }

  private appendNode(node: BookmarkNode): void {
    this.currentFolder.children.push(node);
    this.lastNode = node;
  }
}

/**
 * Parse Netscape bookmark markup into a tree.
 * Throws MALFORMED_INPUT when the markup is not a complete folder/link tree.
 */
export function parseBookmarksHtml(html: string, source = 'input'): BookmarkTree {
  const builder = new BookmarkTreeBuilder();

  const parser = new Parser(
    {
      onopentag(name, attribs) {
        builder.openTag(name, attribs);
      },
      ontext(data) {
        builder.text(data);
      },
      onclosetag(name, isImplied) {
        builder.closeTag(name, isImplied);
      },
    },
    { decodeEntities: true, lowerCaseTags: true, lowerCaseAttributeNames: true }
  );

  parser.write(html);
  parser.end();
  builder.finish();

  if (builder.problems.length > 0) {
    throw new AppError(
      `Malformed bookmark file ${source}: ${builder.problems[0]}`,
      'MALFORMED_INPUT',
      1,
      { source, problems: builder.problems }
    );
  }

  if (builder.skippedAnchors > 0) {
    logger.info(
      `Skipped ${builder.skippedAnchors} anchor(s) without a URL`,
      { source },
      'NetscapeParser'
    );
  }

  if (builder.separators > 0) {
    logger.debug(
      `Dropped ${builder.separators} <HR> separator(s)`,
      { source },
      'NetscapeParser'
    );
  }

  return { title: builder.title, root: builder.root };
}

/**
 * Read and parse a bookmark file from disk
 */
export function loadBookmarkFile(inputPath: string): BookmarkTree {
  if (!existsSync(inputPath)) {
    throw new AppError(`Input file not found: ${inputPath}`, 'INPUT_NOT_FOUND', 1, { path: inputPath });
  }

  let html: string;
  try {
    if (!statSync(inputPath).isFile()) {
      throw new Error('not a regular file');
    }
    html = readFileSync(inputPath, 'utf-8');
  } catch (error) {
    throw new AppError(
      `Cannot read input file ${inputPath}: ${describeError(error)}`,
      'INPUT_UNREADABLE',
      1,
      { path: inputPath }
    );
  }

  logger.debug(`Read ${html.length} characters`, { path: inputPath }, 'NetscapeParser');
  return parseBookmarksHtml(html, inputPath);
}
