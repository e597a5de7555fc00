/**
 * Text Extraction
 *
 * Plain-text formats are read as UTF-8. Everything else (PDF included)
 * has no extractable text here and is recorded as skipped.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { HTMLElement, TextNode, parse, type Node } from 'node-html-parser';

/** Extensions read as text */
export const TEXT_EXTENSIONS: ReadonlySet<string> = new Set([
  '.txt',
  '.md',
  '.html',
  '.htm',
  '.csv',
  '.json',
]);

const HTML_EXTENSIONS: ReadonlySet<string> = new Set(['.html', '.htm']);

/** Elements whose content is never visible text */
const HIDDEN_TAGS: ReadonlySet<string> = new Set(['script', 'style', 'noscript', 'template']);

/** Elements that start and end a line */
const BLOCK_TAGS: ReadonlySet<string> = new Set([
  'address', 'article', 'aside', 'blockquote', 'br', 'dd', 'div', 'dl', 'dt',
  'figcaption', 'footer', 'form', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header',
  'hr', 'li', 'main', 'nav', 'ol', 'p', 'pre', 'section', 'table', 'td', 'th',
  'title', 'tr', 'ul',
]);

export function isTextFile(filePath: string): boolean {
  return TEXT_EXTENSIONS.has(extname(filePath).toLowerCase());
}

export function isHtmlFile(filePath: string): boolean {
  return HTML_EXTENSIONS.has(extname(filePath).toLowerCase());
}

/**
 * File contents for text formats; `undefined` for other formats.
 */
export async function extractText(filePath: string): Promise<string | undefined> {
  if (!isTextFile(filePath)) {
    return undefined;
  }
  return readFile(filePath, 'utf-8');
}

/**
 * Visible text of an HTML page: one line per block element, entities
 * decoded, whitespace collapsed.
 */
export function htmlToText(html: string): string {
  const lines: string[] = [];
  let line = '';

  const endLine = (): void => {
    lines.push(line);
    line = '';
  };

  const visit = (node: Node): void => {
    if (node instanceof TextNode) {
      line += node.text;
      return;
    }
    if (!(node instanceof HTMLElement)) {
      return;
    }
    const tag = node.rawTagName ? node.rawTagName.toLowerCase() : '';
    if (HIDDEN_TAGS.has(tag)) {
      return;
    }
    const block = BLOCK_TAGS.has(tag);
    if (block) endLine();
    node.childNodes.forEach(visit);
    if (block) endLine();
  };

  visit(parse(html));
  endLine();

  return lines
    .map((text) => text.replace(/\s+/g, ' ').trim())
    .filter((text) => text.length > 0)
    .join('\n');
}

/**
 * Readable text of a stored file: HTML reduced to visible text,
 * other text formats as-is.
 */
export async function readableText(filePath: string): Promise<string | undefined> {
  const text = await extractText(filePath);
  if (text === undefined) {
    return undefined;
  }
  return isHtmlFile(filePath) ? htmlToText(text) : text;
}
