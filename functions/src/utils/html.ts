import * as cheerio from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode } from 'domhandler';

const SKIPPED_TAGS = new Set(['script', 'style', 'noscript', 'template']);

/**
 * Visible text under a node, one space between text nodes. Entities are
 * already decoded by the parser.
 */
export function flattenNodeText(node: AnyNode): string {
  const parts: string[] = [];
  collectText(node, parts);
  return parts.join(' ').replace(/\s+/g, ' ').trim();
}

function collectText(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    const value = node.data.trim();
    if (value) {
      parts.push(value);
    }
    return;
  }
  if (isTag(node) && SKIPPED_TAGS.has(node.name)) {
    return;
  }
  if (hasChildren(node)) {
    for (const child of node.children) {
      collectText(child, parts);
    }
  }
}

/** Plain text of an HTML fragment such as an API description field. */
export function stripHtml(value: string): string {
  if (!value) {
    return '';
  }
  const $ = cheerio.load(value, null, false);
  return flattenNodeText($.root()[0]);
}
