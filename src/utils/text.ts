/**
 * Text canonicalization for fuzzy, accent-insensitive comparison
 */

import { hasChildren, isTag, isText, type AnyNode } from 'domhandler';

/**
 * Elements whose text is never rendered
 */
const HIDDEN_TEXT_TAGS = new Set(['script', 'style', 'template', 'noscript']);

/**
 * Decompose, drop non-ASCII code points (diacritics), lowercase
 */
export function normalize(text: unknown): string {
  if (typeof text !== 'string' || text.length === 0) {
    return '';
  }
  return text
    .normalize('NFKD')
    .replace(/[^\x00-\x7F]/g, '')
    .toLowerCase();
}

export function partialMatch(haystack: string, needle: string): boolean {
  return normalize(haystack).includes(normalize(needle));
}

/**
 * Visible text of a node: every rendered text node trimmed, empties dropped, no separator
 */
export function strippedText(node: AnyNode): string {
  const parts: string[] = [];
  collectText(node, parts);
  return parts.join('');
}

function collectText(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    const value = node.data.trim();
    if (value) parts.push(value);
    return;
  }
  if (isTag(node) && HIDDEN_TEXT_TAGS.has(node.name)) {
    return;
  }
  if (hasChildren(node)) {
    for (const child of node.children) {
      collectText(child, parts);
    }
  }
}

/**
 * Cut to `max` code points, marking the cut with an ellipsis
 */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  return chars.slice(0, max).join('') + '...';
}
