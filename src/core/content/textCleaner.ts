import type pino from 'pino';
import type { AnyNode } from 'domhandler';
import { hasChildren, isText } from 'domhandler';
import { NON_VISIBLE_SELECTORS } from '../../config/constants';
import { loadHtml } from './htmlParser';

const LINE_BREAK = /\r\n|\r|\n/;

function collectText(nodes: AnyNode[], out: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      out.push(node.data);
    } else if (hasChildren(node)) {
      collectText(node.children, out);
    }
  }
}

/**
 * Normalize text into one non-empty, trimmed line per line, keeping order.
 */
export function normalizeLines(text: string): string {
  return text
    .split(LINE_BREAK)
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .join('\n');
}

/**
 * Visible text of `markup`: non-visible elements are dropped, every text node
 * starts on its own line, then lines are trimmed and blank ones removed.
 */
export function cleanMarkup(markup: string, logger?: pino.Logger): string {
  const $ = loadHtml(markup);

  const removed = $(NON_VISIBLE_SELECTORS);
  const removedCount = removed.length;
  removed.remove();

  const fragments: string[] = [];
  collectText($.root().toArray(), fragments);
  const cleanedText = normalizeLines(fragments.join('\n'));

  logger?.debug(
    {
      event: 'text_cleaning_complete',
      initialLength: markup.length,
      removedElements: removedCount,
      textNodes: fragments.length,
      finalLength: cleanedText.length,
    },
    'Cleaned markup to plain text'
  );

  return cleanedText;
}
