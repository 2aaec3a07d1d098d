import { loadHtml } from './htmlParser';

/**
 * Serialized `<body>` subtree of `html`, tags included. A document without a
 * body element yields an empty string.
 */
export function extractBody(html: string): string {
  const $ = loadHtml(html);
  const body = $('body').first();

  if (body.length === 0) {
    return '';
  }

  return $.html(body);
}
