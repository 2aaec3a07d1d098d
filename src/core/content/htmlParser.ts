import * as cheerio from 'cheerio';

/**
 * htmlparser2 in HTML mode: lenient with malformed markup and, unlike parse5,
 * does not invent `<html>`/`<head>`/`<body>` elements that the source lacks.
 */
const PARSE_OPTIONS: cheerio.CheerioOptions = { xml: { xmlMode: false, decodeEntities: true } };

export function loadHtml(html: string): cheerio.CheerioAPI {
  return cheerio.load(html, PARSE_OPTIONS);
}
