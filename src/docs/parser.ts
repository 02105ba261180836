/**
 * HTML Parser
 * Extracts the fields the indexer, query engine and crawler need from a page
 */

import * as cheerio from 'cheerio';
import type { PageLink, ParsedPage } from '../types/docs.js';

/**
 * Parser contract: title, visible text, canonical URL and anchors.
 * How the document is walked is left to the implementation.
 */
export interface HtmlParser {
  parse(html: string, fallbackTitle: string): ParsedPage;
}

/**
 * Collapse every run of whitespace to a single space
 */
export function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}

export class CheerioHtmlParser implements HtmlParser {
  parse(html: string, fallbackTitle: string): ParsedPage {
    const $ = cheerio.load(html);

    const title = $('title').first().text().trim() || fallbackTitle;

    const links: PageLink[] = [];
    $('a[href]').each((_, element) => {
      const anchor = $(element);
      const href = anchor.attr('href');
      if (href !== undefined) {
        links.push({ href, text: anchor.text().trim() });
      }
    });

    const canonicalUrl = $('link[rel~="canonical"]').first().attr('href') || undefined;

    $('script, style').remove();
    const text = collapseWhitespace($.root().text());

    return { title, text, canonicalUrl, links };
  }
}

const defaultParser = new CheerioHtmlParser();

/**
 * Parse with the default parser
 */
export function parseHtml(html: string, fallbackTitle: string): ParsedPage {
  return defaultParser.parse(html, fallbackTitle);
}

/**
 * Anchor hrefs only, in document order
 */
export function extractHrefs(html: string): string[] {
  return parseHtml(html, '').links.map(link => link.href);
}
