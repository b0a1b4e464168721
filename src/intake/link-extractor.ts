/**
 * Link Extractor — invoice download links in message bodies
 *
 * HTML bodies are scanned for <a href> values (quoted or bare, HTML entities
 * decoded). If that scan throws, the raw URL pattern is used instead, as it is
 * for plain-text bodies. Only http(s) URLs whose lowercase form contains a
 * link keyword are kept, de-duplicated in first-seen order.
 */

import type { MessageBody } from './types.js';

const URL_PATTERN = /https?:\/\/[^\s"'<>]+/gi;
const ANCHOR_HREF_PATTERN = /<a\b[^>]*?\bhref\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/gi;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

/** Decodes the entities that show up in href attributes. Throws on invalid code points. */
export function decodeHtmlEntities(value: string): string {
  return value.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, body: string) => {
    if (body.startsWith('#x') || body.startsWith('#X')) {
      return String.fromCodePoint(parseInt(body.slice(2), 16));
    }
    if (body.startsWith('#')) {
      return String.fromCodePoint(parseInt(body.slice(1), 10));
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

export function extractAnchorHrefs(html: string): string[] {
  const hrefs: string[] = [];
  for (const match of html.matchAll(ANCHOR_HREF_PATTERN)) {
    const raw = match[1] ?? match[2] ?? match[3] ?? '';
    const href = decodeHtmlEntities(raw).trim();
    if (href) hrefs.push(href);
  }
  return hrefs;
}

export function extractRawUrls(text: string): string[] {
  return [...text.matchAll(URL_PATTERN)].map((match) => match[0]);
}

function candidateUrls(body: MessageBody): string[] {
  if (body.format === 'text') return extractRawUrls(body.content);

  try {
    return extractAnchorHrefs(body.content);
  } catch (err) {
    console.warn('[link-extractor] Anchor scan failed, falling back to URL pattern', {
      error: err instanceof Error ? err.message : String(err),
    });
    return extractRawUrls(body.content);
  }
}

/**
 * URLs in the body that look like invoice downloads. Empty when no keywords
 * are configured.
 */
export function extractInvoiceLinks(body: MessageBody | null, keywords: readonly string[]): string[] {
  if (!body || keywords.length === 0) return [];

  const lowered = keywords.map((k) => k.toLowerCase());
  const seen = new Set<string>();
  const links: string[] = [];

  for (const url of candidateUrls(body)) {
    if (!/^https?:\/\//i.test(url)) continue;
    const lower = url.toLowerCase();
    if (!lowered.some((keyword) => lower.includes(keyword))) continue;
    if (seen.has(url)) continue;
    seen.add(url);
    links.push(url);
  }

  return links;
}
