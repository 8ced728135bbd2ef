import { load } from 'cheerio';

const MATCH_LINK_SELECTOR = 'a.result-1.rc';

/** Match-centre href of one fixture row, if the row links to one. */
export function extractMatchLink(rowHtml: string): string | undefined {
  const $ = load(rowHtml);
  const href = $(MATCH_LINK_SELECTOR).first().attr('href');
  return href ? href : undefined;
}

/** Dedupe hrefs by identity, keeping first-seen order, and resolve them against `baseUrl`. */
export function resolveMatchLinks(hrefs: Iterable<string>, baseUrl: string): string[] {
  return [...new Set(hrefs)].map((href) => new URL(href, baseUrl).toString());
}
