import * as cheerio from 'cheerio';
import { HTTPError } from 'got';
import { FetchError } from './errors.js';
import { PageFetcher } from './http.js';
import { LinkSet } from './types.js';
import { ensureAbsoluteUrl, isPdfHref } from './utils.js';

export class LinkExtractor {
  constructor(private http: PageFetcher) {}

  async extract(url: string): Promise<LinkSet> {
    let body: string;
    let finalUrl: string;
    try {
      const res = await this.http.page(url);
      body = res.body;
      finalUrl = res.url || url;
    } catch (err) {
      throw new FetchError(url, err, err instanceof HTTPError ? err.response.statusCode : undefined);
    }
    return extractPdfLinks(body, finalUrl);
  }
}

/**
 * Collects the absolute URL of every anchor whose href ends in `.pdf`
 * (case-insensitive). Relative hrefs resolve against `pageUrl`.
 */
export function extractPdfLinks(html: string, pageUrl: string): LinkSet {
  const $ = cheerio.load(html);
  const pdfs = new Set<string>();

  $('a[href]').each((_, a) => {
    const href = ($(a).attr('href') ?? '').trim();
    if (!isPdfHref(href)) return;
    const abs = ensureAbsoluteUrl(pageUrl, href);
    if (abs) pdfs.add(abs);
  });

  return pdfs;
}
