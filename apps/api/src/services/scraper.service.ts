import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { isDocument, isTag, isText, type AnyNode } from 'domhandler';
import { FetchError, describeError } from '../middleware/error-handler.js';

export interface PageContent {
  /** Visible text nodes, trimmed and joined by single spaces */
  text: string;
  /** `"<absolute url> (<anchor text>)"` entries joined by single spaces */
  links: string;
}

export interface FetchedPage {
  body: Buffer;
  contentType: string | null;
}

export interface ScraperOptions {
  userAgent: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

const HIDDEN_TAGS = new Set(['script', 'style', 'noscript', 'template']);

function collectText(nodes: AnyNode[], chunks: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      const value = node.data.trim();
      if (value) {
        chunks.push(value);
      }
    } else if (isDocument(node) || (isTag(node) && !HIDDEN_TAGS.has(node.name))) {
      collectText(node.children, chunks);
    }
  }
}

function resolveHref(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

function charsetOf(contentType: string | null): string | undefined {
  return contentType?.match(/charset=["']?([^;"'\s]+)/i)?.[1];
}

/**
 * Decode raw page bytes. A BOM wins, then the Content-Type charset, then
 * `<meta charset>`; pages that declare nothing are read as UTF-8.
 */
export function loadPage(page: FetchedPage): CheerioAPI {
  return cheerio.loadBuffer(page.body, {
    encoding: {
      transportLayerEncodingLabel: charsetOf(page.contentType),
      defaultEncoding: 'utf-8',
    },
  });
}

/**
 * Split a page into its visible text and a summary of every resolvable link
 */
export function extractContent(page: string | CheerioAPI, baseUrl: string): PageContent {
  const $ = typeof page === 'string' ? cheerio.load(page) : page;

  const textChunks: string[] = [];
  collectText($.root().toArray(), textChunks);

  const links: string[] = [];
  $('a[href]').each((_, anchor) => {
    const href = resolveHref($(anchor).attr('href') ?? '', baseUrl);
    if (!href) return;

    const anchorChunks: string[] = [];
    collectText(anchor.children, anchorChunks);
    links.push(`${href} (${anchorChunks.join(' ')})`);
  });

  return {
    text: textChunks.join(' '),
    links: links.join(' '),
  };
}

export function combineContent({ text, links }: PageContent): string {
  return [text, links].filter((part) => part.length > 0).join(' ');
}

export class ScraperService {
  private userAgent: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;

  constructor(options: ScraperOptions) {
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Single GET of the page. Any network error or non-2xx status is a FetchError.
   */
  async fetchPage(url: string): Promise<FetchedPage> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: {
          'User-Agent': this.userAgent,
          'Accept': 'text/html,application/xhtml+xml',
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      console.error(`[Scraper] Request to ${url} failed:`, describeError(error));
      throw new FetchError({ url, reason: describeError(error) });
    }

    if (!response.ok) {
      console.log(`[Scraper] ${url} returned ${response.status}`);
      throw new FetchError({ url, status: response.status });
    }

    try {
      return {
        body: Buffer.from(await response.arrayBuffer()),
        contentType: response.headers.get('content-type'),
      };
    } catch (error) {
      console.error(`[Scraper] Could not read body of ${url}:`, describeError(error));
      throw new FetchError({ url, reason: describeError(error) });
    }
  }

  /**
   * Fetch a page and return its text and link summary as one blob
   */
  async scrape(url: string): Promise<string> {
    console.log(`[Scraper] Scraping website: ${url}`);
    const page = await this.fetchPage(url);

    let content: PageContent;
    try {
      content = extractContent(loadPage(page), url);
    } catch (error) {
      console.error(`[Scraper] Could not parse ${url}:`, describeError(error));
      throw new FetchError({ url, reason: describeError(error) });
    }

    return combineContent(content);
  }
}
