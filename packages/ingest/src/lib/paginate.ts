import { describeError, ParseError, TerminalFetchError } from "./errors";
import type { HttpClient } from "./fetcher";

export type ParsedItem<T> =
  | { ok: true; item: T }
  | { ok: false; error: ParseError };

export type ParsedPage<T> = {
  items: ParsedItem<T>[];
  nextUrl: string | null;
};

export type PageParser<T> = (html: string, pageUrl: string) => ParsedPage<T>;

export type StopReason =
  | "no_next_link"
  | "max_pages"
  | "page_cap"
  | "cycle"
  | "not_found"
  | "fetch_failed";

export type ExtractionStats = {
  pagesFetched: number;
  pageErrors: number;
  parseErrors: number;
  emptyPages: number;
  itemsYielded: number;
  stopReason: StopReason | null;
  errors: string[];
};

export type ExtractOptions = {
  maxPages?: number | null;
  signal?: AbortSignal;
};

export type PaginatedExtractorOptions = {
  label: string;
  pageCap?: number;
};

export const DEFAULT_PAGE_CAP = 500;

const emptyStats = (): ExtractionStats => ({
  pagesFetched: 0,
  pageErrors: 0,
  parseErrors: 0,
  emptyPages: 0,
  itemsYielded: 0,
  stopReason: null,
  errors: [],
});

/**
 * Follows "next" links from a seed page, yielding parsed items lazily.
 *
 * FETCH -> PARSE -> FOLLOW_NEXT | TERMINATE. A fetch failure ends the listing
 * without throwing; only cancellation escapes the generator. A fresh call to
 * `extract` starts again from the seed.
 */
export class PaginatedExtractor<T> {
  readonly label: string;
  readonly pageCap: number;
  stats: ExtractionStats = emptyStats();

  constructor(
    private readonly client: HttpClient,
    private readonly parsePage: PageParser<T>,
    options: PaginatedExtractorOptions,
  ) {
    this.label = options.label;
    this.pageCap = options.pageCap ?? DEFAULT_PAGE_CAP;
  }

  async *extract(seedUrl: string, options: ExtractOptions = {}): AsyncGenerator<T> {
    const { signal } = options;
    const limit = options.maxPages && options.maxPages > 0
      ? Math.min(options.maxPages, this.pageCap)
      : this.pageCap;
    const stats = emptyStats();
    this.stats = stats;

    const visited = new Set<string>();
    let currentUrl: string | null = seedUrl;

    while (currentUrl) {
      if (stats.pagesFetched >= limit) {
        stats.stopReason = options.maxPages && limit === options.maxPages ? "max_pages" : "page_cap";
        break;
      }
      if (visited.has(currentUrl)) {
        console.warn(`[${this.label}] next link loops back to ${currentUrl}; stopping`);
        stats.stopReason = "cycle";
        break;
      }
      visited.add(currentUrl);
      signal?.throwIfAborted();

      // FETCH
      console.log(`[${this.label}] scraping page: ${currentUrl}`);
      let html: string;
      try {
        html = await this.client.getText(currentUrl, { signal });
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        if (error instanceof TerminalFetchError && (error.status === 404 || error.status === 410)) {
          console.warn(`[${this.label}] page not found: ${currentUrl}`);
          stats.stopReason = "not_found";
        } else {
          stats.stopReason = "fetch_failed";
        }
        stats.pageErrors += 1;
        stats.errors.push(`${currentUrl}: ${describeError(error)}`);
        console.error(`[${this.label}] page failed: ${currentUrl}:`, describeError(error));
        break;
      }
      stats.pagesFetched += 1;

      // PARSE
      let page: ParsedPage<T>;
      try {
        page = this.parsePage(html, currentUrl);
      } catch (error) {
        stats.pageErrors += 1;
        stats.errors.push(`${currentUrl}: ${describeError(error)}`);
        stats.stopReason = "fetch_failed";
        console.error(`[${this.label}] unparseable page ${currentUrl}:`, describeError(error));
        break;
      }

      // An empty page still hands over to its next link.
      if (!page.items.length) {
        stats.emptyPages += 1;
        console.warn(`[${this.label}] no items found: ${currentUrl}`);
      }

      for (const entry of page.items) {
        if (!entry.ok) {
          stats.parseErrors += 1;
          stats.errors.push(entry.error.message);
          console.warn(`[${this.label}] item skipped:`, entry.error.message);
          continue;
        }
        stats.itemsYielded += 1;
        yield entry.item;
      }

      // FOLLOW_NEXT | TERMINATE
      currentUrl = page.nextUrl;
      if (!currentUrl) {
        stats.stopReason = "no_next_link";
      }
    }
  }
}
