import * as cheerio from "cheerio";
import { QUOTES_BASE_URL, QUOTES_SOURCE } from "../config/sources";
import { parseNextLink } from "./books";
import { ParseError } from "./errors";
import type { HttpClient } from "./fetcher";
import { normalizeWhitespace, stripQuoteMarks } from "./normalize";
import { PaginatedExtractor, type ExtractionStats, type ParsedItem, type ParsedPage } from "./paginate";
import type { RawQuote } from "./types";
import { resolveUrl } from "./url";

export type QuoteListing = Omit<RawQuote, "metadata">;

export const parseQuotesPage = (html: string, pageUrl: string): ParsedPage<QuoteListing> => {
  const $ = cheerio.load(html);
  const items = $("div.quote")
    .toArray()
    .map((element, index): ParsedItem<QuoteListing> => {
      const block = $(element);
      const context = `${pageUrl} #${index + 1}`;
      const text = stripQuoteMarks(normalizeWhitespace(block.find("span.text").first().text()));
      const author = normalizeWhitespace(block.find("small.author").first().text());
      if (!text || !author) {
        return { ok: false, error: new ParseError(context, "missing quote text or author") };
      }

      const authorHref = block.find('a[href*="/author/"]').first().attr("href");
      const tags = block
        .find("a.tag")
        .toArray()
        .map((tag) => normalizeWhitespace($(tag).text()))
        .filter(Boolean);

      return {
        ok: true,
        item: {
          text,
          author,
          authorUrl: resolveUrl(authorHref, pageUrl),
          tags,
        },
      };
    });

  return { items, nextUrl: parseNextLink($, pageUrl) };
};

export type QuotesExtractorOptions = {
  client: HttpClient;
  batchId: string;
  baseUrl?: string;
  pageCap?: number;
  now?: () => Date;
};

export class QuotesExtractor {
  readonly baseUrl: string;
  private readonly batchId: string;
  private readonly now: () => Date;
  private readonly listing: PaginatedExtractor<QuoteListing>;

  constructor(options: QuotesExtractorOptions) {
    this.batchId = options.batchId;
    this.baseUrl = options.baseUrl ?? QUOTES_BASE_URL;
    this.now = options.now ?? (() => new Date());
    this.listing = new PaginatedExtractor(options.client, parseQuotesPage, {
      label: "quotes",
      pageCap: options.pageCap,
    });
  }

  get stats(): ExtractionStats {
    return this.listing.stats;
  }

  async *extract(
    options: { maxPages?: number | null; signal?: AbortSignal } = {},
  ): AsyncGenerator<RawQuote> {
    for await (const listing of this.listing.extract(this.baseUrl, options)) {
      yield {
        ...listing,
        metadata: { source: QUOTES_SOURCE, fetchedAt: this.now(), batchId: this.batchId },
      };
    }
  }
}
