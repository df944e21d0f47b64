import * as cheerio from "cheerio";
import { BOOKS_BASE_URL, BOOKS_SOURCE } from "../config/sources";
import { describeError, ParseError } from "./errors";
import type { HttpClient } from "./fetcher";
import { normalizeWhitespace } from "./normalize";
import { PaginatedExtractor, type ParsedItem, type ParsedPage } from "./paginate";
import type { RawBook } from "./types";
import { resolveUrl } from "./url";

export type BookListing = Omit<RawBook, "category" | "metadata">;

export type Category = {
  name: string;
  url: string;
};

export type BooksExtractionStats = {
  categories: number;
  pagesFetched: number;
  pageErrors: number;
  parseErrors: number;
  booksExtracted: number;
  errors: string[];
};

const emptyBooksStats = (): BooksExtractionStats => ({
  categories: 0,
  pagesFetched: 0,
  pageErrors: 0,
  parseErrors: 0,
  booksExtracted: 0,
  errors: [],
});

export const parseCategories = (html: string, pageUrl: string): Category[] => {
  const $ = cheerio.load(html);
  const categories: Category[] = [];
  $("div.side_categories ul.nav-list > li > ul > li > a").each((_, element) => {
    const name = normalizeWhitespace($(element).text());
    const url = resolveUrl($(element).attr("href"), pageUrl);
    if (name && url) {
      categories.push({ name, url });
    }
  });
  return categories;
};

export const parseNextLink = ($: cheerio.CheerioAPI, pageUrl: string) =>
  resolveUrl($("li.next > a").first().attr("href"), pageUrl);

export const parseBookListPage = (html: string, pageUrl: string): ParsedPage<BookListing> => {
  const $ = cheerio.load(html);
  const items: ParsedItem<BookListing>[] = $("article.product_pod")
    .toArray()
    .map((element, index): ParsedItem<BookListing> => {
      const article = $(element);
      const context = `${pageUrl} #${index + 1}`;
      const link = article.find("h3 > a").first();
      const title = normalizeWhitespace(link.attr("title") ?? link.text());
      const url = resolveUrl(link.attr("href"), pageUrl);
      if (!title || !url) {
        return { ok: false, error: new ParseError(context, "missing title or detail link") };
      }

      const price = normalizeWhitespace(article.find("p.price_color").first().text());
      if (!price) {
        return { ok: false, error: new ParseError(context, `missing price for "${title}"`) };
      }

      const ratingClasses = (article.find("p.star-rating").first().attr("class") ?? "")
        .split(/\s+/)
        .filter((name) => name && name !== "star-rating");
      const availability = normalizeWhitespace(article.find("p.availability").first().text());
      const imageUrl = resolveUrl(article.find("img").first().attr("src"), pageUrl);

      return {
        ok: true,
        item: {
          title,
          price,
          ratingToken: ratingClasses[0] ?? "",
          availability,
          url,
          imageUrl,
        },
      };
    });

  return { items, nextUrl: parseNextLink($, pageUrl) };
};

export type BooksExtractorOptions = {
  client: HttpClient;
  batchId: string;
  baseUrl?: string;
  pageCap?: number;
  now?: () => Date;
};

export type BooksExtractOptions = {
  maxPages?: number | null;
  limitCategories?: number | null;
  signal?: AbortSignal;
};

/**
 * Walks the catalog category by category, each category being its own
 * paginated listing.
 */
export class BooksExtractor {
  readonly baseUrl: string;
  stats: BooksExtractionStats = emptyBooksStats();
  private readonly client: HttpClient;
  private readonly batchId: string;
  private readonly now: () => Date;
  private readonly listing: PaginatedExtractor<BookListing>;

  constructor(options: BooksExtractorOptions) {
    this.client = options.client;
    this.batchId = options.batchId;
    this.baseUrl = options.baseUrl ?? BOOKS_BASE_URL;
    this.now = options.now ?? (() => new Date());
    this.listing = new PaginatedExtractor(this.client, parseBookListPage, {
      label: "books",
      pageCap: options.pageCap,
    });
  }

  async fetchCategories(signal?: AbortSignal): Promise<Category[]> {
    try {
      const html = await this.client.getText(this.baseUrl, { signal });
      const categories = parseCategories(html, this.baseUrl);
      console.log(`[books] ${categories.length} categories found`);
      return categories;
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      this.stats.pageErrors += 1;
      this.stats.errors.push(`${this.baseUrl}: ${describeError(error)}`);
      console.error("[books] category discovery failed:", describeError(error));
      return [];
    }
  }

  async *extract(options: BooksExtractOptions = {}): AsyncGenerator<RawBook> {
    const { signal } = options;
    this.stats = emptyBooksStats();
    let categories = await this.fetchCategories(signal);
    if (options.limitCategories && options.limitCategories > 0) {
      categories = categories.slice(0, options.limitCategories);
    }
    this.stats.categories = categories.length;

    for (const category of categories) {
      console.log(`[books] scraping category: ${category.name}`);
      for await (const listing of this.listing.extract(category.url, {
        maxPages: options.maxPages,
        signal,
      })) {
        this.stats.booksExtracted += 1;
        yield {
          ...listing,
          category: category.name,
          metadata: { source: BOOKS_SOURCE, fetchedAt: this.now(), batchId: this.batchId },
        };
      }
      const pageStats = this.listing.stats;
      this.stats.pagesFetched += pageStats.pagesFetched;
      this.stats.pageErrors += pageStats.pageErrors;
      this.stats.parseErrors += pageStats.parseErrors;
      this.stats.errors.push(...pageStats.errors);
    }
  }

  async downloadImage(url: string, signal?: AbortSignal): Promise<Buffer | null> {
    try {
      return await this.client.getBytes(url, { signal });
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      console.warn(`[books] image fetch failed for ${url}:`, describeError(error));
      return null;
    }
  }
}
