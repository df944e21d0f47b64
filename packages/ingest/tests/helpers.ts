import { mkdtempSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import ExcelJS from "exceljs";
import { SPREADSHEET_COLUMNS } from "../src/config/sources";
import { HttpClient, type FetchLike } from "../src/lib/fetcher";
import { RateLimiter, RetryPolicy, type Sleep } from "../src/lib/retry";

export type FakeRoute = {
  status?: number;
  body: string;
  contentType?: string;
};

export type FakeHandler = (url: string) => FakeRoute | FakeRoute[] | undefined;

export const noSleep: Sleep = async () => {};

/**
 * Fetch stand-in. A route given as an array is served in order, the last entry
 * repeating; unknown URLs answer 404.
 */
export const createFakeFetch = (routes: Record<string, FakeRoute | FakeRoute[]>, fallback?: FakeHandler) => {
  const calls: string[] = [];
  const served = new Map<string, number>();

  const fetchImpl: FetchLike = async (input) => {
    calls.push(input);
    const route = routes[input] ?? fallback?.(input);
    if (!route) {
      return new Response("not found", { status: 404 });
    }
    const sequence = Array.isArray(route) ? route : [route];
    const index = served.get(input) ?? 0;
    served.set(input, index + 1);
    const entry = sequence[Math.min(index, sequence.length - 1)];
    return new Response(entry.body, {
      status: entry.status ?? 200,
      headers: { "Content-Type": entry.contentType ?? "text/html; charset=utf-8" },
    });
  };

  return { calls, fetchImpl };
};

export const json = (payload: unknown, status = 200): FakeRoute => ({
  status,
  body: JSON.stringify(payload),
  contentType: "application/json",
});

export const createTestClient = (fetchImpl: FetchLike, options: { maxAttempts?: number; sleep?: Sleep } = {}) =>
  new HttpClient({
    label: "test",
    fetchImpl,
    retry: new RetryPolicy({ maxAttempts: options.maxAttempts ?? 3, baseDelayMs: 0 }),
    limiter: new RateLimiter({ minIntervalMs: 0 }),
    sleep: options.sleep ?? noSleep,
  });

export type BookFixture = {
  title: string;
  href: string;
  price?: string;
  rating?: string;
  availability?: string;
  image?: string;
};

export const bookArticle = (book: BookFixture) => `
  <article class="product_pod">
    <div class="image_container">
      <a href="${book.href}"><img src="${book.image ?? "../media/cache/cover.jpg"}" alt="${book.title}" class="thumbnail"></a>
    </div>
    <p class="star-rating ${book.rating ?? "Three"}"><i class="icon-star"></i></p>
    <h3><a href="${book.href}" title="${book.title}">${book.title.slice(0, 10)}...</a></h3>
    <div class="product_price">
      ${book.price === undefined ? "<p class=\"price_color\">£51.77</p>" : book.price ? `<p class="price_color">${book.price}</p>` : ""}
      <p class="instock availability">
        <i class="icon-ok"></i>
        ${book.availability ?? "In stock"}
      </p>
    </div>
  </article>`;

export const booksPage = (articles: string[], nextHref?: string) => `
<html><body>
  <section><ol class="row">${articles.map((article) => `<li>${article}</li>`).join("")}</ol>
  ${nextHref ? `<ul class="pager"><li class="current">Page</li><li class="next"><a href="${nextHref}">next</a></li></ul>` : ""}
  </section>
</body></html>`;

export const catalogHome = (categories: Array<[string, string]>) => `
<html><body>
  <div class="side_categories">
    <ul class="nav nav-list">
      <li>
        <a href="catalogue/category/books_1/index.html">Books</a>
        <ul>
          ${categories.map(([name, href]) => `<li><a href="${href}">\n  ${name}\n</a></li>`).join("")}
        </ul>
      </li>
    </ul>
  </div>
</body></html>`;

export type QuoteFixture = {
  text: string;
  author?: string;
  authorHref?: string;
  tags?: string[];
};

export const quoteBlock = (quote: QuoteFixture) => `
  <div class="quote" itemscope itemtype="http://schema.org/CreativeWork">
    <span class="text" itemprop="text">${quote.text}</span>
    <span>by ${quote.author === undefined ? "" : `<small class="author" itemprop="author">${quote.author}</small>`}
      <a href="${quote.authorHref ?? "/author/Unknown"}">(about)</a>
    </span>
    <div class="tags">Tags:
      ${(quote.tags ?? []).map((tag) => `<a class="tag" href="/tag/${tag}/page/1/">${tag}</a>`).join("\n")}
    </div>
  </div>`;

export const quotesPage = (blocks: string[], nextHref?: string) => `
<html><body>
  <div class="col-md-8">${blocks.join("")}
    <nav><ul class="pager">
      ${nextHref ? `<li class="next"><a href="${nextHref}">Next <span aria-hidden="true">&rarr;</span></a></li>` : ""}
    </ul></nav>
  </div>
</body></html>`;

export const tempDir = () => mkdtempSync(join(tmpdir(), "etl-test-"));

export type SheetRow = Partial<Record<(typeof SPREADSHEET_COLUMNS)[number], string | number>>;

export const writeWorkbook = async (
  filePath: string,
  rows: SheetRow[],
  header: readonly string[] = SPREADSHEET_COLUMNS,
) => {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet("Librairies");
  sheet.addRow([...header]);
  for (const row of rows) {
    const values = new Map<string, string | number | undefined>(Object.entries(row));
    sheet.addRow(header.map((column) => values.get(column) ?? null));
  }
  await workbook.xlsx.writeFile(filePath);
  return filePath;
};
