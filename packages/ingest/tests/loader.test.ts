import { describe, expect, it } from "vitest";
import { ParseError, PersistenceError } from "../src/lib/errors";
import { cleanQuoteSchema, rawBookSchema } from "../src/lib/layers";
import { buildCsv, StagedLoader } from "../src/lib/loader";
import type { CleanBook, CleanLibrairie, CleanQuote } from "../src/lib/types";
import { MemoryObjectStore, MemoryStore } from "../src/repo/memory";

const scrapedAt = new Date("2024-05-01T10:00:00Z");
const now = () => new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

const book = (title: string, hash: string): CleanBook => ({
  title,
  category: "Poetry",
  categorySlug: "poetry",
  priceGbp: 51.77,
  priceEur: 60.57,
  rating: 3,
  inStock: true,
  availableCount: 22,
  url: `https://books.test/catalogue/${hash}/index.html`,
  imageUrl: null,
  contentHash: hash,
  scrapedAt,
  batchId: "batch-1",
});

const quote = (text: string, hash: string, tags: string[]): CleanQuote => ({
  text,
  textHash: hash,
  author: "Jane Austen",
  authorSlug: "jane-austen",
  authorUrl: "https://quotes.test/author/Jane-Austen",
  tags,
  scrapedAt,
  batchId: "batch-1",
});

const librairie: CleanLibrairie = {
  name: "Librairie du Centre",
  slug: "librairie-du-centre-75002",
  address: "10 Rue de la Paix",
  postcode: "75002",
  city: "Paris",
  specialty: "Jeunesse",
  partnershipDate: "2021-03-15",
  revenueRange: "250k€ - 500k€",
  contactHash: "abc123",
  latitude: 48.8686,
  longitude: 2.3316,
  geocodeScore: 0.97,
  importedAt: scrapedAt,
  batchId: "batch-1",
};

const setup = () => {
  const store = new MemoryStore();
  const objects = new MemoryObjectStore();
  const loader = new StagedLoader({ store, objects, now });
  return { store, objects, loader };
};

describe("StagedLoader.loadBooks", () => {
  it("is idempotent across runs", async () => {
    const { store, loader } = setup();
    const books = [book("First", "hash-1"), book("Second", "hash-2")];

    const first = await loader.loadBooks(books);
    const second = await loader.loadBooks(books);

    expect(first).toEqual({ loaded: 2, duplicates: 0, failed: 0 });
    expect(second).toEqual({ loaded: 0, duplicates: 2, failed: 0 });
    expect(store.rows("dim_categories")).toEqual([
      { category_name: "Poetry", category_slug: "poetry", category_id: 1 },
    ]);
    expect(store.rows("fact_books").map((row) => [row.book_id, row.category_id, row.title])).toEqual([
      [1, 1, "First"],
      [2, 1, "Second"],
    ]);
  });

  it("records a failed row and keeps going", async () => {
    const { store, loader } = setup();
    store.failNextInsert("fact_books");

    const summary = await loader.loadBooks([book("First", "hash-1"), book("Second", "hash-2")]);

    expect(summary).toEqual({ loaded: 1, duplicates: 0, failed: 1 });
    expect(loader.errors).toEqual(['book "First": fact_books: injected record failure']);
    expect(store.rows("fact_books").map((row) => row.title)).toEqual(["Second"]);
  });

  it("rethrows a connection failure", async () => {
    const { store, loader } = setup();
    store.failNextInsert("fact_books", "connection");

    const error = await loader.loadBooks([book("First", "hash-1")]).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error).toMatchObject({ scope: "connection", table: "fact_books" });
    expect(loader.errors).toEqual([]);
  });

  it("stops when the run is cancelled", async () => {
    const { store, loader } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(loader.loadBooks([book("First", "hash-1")], { signal: controller.signal })).rejects.toThrow();
    expect(store.insertCalls).toBe(0);
  });

  it("shares one category row between spellings of the same slug", async () => {
    const { store, loader } = setup();
    const lowercase = { ...book("Second", "hash-2"), category: "poetry" };

    await loader.loadBooks([book("First", "hash-1"), lowercase]);

    expect(store.rows("dim_categories")).toEqual([
      { category_name: "Poetry", category_slug: "poetry", category_id: 1 },
    ]);
    expect(store.rows("fact_books").map((row) => row.category_id)).toEqual([1, 1]);
  });

  it("links stored image URIs", async () => {
    const { store, loader } = setup();
    const withImage = { ...book("First", "hash-1"), imageUrl: "https://books.test/media/cover.jpg" };

    await loader.loadBooks([withImage], {
      imageUris: new Map([["https://books.test/media/cover.jpg", "minio://images/books/hash-1.jpg"]]),
    });

    expect(store.rows("fact_books")[0].image_uri).toBe("minio://images/books/hash-1.jpg");
  });
});

describe("StagedLoader.loadQuotes", () => {
  it("links tags to new quotes only", async () => {
    const { store, loader } = setup();
    const quotes = [quote("First.", "q-1", ["love", "life"]), quote("Second.", "q-2", ["love"])];

    const first = await loader.loadQuotes(quotes);
    const second = await loader.loadQuotes(quotes);

    expect(first).toEqual({ loaded: 2, duplicates: 0, failed: 0 });
    expect(second).toEqual({ loaded: 0, duplicates: 2, failed: 0 });
    expect(store.rows("dim_authors")).toHaveLength(1);
    expect(store.rows("dim_tags").map((row) => [row.tag_id, row.tag_name])).toEqual([
      [1, "love"],
      [2, "life"],
    ]);
    expect(store.rows("quote_tags")).toEqual([
      { quote_id: 1, tag_id: 1 },
      { quote_id: 1, tag_id: 2 },
      { quote_id: 2, tag_id: 1 },
    ]);
  });

  it("keeps one author row per slug", async () => {
    const { store, loader } = setup();
    const einstein = { ...quote("First.", "q-1", []), author: "Albert Einstein", authorSlug: "albert-einstein" };
    const lowercase = { ...quote("Second.", "q-2", []), author: "albert einstein", authorSlug: "albert-einstein" };

    const summary = await loader.loadQuotes([einstein, lowercase]);
    await loader.loadQuotes([lowercase]);

    expect(summary).toEqual({ loaded: 2, duplicates: 0, failed: 0 });
    expect(store.rows("dim_authors").map((row) => [row.author_id, row.author_name])).toEqual([
      [1, "Albert Einstein"],
    ]);
    expect(store.rows("fact_quotes").map((row) => row.author_id)).toEqual([1, 1]);
  });
});

describe("StagedLoader.upsertFact", () => {
  const fields = { quote_hash: "q-1", quote_text: "First.", scraped_at: scrapedAt };

  it("returns null once the content key is stored", async () => {
    const { loader } = setup();

    expect(await loader.upsertFact("fact_quotes", "quote_hash", fields)).toBe(1);
    expect(await loader.upsertFact("fact_quotes", "quote_hash", fields)).toBeNull();
  });

  it("rejects a key the table is not keyed by", async () => {
    const { store, loader } = setup();

    await expect(loader.upsertFact("fact_quotes", "quote_text", fields)).rejects.toThrow(
      "fact_quotes: not keyed by quote_text",
    );
    await expect(
      loader.upsertFact("fact_books", "content_hash", { title: "First", scraped_at: scrapedAt }),
    ).rejects.toThrow("fact_books: missing content_hash");
    expect(store.insertCalls).toBe(0);
  });
});

describe("StagedLoader.loadLibrairies", () => {
  it("writes the librairie and its partnership once", async () => {
    const { store, loader } = setup();

    const first = await loader.loadLibrairies([librairie]);
    const second = await loader.loadLibrairies([librairie]);

    expect(first).toEqual({ loaded: 1, duplicates: 0, failed: 0 });
    expect(second).toEqual({ loaded: 0, duplicates: 1, failed: 0 });
    expect(store.rows("dim_librairies")[0]).toMatchObject({
      librairie_id: 1,
      nom: "Librairie du Centre",
      ville: "Paris",
      contact_hash: "abc123",
    });
    expect(store.rows("fact_partnerships")).toEqual([
      {
        partnership_id: 1,
        librairie_id: 1,
        date_partenariat: "2021-03-15",
        ca_annuel_range: "250k€ - 500k€",
        batch_id: "batch-1",
      },
    ]);
  });
});

describe("StagedLoader exports", () => {
  it("writes silver as JSON and CSV", async () => {
    const { objects, loader } = setup();

    const uris = await loader.exportLayer("books", "silver", [book("First", "hash-1")]);

    expect(uris).toEqual([
      "minio://exports/books/silver_20240102_030405.json",
      "minio://exports/books/silver_20240102_030405.csv",
    ]);
    expect(JSON.parse(objects.text(uris[0]) ?? "null")).toHaveLength(1);
    expect(objects.objects.get(uris[1])?.contentType).toBe("text/csv");
  });

  it("writes bronze as JSON only", async () => {
    const { loader } = setup();

    expect(await loader.exportLayer("quotes", "bronze", [{ text: "First." }])).toEqual([
      "minio://exports/quotes/bronze_20240102_030405.json",
    ]);
  });

  it("never exports bronze partner rows", async () => {
    const { objects, loader } = setup();

    expect(await loader.exportLayer("librairies", "bronze", [{ name: "Librairie du Centre" }])).toEqual([]);
    expect(objects.objects.size).toBe(0);
  });

  it("skips empty layers", async () => {
    const { loader } = setup();
    expect(await loader.exportLayer("books", "silver", [])).toEqual([]);
  });

  it("backs up a snapshot", async () => {
    const { objects, loader } = setup();

    const uri = await loader.backup({ batchId: "batch-1" });

    expect(uri).toBe("minio://backups/backup_20240102_030405.json");
    expect(JSON.parse(objects.text(uri) ?? "null")).toEqual({ batchId: "batch-1" });
  });

  it("reads back the newest export of a layer", async () => {
    const { objects, loader } = setup();
    await objects.upload("exports", "quotes/silver_20240101_000000.json", "[]", "application/json");
    await loader.exportLayer("quotes", "silver", [quote("First.", "q-1", ["love"])]);

    const snapshot = await loader.readLatestLayer("quotes", "silver", cleanQuoteSchema);

    expect(snapshot?.uri).toBe("minio://exports/quotes/silver_20240102_030405.json");
    expect(snapshot?.records).toEqual([quote("First.", "q-1", ["love"])]);
    expect(await loader.readLatestLayer("books", "bronze", rawBookSchema)).toBeNull();
  });

  it("rejects an export that does not match its layer", async () => {
    const { objects, loader } = setup();
    await objects.upload("exports", "quotes/silver_20240103_000000.json", '[{"text":"First."}]', "application/json");

    const error = await loader.readLatestLayer("quotes", "silver", cleanQuoteSchema).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ context: "minio://exports/quotes/silver_20240103_000000.json" });
  });

  it("finds covers stored by an earlier run", async () => {
    const { loader } = setup();
    const stored = { ...book("First", "hash-1"), imageUrl: "https://books.test/media/first.jpg" };
    const missing = { ...book("Second", "hash-2"), imageUrl: "https://books.test/media/second.jpg" };
    await loader.storeBookImage(Buffer.from([1]), stored);

    const uris = await loader.findStoredBookImages([stored, missing]);

    expect([...uris]).toEqual([["https://books.test/media/first.jpg", "minio://images/books/hash-1.jpg"]]);
  });

  it("stores images in the images bucket", async () => {
    const { objects, loader } = setup();

    const uri = await loader.storeImage(Buffer.from([1, 2, 3]), "books/hash-1.jpg");

    expect(uri).toBe("minio://images/books/hash-1.jpg");
    expect(objects.objects.get(uri)?.contentType).toBe("image/jpeg");
  });
});

describe("buildCsv", () => {
  it("flattens lists and uses the union of keys as header", async () => {
    const csv = (await buildCsv([{ title: "First", tags: ["love", "life"], rating: 3 }])).toString("utf-8");
    const lines = csv.replace(/^\uFEFF/, "").split(/\r?\n/);

    expect(lines[0]).toBe("title,tags,rating");
    expect(lines[1]).toBe("First,love;life,3");
  });
});
