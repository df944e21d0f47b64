import ExcelJS from "exceljs";
import type { ZodType } from "zod";
import { TABLES, type TableName } from "../repo/schema";
import { objectUri, type ObjectStore, type RelationalStore, type Row } from "../repo/types";
import { formatTimestamp } from "./batch";
import { describeError, PersistenceError } from "./errors";
import { reviveLayer } from "./layers";
import type { CleanBook, CleanLibrairie, CleanQuote, Domain, Layer, LoadSummary } from "./types";

export type Buckets = {
  images: string;
  exports: string;
  backups: string;
};

export const DEFAULT_BUCKETS: Buckets = {
  images: "images",
  exports: "exports",
  backups: "backups",
};

export type ExportDomain = Domain | "geocoding";

export type StagedLoaderOptions = {
  store: RelationalStore;
  objects: ObjectStore;
  buckets?: Buckets;
  now?: () => Date;
};

export type LoadOptions = {
  signal?: AbortSignal;
};

export type LayerSnapshot<T> = {
  uri: string;
  records: T[];
};

const bookImageName = (contentHash: string) => `books/${contentHash}.jpg`;

type CsvCell = string | number | boolean | null;

const toCsvCell = (value: unknown): CsvCell => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item) => String(item)).join(";");
  }
  return JSON.stringify(value);
};

const emptySummary = (): LoadSummary => ({ loaded: 0, duplicates: 0, failed: 0 });

/**
 * Silver -> gold. The only writer to the relational store.
 *
 * Record-level persistence failures are logged, counted and skipped. A
 * connection-level failure is rethrown so the orchestrator can abort the run.
 */
export class StagedLoader {
  readonly buckets: Buckets;
  readonly errors: string[] = [];
  private readonly store: RelationalStore;
  private readonly objects: ObjectStore;
  private readonly now: () => Date;

  constructor(options: StagedLoaderOptions) {
    this.store = options.store;
    this.objects = options.objects;
    this.buckets = options.buckets ?? DEFAULT_BUCKETS;
    this.now = options.now ?? (() => new Date());
  }

  private recordFailure(error: unknown, context: string) {
    if (!(error instanceof PersistenceError) || error.scope === "connection") {
      throw error;
    }
    const message = `${context}: ${describeError(error)}`;
    this.errors.push(message);
    console.warn(`[loader] ${message}`);
  }

  /**
   * Inserts each dimension row (insert-or-ignore), then resolves every natural
   * key to its id in one lookup pass.
   */
  async upsertDimension(
    table: TableName,
    keyColumn: string,
    records: Row[],
    options: LoadOptions = {},
  ): Promise<Map<string, number>> {
    const keys = new Set<string>();
    for (const record of records) {
      options.signal?.throwIfAborted();
      const key = record[keyColumn];
      if (typeof key !== "string" || !key) {
        continue;
      }
      try {
        await this.store.insert(table, record);
        keys.add(key);
      } catch (error) {
        this.recordFailure(error, `${table} "${key}"`);
      }
    }
    const ids = await this.store.findIds(table, keyColumn, [...keys]);
    console.log(`[loader] ${table}: ${ids.size} keys resolved`);
    return ids;
  }

  /**
   * Resolves to the new id, or null when a row with the same `contentKey`
   * value is already stored. The key must be the table's natural key.
   */
  async upsertFact(table: TableName, contentKey: string, fields: Row): Promise<number | null> {
    const naturalKey = TABLES[table].naturalKey;
    if (naturalKey.length !== 1 || naturalKey[0] !== contentKey) {
      throw new PersistenceError("record", table, `${table}: not keyed by ${contentKey}`);
    }
    const key = fields[contentKey];
    if (key === null || key === undefined || key === "") {
      throw new PersistenceError("record", table, `${table}: missing ${contentKey}`);
    }
    return this.store.insert(table, fields);
  }

  private async loadFact(
    table: TableName,
    contentKey: string,
    fields: Row,
    context: string,
    summary: LoadSummary,
  ): Promise<number | null> {
    try {
      const id = await this.upsertFact(table, contentKey, fields);
      if (id === null) {
        summary.duplicates += 1;
      } else {
        summary.loaded += 1;
      }
      return id;
    } catch (error) {
      this.recordFailure(error, context);
      summary.failed += 1;
      return null;
    }
  }

  async loadBooks(
    books: CleanBook[],
    options: LoadOptions & { imageUris?: Map<string, string> } = {},
  ): Promise<LoadSummary> {
    const summary = emptySummary();
    const categories = new Map<string, Row>();
    for (const book of books) {
      if (!categories.has(book.categorySlug)) {
        categories.set(book.categorySlug, { category_name: book.category, category_slug: book.categorySlug });
      }
    }
    const categoryIds = await this.upsertDimension(
      "dim_categories",
      "category_slug",
      [...categories.values()],
      options,
    );

    for (const book of books) {
      options.signal?.throwIfAborted();
      await this.loadFact(
        "fact_books",
        "content_hash",
        {
          content_hash: book.contentHash,
          category_id: categoryIds.get(book.categorySlug) ?? null,
          title: book.title,
          price_gbp: book.priceGbp,
          price_eur: book.priceEur,
          rating: book.rating,
          in_stock: book.inStock,
          availability: book.availableCount,
          url: book.url,
          image_url: book.imageUrl,
          image_uri: book.imageUrl ? options.imageUris?.get(book.imageUrl) ?? null : null,
          scraped_at: book.scrapedAt,
          batch_id: book.batchId,
        },
        `book "${book.title}"`,
        summary,
      );
    }

    console.log(
      `[loader] books: ${summary.loaded} loaded, ${summary.duplicates} duplicates, ${summary.failed} failed`,
    );
    return summary;
  }

  async loadQuotes(quotes: CleanQuote[], options: LoadOptions = {}): Promise<LoadSummary> {
    const summary = emptySummary();
    const authors = new Map<string, Row>();
    const tags = new Map<string, Row>();
    for (const quote of quotes) {
      if (!authors.has(quote.authorSlug)) {
        authors.set(quote.authorSlug, {
          author_name: quote.author,
          author_slug: quote.authorSlug,
          author_url: quote.authorUrl,
        });
      }
      for (const tag of quote.tags) {
        tags.set(tag, { tag_name: tag });
      }
    }
    const authorIds = await this.upsertDimension("dim_authors", "author_slug", [...authors.values()], options);
    const tagIds = await this.upsertDimension("dim_tags", "tag_name", [...tags.values()], options);

    for (const quote of quotes) {
      options.signal?.throwIfAborted();
      const quoteId = await this.loadFact(
        "fact_quotes",
        "quote_hash",
        {
          quote_hash: quote.textHash,
          author_id: authorIds.get(quote.authorSlug) ?? null,
          quote_text: quote.text,
          scraped_at: quote.scrapedAt,
          batch_id: quote.batchId,
        },
        `quote by ${quote.author}`,
        summary,
      );
      if (quoteId === null) {
        continue;
      }
      for (const tag of quote.tags) {
        const tagId = tagIds.get(tag);
        if (tagId === undefined) {
          continue;
        }
        try {
          await this.store.insert("quote_tags", { quote_id: quoteId, tag_id: tagId });
        } catch (error) {
          this.recordFailure(error, `quote_tags ${quoteId}/${tag}`);
        }
      }
    }

    console.log(
      `[loader] quotes: ${summary.loaded} loaded, ${summary.duplicates} duplicates, ${summary.failed} failed`,
    );
    return summary;
  }

  async loadLibrairies(librairies: CleanLibrairie[], options: LoadOptions = {}): Promise<LoadSummary> {
    const summary = emptySummary();
    for (const librairie of librairies) {
      options.signal?.throwIfAborted();
      const librairieId = await this.loadFact(
        "dim_librairies",
        "librairie_slug",
        {
          librairie_slug: librairie.slug,
          nom: librairie.name,
          adresse: librairie.address,
          code_postal: librairie.postcode,
          ville: librairie.city,
          latitude: librairie.latitude,
          longitude: librairie.longitude,
          geocode_score: librairie.geocodeScore,
          specialite: librairie.specialty,
          contact_hash: librairie.contactHash,
          ca_annuel_range: librairie.revenueRange,
          imported_at: librairie.importedAt,
          batch_id: librairie.batchId,
        },
        `librairie "${librairie.name}"`,
        summary,
      );
      if (librairieId === null) {
        continue;
      }
      try {
        await this.store.insert("fact_partnerships", {
          librairie_id: librairieId,
          date_partenariat: librairie.partnershipDate,
          ca_annuel_range: librairie.revenueRange,
          batch_id: librairie.batchId,
        });
      } catch (error) {
        this.recordFailure(error, `partnership for "${librairie.name}"`);
      }
    }

    console.log(
      `[loader] librairies: ${summary.loaded} loaded, ${summary.duplicates} duplicates, ${summary.failed} failed`,
    );
    return summary;
  }

  /**
   * Uploads a layer snapshot to the exports bucket as JSON, plus CSV for
   * silver. Bronze partner rows hold personal data and are never exported.
   */
  async exportLayer<T extends object>(domain: ExportDomain, layer: Layer, records: T[]): Promise<string[]> {
    if (domain === "librairies" && layer === "bronze") {
      console.warn("[loader] bronze librairies hold personal data; export skipped");
      return [];
    }
    if (!records.length) {
      return [];
    }

    const stamp = formatTimestamp(this.now());
    const baseName = `${domain}/${layer}_${stamp}`;
    const uris = [
      await this.objects.upload(
        this.buckets.exports,
        `${baseName}.json`,
        JSON.stringify(records, null, 2),
        "application/json",
      ),
    ];

    if (layer === "silver") {
      const csv = await buildCsv(records);
      uris.push(await this.objects.upload(this.buckets.exports, `${baseName}.csv`, csv, "text/csv"));
    }
    return uris;
  }

  /**
   * Reads back the newest JSON export of a layer. Export names carry a UTC
   * timestamp, so the last name in sort order is the newest.
   */
  async readLatestLayer<T>(
    domain: ExportDomain,
    layer: Layer,
    schema: ZodType<T>,
  ): Promise<LayerSnapshot<T> | null> {
    const names = await this.objects.list(this.buckets.exports, `${domain}/${layer}_`);
    const jsonNames = names.filter((name) => name.endsWith(".json")).sort();
    const latest = jsonNames[jsonNames.length - 1];
    if (!latest) {
      return null;
    }
    const uri = objectUri(this.buckets.exports, latest);
    const body = await this.objects.download(this.buckets.exports, latest);
    const records = reviveLayer(schema, body.toString("utf-8"), uri);
    console.log(`[loader] ${records.length} ${layer} records read from ${uri}`);
    return { uri, records };
  }

  async backup(snapshot: unknown): Promise<string> {
    const name = `backup_${formatTimestamp(this.now())}.json`;
    return this.objects.upload(this.buckets.backups, name, JSON.stringify(snapshot, null, 2), "application/json");
  }

  storeImage(bytes: Buffer, name: string, contentType = "image/jpeg"): Promise<string> {
    return this.objects.upload(this.buckets.images, name, bytes, contentType);
  }

  storeBookImage(bytes: Buffer, book: CleanBook): Promise<string> {
    return this.storeImage(bytes, bookImageName(book.contentHash));
  }

  /** Maps image URLs to covers stored by an earlier run, keyed like `storeBookImage`. */
  async findStoredBookImages(books: CleanBook[]): Promise<Map<string, string>> {
    const stored = new Set(await this.objects.list(this.buckets.images, "books/"));
    const uris = new Map<string, string>();
    for (const book of books) {
      const name = bookImageName(book.contentHash);
      if (book.imageUrl && stored.has(name)) {
        uris.set(book.imageUrl, objectUri(this.buckets.images, name));
      }
    }
    return uris;
  }
}

export const buildCsv = async <T extends object>(records: T[]): Promise<Buffer> => {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet("export");
  const header = [...new Set(records.flatMap((record) => Object.keys(record)))];
  sheet.addRow(header);
  for (const record of records) {
    const values = new Map<string, unknown>(Object.entries(record));
    const row: CsvCell[] = header.map((column) => toCsvCell(values.get(column)));
    sheet.addRow(row);
  }
  return Buffer.from(await workbook.csv.writeBuffer());
};
