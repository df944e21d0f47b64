import type { ZodType } from "zod";
import type { ObjectStore, RelationalStore } from "../repo/types";
import { readAnalytics, type AnalyticsSnapshot } from "./analytics";
import { createBatchMetadata, type BatchMetadata, type DomainProgress } from "./batch";
import { BooksExtractor } from "./books";
import { describeError, isConnectionFailure } from "./errors";
import { HttpClient, type FetchLike } from "./fetcher";
import { GeocodingClient } from "./geocode";
import { cleanBookSchema, cleanLibrairieSchema, cleanQuoteSchema, rawBookSchema, rawQuoteSchema } from "./layers";
import { StagedLoader, type Buckets, type ExportDomain } from "./loader";
import { QuotesExtractor } from "./quotes";
import { buildRunReport, type RunReport } from "./report";
import { RateLimiter, RetryPolicy, sleep as defaultSleep, type Sleep } from "./retry";
import {
  getBuckets,
  getDomains,
  getGbpToEurRate,
  getGeocodeDelayMs,
  getGeocodeTimeoutMs,
  getHashSalt,
  getHttpTimeoutMs,
  getLibrairiesFile,
  getMaxPages,
  getMaxRetries,
  getPageCap,
  getPhase,
  getRequestDelayMs,
  getRetryBaseDelayMs,
  shouldBackup,
  shouldDownloadImages,
  shouldReadAnalytics,
} from "./settings";
import { importFile } from "./spreadsheet";
import { applyGeocoding, transformBooks, transformLibrairies, transformQuotes } from "./transform";
import type {
  CleanBook,
  CleanLibrairie,
  CleanQuote,
  Domain,
  Layer,
  PipelinePhase,
  RawBook,
  RawLibrairie,
  RawQuote,
} from "./types";

export type PipelineResources = {
  store: RelationalStore;
  objects: ObjectStore;
};

export type ResourceFactory = () => Promise<PipelineResources>;

export type PipelineConfig = {
  domains: Domain[];
  phase: PipelinePhase;
  analytics: boolean;
  maxPages: number | null;
  pageCap: number;
  limitCategories: number | null;
  downloadImages: boolean;
  backup: boolean;
  librairiesFile: string;
  hashSalt: string | null;
  gbpToEur: number;
  requestDelayMs: number;
  geocodeDelayMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  httpTimeoutMs: number;
  geocodeTimeoutMs: number;
  buckets: Buckets;
};

export const loadPipelineConfig = (overrides: Partial<PipelineConfig> = {}): PipelineConfig => ({
  domains: getDomains(),
  phase: getPhase(),
  analytics: shouldReadAnalytics(),
  maxPages: getMaxPages(),
  pageCap: getPageCap(),
  limitCategories: null,
  downloadImages: shouldDownloadImages(),
  backup: shouldBackup(),
  librairiesFile: getLibrairiesFile(),
  hashSalt: getHashSalt(),
  gbpToEur: getGbpToEurRate(),
  requestDelayMs: getRequestDelayMs(),
  geocodeDelayMs: getGeocodeDelayMs(),
  maxRetries: getMaxRetries(),
  retryBaseDelayMs: getRetryBaseDelayMs(),
  httpTimeoutMs: getHttpTimeoutMs(),
  geocodeTimeoutMs: getGeocodeTimeoutMs(),
  buckets: getBuckets(),
  ...overrides,
});

export type SourceUrls = {
  books?: string;
  quotes?: string;
  geocoder?: string;
};

export type PipelineOrchestratorOptions = {
  config: PipelineConfig;
  createResources: ResourceFactory;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  now?: () => Date;
  batchId?: string;
  sources?: SourceUrls;
};

type DomainContext = {
  progress: DomainProgress;
  loader: StagedLoader;
  signal?: AbortSignal;
};

type SilverSnapshot = {
  books: CleanBook[];
  quotes: CleanQuote[];
  librairies: CleanLibrairie[];
};

/**
 * Runs each requested domain through EXTRACT -> TRANSFORM -> LOAD, or through
 * the one stage `config.phase` names, reading its input from the latest export
 * of the previous layer. A failed domain is recorded and the next one runs; a
 * lost connection or a cancellation stops the whole batch. Resources are
 * opened once and closed on every exit path.
 */
export class PipelineOrchestrator {
  readonly batch: BatchMetadata;
  private readonly config: PipelineConfig;
  private readonly createResources: ResourceFactory;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly sources: SourceUrls;
  private readonly exports: string[] = [];
  private readonly silver: SilverSnapshot = { books: [], quotes: [], librairies: [] };

  constructor(options: PipelineOrchestratorOptions) {
    this.config = options.config;
    this.createResources = options.createResources;
    this.fetchImpl = options.fetchImpl;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.sources = options.sources ?? {};
    this.batch = createBatchMetadata(this.now(), this.config.domains, options.batchId);
  }

  private createClient(label: string, minIntervalMs: number, timeoutMs: number, accept?: string) {
    return new HttpClient({
      label,
      accept,
      timeoutMs,
      retry: new RetryPolicy({
        maxAttempts: this.config.maxRetries,
        baseDelayMs: this.config.retryBaseDelayMs,
      }),
      limiter: new RateLimiter({ minIntervalMs, sleep: this.sleep }),
      fetchImpl: this.fetchImpl,
      sleep: this.sleep,
    });
  }

  private recordErrors(messages: string[]) {
    this.batch.errors.push(...messages);
  }

  private async exportLayer<T extends object>(
    loader: StagedLoader,
    domain: ExportDomain,
    layer: Layer,
    records: T[],
  ) {
    const uris = await loader.exportLayer(domain, layer, records);
    this.exports.push(...uris);
  }

  private isPhase(phase: PipelinePhase) {
    return this.config.phase === phase;
  }

  private async readLayer<T>(
    { loader, progress }: DomainContext,
    layer: Layer,
    schema: ZodType<T>,
  ): Promise<T[]> {
    const snapshot = await loader.readLatestLayer(progress.domain, layer, schema);
    if (!snapshot) {
      throw new Error(`no ${layer} export found for ${progress.domain}`);
    }
    return snapshot.records;
  }

  private createBooksExtractor() {
    const client = this.createClient("books", this.config.requestDelayMs, this.config.httpTimeoutMs);
    return new BooksExtractor({
      client,
      batchId: this.batch.batchId,
      baseUrl: this.sources.books,
      pageCap: this.config.pageCap,
      now: this.now,
    });
  }

  private async extractBooks({ progress, loader, signal }: DomainContext, extractor: BooksExtractor) {
    const { counters } = progress;
    progress.state = "extract";
    const raw: RawBook[] = [];
    for await (const book of extractor.extract({
      maxPages: this.config.maxPages,
      limitCategories: this.config.limitCategories,
      signal,
    })) {
      raw.push(book);
    }
    counters.extracted = raw.length;
    counters.invalid += extractor.stats.parseErrors;
    this.recordErrors(extractor.stats.errors);
    if (!raw.length && extractor.stats.pageErrors) {
      throw new Error(`no books extracted (${extractor.stats.pageErrors} page errors)`);
    }
    await this.exportLayer(loader, "books", "bronze", raw);
    return raw;
  }

  private async transformBookLayer(
    { progress, loader, signal }: DomainContext,
    raw: RawBook[],
    extractor: BooksExtractor,
  ) {
    const { counters } = progress;
    progress.state = "transform";
    signal?.throwIfAborted();
    const transformed = transformBooks(raw, this.config.gbpToEur);
    counters.transformed = transformed.records.length;
    counters.duplicates += transformed.duplicates;
    counters.invalid += transformed.errors.length;
    this.recordErrors(transformed.errors);

    const imageUris = new Map<string, string>();
    if (this.config.downloadImages) {
      for (const book of transformed.records) {
        signal?.throwIfAborted();
        if (!book.imageUrl || imageUris.has(book.imageUrl)) {
          continue;
        }
        const bytes = await extractor.downloadImage(book.imageUrl, signal);
        if (bytes) {
          imageUris.set(book.imageUrl, await loader.storeBookImage(bytes, book));
        }
      }
      console.log(`[pipeline] ${imageUris.size} book images stored`);
    }
    await this.exportLayer(loader, "books", "silver", transformed.records);
    this.silver.books = transformed.records;
    return { records: transformed.records, imageUris };
  }

  private async runBooks(context: DomainContext) {
    const { progress, loader, signal } = context;
    const { counters } = progress;
    const extractor = this.createBooksExtractor();

    let records: CleanBook[];
    let imageUris: Map<string, string>;
    if (this.isPhase("load")) {
      progress.state = "load";
      records = await this.readLayer(context, "silver", cleanBookSchema);
      counters.transformed = records.length;
      imageUris = await loader.findStoredBookImages(records);
    } else {
      let raw: RawBook[];
      if (this.isPhase("transform")) {
        progress.state = "transform";
        raw = await this.readLayer(context, "bronze", rawBookSchema);
        counters.extracted = raw.length;
      } else {
        raw = await this.extractBooks(context, extractor);
        if (this.isPhase("extract")) {
          return;
        }
      }
      ({ records, imageUris } = await this.transformBookLayer(context, raw, extractor));
      if (this.isPhase("transform")) {
        return;
      }
    }

    progress.state = "load";
    const summary = await loader.loadBooks(records, { signal, imageUris });
    counters.loaded = summary.loaded;
    counters.duplicates += summary.duplicates;
    counters.failed = summary.failed;
  }

  private async extractQuotes({ progress, loader, signal }: DomainContext) {
    const { counters } = progress;
    progress.state = "extract";
    const client = this.createClient("quotes", this.config.requestDelayMs, this.config.httpTimeoutMs);
    const extractor = new QuotesExtractor({
      client,
      batchId: this.batch.batchId,
      baseUrl: this.sources.quotes,
      pageCap: this.config.pageCap,
      now: this.now,
    });
    const raw: RawQuote[] = [];
    for await (const quote of extractor.extract({ maxPages: this.config.maxPages, signal })) {
      raw.push(quote);
    }
    counters.extracted = raw.length;
    counters.invalid += extractor.stats.parseErrors;
    this.recordErrors(extractor.stats.errors);
    if (!raw.length && extractor.stats.pageErrors) {
      throw new Error(`no quotes extracted (${extractor.stats.pageErrors} page errors)`);
    }
    await this.exportLayer(loader, "quotes", "bronze", raw);
    return raw;
  }

  private async transformQuoteLayer({ progress, loader, signal }: DomainContext, raw: RawQuote[]) {
    const { counters } = progress;
    progress.state = "transform";
    signal?.throwIfAborted();
    const transformed = transformQuotes(raw);
    counters.transformed = transformed.records.length;
    counters.duplicates += transformed.duplicates;
    counters.invalid += transformed.errors.length;
    this.recordErrors(transformed.errors);
    await this.exportLayer(loader, "quotes", "silver", transformed.records);
    this.silver.quotes = transformed.records;
    return transformed.records;
  }

  private async runQuotes(context: DomainContext) {
    const { progress, loader, signal } = context;
    const { counters } = progress;

    let records: CleanQuote[];
    if (this.isPhase("load")) {
      progress.state = "load";
      records = await this.readLayer(context, "silver", cleanQuoteSchema);
      counters.transformed = records.length;
    } else {
      let raw: RawQuote[];
      if (this.isPhase("transform")) {
        progress.state = "transform";
        raw = await this.readLayer(context, "bronze", rawQuoteSchema);
        counters.extracted = raw.length;
      } else {
        raw = await this.extractQuotes(context);
        if (this.isPhase("extract")) {
          return;
        }
      }
      records = await this.transformQuoteLayer(context, raw);
      if (this.isPhase("transform")) {
        return;
      }
    }

    progress.state = "load";
    const summary = await loader.loadQuotes(records, { signal });
    counters.loaded = summary.loaded;
    counters.duplicates += summary.duplicates;
    counters.failed = summary.failed;
  }

  private async importLibrairies({ progress, signal }: DomainContext) {
    const { counters } = progress;
    progress.state = "extract";
    const imported = await importFile(this.config.librairiesFile, {
      batchId: this.batch.batchId,
      now: this.now,
      signal,
    });
    counters.extracted = imported.stats.rowsRead;
    counters.invalid += imported.stats.rowsInvalid;
    this.recordErrors(imported.invalid.map((error) => error.message));
    return imported.records;
  }

  private async transformLibrairieLayer(
    { progress, loader, signal }: DomainContext,
    raw: RawLibrairie[],
    salt: string,
  ) {
    const { counters } = progress;
    progress.state = "transform";
    const transformed = transformLibrairies(raw, salt);
    counters.duplicates += transformed.duplicates;

    const client = this.createClient(
      "geocode",
      this.config.geocodeDelayMs,
      this.config.geocodeTimeoutMs,
      "application/json",
    );
    const geocoder = new GeocodingClient({
      client,
      batchId: this.batch.batchId,
      baseUrl: this.sources.geocoder,
      now: this.now,
    });
    const entries = await geocoder.geocodeBatch(
      transformed.records.map((librairie, id) => ({
        id,
        address: librairie.address,
        city: librairie.city,
        postcode: librairie.postcode,
      })),
      { signal },
    );
    const enriched = applyGeocoding(transformed.records, entries);
    counters.transformed = enriched.length;
    for (const entry of entries) {
      if (entry.error === "request_failed") {
        this.recordErrors([`geocoding failed for "${entry.query.address}"`]);
      }
    }
    await this.exportLayer(loader, "geocoding", "bronze", geocoder.history);
    await this.exportLayer(loader, "librairies", "silver", enriched);
    this.silver.librairies = enriched;
    return enriched;
  }

  // Bronze partner rows are never exported, so a transform-only run re-reads the file.
  private async runLibrairies(context: DomainContext) {
    const { progress, loader, signal } = context;
    const { counters } = progress;

    let records: CleanLibrairie[];
    if (this.isPhase("load")) {
      progress.state = "load";
      records = await this.readLayer(context, "silver", cleanLibrairieSchema);
      counters.transformed = records.length;
    } else {
      const salt = this.config.hashSalt;
      if (!salt && !this.isPhase("extract")) {
        throw new Error("ETL_HASH_SALT is required to pseudonymize partner contacts");
      }
      const raw = await this.importLibrairies(context);
      if (this.isPhase("extract") || !salt) {
        return;
      }
      records = await this.transformLibrairieLayer(context, raw, salt);
      if (this.isPhase("transform")) {
        return;
      }
    }

    progress.state = "load";
    const summary = await loader.loadLibrairies(records, { signal });
    counters.loaded = summary.loaded;
    counters.duplicates += summary.duplicates;
    counters.failed = summary.failed;
  }

  private runDomain(domain: Domain, context: DomainContext) {
    if (domain === "books") {
      return this.runBooks(context);
    }
    if (domain === "quotes") {
      return this.runQuotes(context);
    }
    return this.runLibrairies(context);
  }

  private async closeResources(resources: PipelineResources) {
    for (const [name, resource] of [
      ["relational store", resources.store],
      ["object store", resources.objects],
    ] as const) {
      try {
        await resource.close();
      } catch (error) {
        const message = `closing ${name} failed: ${describeError(error)}`;
        this.batch.errors.push(message);
        console.error(`[pipeline] ${message}`);
      }
    }
  }

  async run(signal?: AbortSignal): Promise<RunReport> {
    const { batch } = this;
    const { phase } = this.config;
    console.log(`[pipeline] batch ${batch.batchId} (${phase}): ${this.config.domains.join(", ")}`);

    let aborted = false;
    let backupUri: string | null = null;
    let analytics: AnalyticsSnapshot | null = null;
    let resources: PipelineResources;
    try {
      resources = await this.createResources();
    } catch (error) {
      batch.errors.push(`resources: ${describeError(error)}`);
      console.error("[pipeline] could not open resources:", describeError(error));
      batch.endedAt = this.now();
      return buildRunReport(batch, { aborted: true, phase, exports: this.exports, backupUri, analytics });
    }

    try {
      const loader = new StagedLoader({
        store: resources.store,
        objects: resources.objects,
        buckets: this.config.buckets,
        now: this.now,
      });

      for (const progress of batch.domains) {
        if (signal?.aborted) {
          aborted = true;
          batch.errors.push("run cancelled");
          break;
        }
        const loaderErrors = loader.errors.length;
        try {
          console.log(`[pipeline] ${progress.domain}: starting`);
          await this.runDomain(progress.domain, { progress, loader, signal });
          progress.state = "done";
          console.log(`[pipeline] ${progress.domain}: done`, progress.counters);
        } catch (error) {
          progress.state = "failed";
          progress.error = describeError(error);
          batch.errors.push(`${progress.domain}: ${progress.error}`);
          console.error(`[pipeline] ${progress.domain} failed:`, progress.error);
          if (signal?.aborted || isConnectionFailure(error)) {
            aborted = true;
          }
        } finally {
          this.recordErrors(loader.errors.slice(loaderErrors));
        }
        if (aborted) {
          break;
        }
      }

      if (this.config.backup && !aborted) {
        try {
          backupUri = await loader.backup({
            batchId: batch.batchId,
            createdAt: this.now().toISOString(),
            silver: this.silver,
          });
        } catch (error) {
          batch.errors.push(`backup: ${describeError(error)}`);
          console.error("[pipeline] backup failed:", describeError(error));
        }
      }

      if (this.config.analytics && !aborted) {
        try {
          analytics = await readAnalytics(resources.store);
        } catch (error) {
          batch.errors.push(`analytics: ${describeError(error)}`);
          console.error("[pipeline] analytics failed:", describeError(error));
        }
      }
    } finally {
      await this.closeResources(resources);
    }

    batch.endedAt = this.now();
    const report = buildRunReport(batch, { aborted, phase, exports: this.exports, backupUri, analytics });
    console.log(`[pipeline] batch ${batch.batchId} ${report.status}`, report.totals);
    return report;
  }
}
