import { GEOCODER_BASE_URL, GEOCODER_SOURCE } from "../config/sources";
import { describeError } from "./errors";
import type { HttpClient } from "./fetcher";
import type { GeocodeResult, RawGeocode, ReverseGeocodeResult } from "./types";

export type GeocodeOutcome =
  | { status: "found"; result: GeocodeResult }
  | { status: "not_found" }
  | { status: "error"; message: string };

export type GeocodeQuery = {
  id: number;
  address: string;
  city?: string | null;
  postcode?: string | null;
};

export type GeocodeBatchEntry = {
  id: number;
  query: GeocodeQuery;
  result: GeocodeResult | null;
  error: "not_found" | "request_failed" | null;
};

export type GeocoderStats = {
  requestsMade: number;
  cacheHits: number;
  found: number;
  notFound: number;
  errors: number;
};

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readString = (record: JsonRecord, key: string) => {
  const value = record[key];
  if (typeof value === "string") {
    return value;
  }
  return typeof value === "number" ? String(value) : "";
};

const readNumber = (record: JsonRecord, key: string) => {
  const value = record[key];
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
};

const firstFeature = (payload: unknown): JsonRecord | null => {
  if (!isRecord(payload) || !Array.isArray(payload.features)) {
    return null;
  }
  const [feature] = payload.features;
  return isRecord(feature) ? feature : null;
};

export const buildCacheKey = (address: string, city?: string | null, postcode?: string | null) => {
  const parts = [address.toLowerCase().trim()];
  if (city) {
    parts.push(city.toLowerCase().trim());
  }
  if (postcode) {
    parts.push(postcode.trim());
  }
  return parts.join("|");
};

/**
 * Parses the first feature of a GeoJSON FeatureCollection. Coordinates come
 * as [lon, lat].
 */
export const parseSearchResponse = (payload: unknown, queriedAt: Date): GeocodeResult | null => {
  const feature = firstFeature(payload);
  if (!feature) {
    return null;
  }
  const geometry: JsonRecord = isRecord(feature.geometry) ? feature.geometry : {};
  const properties: JsonRecord = isRecord(feature.properties) ? feature.properties : {};
  const coordinates = geometry.coordinates;
  if (!Array.isArray(coordinates) || coordinates.length < 2) {
    return null;
  }
  const [longitude, latitude] = coordinates;
  if (typeof longitude !== "number" || typeof latitude !== "number") {
    return null;
  }

  return {
    latitude,
    longitude,
    label: readString(properties, "label"),
    score: readNumber(properties, "score"),
    city: readString(properties, "city"),
    postcode: readString(properties, "postcode"),
    context: readString(properties, "context"),
    type: readString(properties, "type"),
    queriedAt,
  };
};

/**
 * Address -> coordinates memo. A stored `null` means the address was looked
 * up and confirmed missing; an absent key means it was never queried.
 */
export class GeocodeCache {
  private readonly entries = new Map<string, GeocodeResult | null>();

  has(key: string) {
    return this.entries.has(key);
  }

  get(key: string): GeocodeResult | null | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: GeocodeResult | null) {
    this.entries.set(key, value);
  }

  clear() {
    this.entries.clear();
  }

  get size() {
    return this.entries.size;
  }
}

export type GeocodingClientOptions = {
  client: HttpClient;
  batchId: string;
  baseUrl?: string;
  cache?: GeocodeCache;
  now?: () => Date;
};

export class GeocodingClient {
  readonly baseUrl: string;
  readonly cache: GeocodeCache;
  stats: GeocoderStats = { requestsMade: 0, cacheHits: 0, found: 0, notFound: 0, errors: 0 };
  // Raw responses kept for the bronze export.
  readonly history: RawGeocode[] = [];
  private readonly client: HttpClient;
  private readonly batchId: string;
  private readonly now: () => Date;

  constructor(options: GeocodingClientOptions) {
    this.client = options.client;
    this.batchId = options.batchId;
    this.baseUrl = options.baseUrl ?? GEOCODER_BASE_URL;
    this.cache = options.cache ?? new GeocodeCache();
    this.now = options.now ?? (() => new Date());
  }

  buildSearchUrl(address: string, city?: string | null, postcode?: string | null) {
    const query = [address, city, postcode].filter(Boolean).join(" ");
    const url = new URL("search/", this.baseUrl);
    url.searchParams.set("q", query);
    url.searchParams.set("limit", "1");
    if (postcode) {
      url.searchParams.set("postcode", postcode.trim());
    }
    return { query, url: url.toString() };
  }

  async geocode(
    address: string,
    city?: string | null,
    postcode?: string | null,
    options: { signal?: AbortSignal } = {},
  ): Promise<GeocodeOutcome> {
    const key = buildCacheKey(address, city, postcode);
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      this.stats.cacheHits += 1;
      return cached ? { status: "found", result: cached } : { status: "not_found" };
    }

    const { query, url } = this.buildSearchUrl(address, city, postcode);
    let payload: unknown;
    try {
      this.stats.requestsMade += 1;
      payload = await this.client.getJson(url, options);
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      this.stats.errors += 1;
      console.warn(`[geocode] lookup failed for "${query}":`, describeError(error));
      return { status: "error", message: describeError(error) };
    }

    const queriedAt = this.now();
    const result = parseSearchResponse(payload, queriedAt);
    this.cache.set(key, result);
    this.history.push({
      query,
      result,
      metadata: { source: GEOCODER_SOURCE, fetchedAt: queriedAt, batchId: this.batchId },
    });

    if (!result) {
      this.stats.notFound += 1;
      console.warn(`[geocode] address not found: ${query}`);
      return { status: "not_found" };
    }
    this.stats.found += 1;
    return { status: "found", result };
  }

  async geocodeBatch(
    queries: GeocodeQuery[],
    options: { signal?: AbortSignal } = {},
  ): Promise<GeocodeBatchEntry[]> {
    console.log(`[geocode] geocoding ${queries.length} addresses`);
    const entries: GeocodeBatchEntry[] = [];

    for (const query of queries) {
      const outcome = await this.geocode(query.address, query.city, query.postcode, options);
      entries.push({
        id: query.id,
        query,
        result: outcome.status === "found" ? outcome.result : null,
        error: outcome.status === "found"
          ? null
          : outcome.status === "not_found" ? "not_found" : "request_failed",
      });
    }

    console.log(
      `[geocode] done: ${this.stats.found} found, ${this.stats.notFound} not found, ` +
        `${this.stats.cacheHits} cache hits, ${this.stats.requestsMade} requests, ${this.stats.errors} errors`,
    );
    return entries;
  }

  async reverseGeocode(
    latitude: number,
    longitude: number,
    options: { signal?: AbortSignal } = {},
  ): Promise<ReverseGeocodeResult | null> {
    const url = new URL("reverse/", this.baseUrl);
    url.searchParams.set("lon", String(longitude));
    url.searchParams.set("lat", String(latitude));

    let payload: unknown;
    try {
      this.stats.requestsMade += 1;
      payload = await this.client.getJson(url.toString(), options);
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      this.stats.errors += 1;
      console.warn(`[geocode] reverse lookup failed for ${latitude},${longitude}:`, describeError(error));
      return null;
    }

    const feature = firstFeature(payload);
    if (!feature || !isRecord(feature.properties)) {
      return null;
    }
    const properties = feature.properties;
    return {
      label: readString(properties, "label"),
      housenumber: readString(properties, "housenumber"),
      street: readString(properties, "street"),
      city: readString(properties, "city"),
      postcode: readString(properties, "postcode"),
      context: readString(properties, "context"),
    };
  }

  clearCache() {
    this.cache.clear();
    console.log("[geocode] cache cleared");
  }
}
