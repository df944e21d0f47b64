import { createHash } from "crypto";
import { bucketRevenue, pseudonymize } from "./anonymize";
import { describeError } from "./errors";
import type { GeocodeBatchEntry } from "./geocode";
import { emptyToNull, normalizeText, normalizeWhitespace, slugify, titleCase } from "./normalize";
import type {
  CleanBook,
  CleanLibrairie,
  CleanQuote,
  RawBook,
  RawLibrairie,
  RawQuote,
} from "./types";

const RATING_TOKENS: Record<string, number> = {
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
};

export const parseRating = (token: string) => RATING_TOKENS[token.trim().toLowerCase()] ?? 0;

export type Availability = {
  inStock: boolean;
  count: number;
};

export const parseAvailability = (text: string): Availability => {
  const match = /\((\d+) available\)/i.exec(text);
  if (match) {
    const count = Number(match[1]);
    return { inStock: count > 0, count };
  }
  if (/in stock/i.test(text)) {
    return { inStock: true, count: 1 };
  }
  return { inStock: false, count: 0 };
};

/**
 * Extracts the amount from strings such as "£51.77", "Â£1,299.00" or "51,77".
 * A single comma before exactly two digits is a decimal comma; any other comma
 * groups thousands.
 */
export const parsePrice = (text: string) => {
  const match = /\d[\d,]*(?:\.\d+)?/.exec(text);
  if (!match) {
    return null;
  }
  const amount = /^\d+,\d{2}$/.test(match[0]) ? match[0].replace(",", ".") : match[0].replace(/,/g, "");
  const value = Number(amount);
  return Number.isFinite(value) ? value : null;
};

export const roundCurrency = (value: number) => Math.round((value + Number.EPSILON) * 100) / 100;

export const convertPrice = (value: number, rate: number) => roundCurrency(value * rate);

export const contentHash = (text: string) =>
  createHash("sha256").update(normalizeText(text), "utf8").digest("hex");

export type Deduplicated<T> = {
  kept: T[];
  dropped: number;
};

/** First occurrence of each key wins; later ones are counted and dropped. */
export const dedupeByContent = <T>(items: T[], keyOf: (item: T) => string): Deduplicated<T> => {
  const seen = new Set<string>();
  const kept: T[] = [];
  let dropped = 0;
  for (const item of items) {
    const key = keyOf(item);
    if (seen.has(key)) {
      dropped += 1;
      continue;
    }
    seen.add(key);
    kept.push(item);
  }
  return { kept, dropped };
};

export type TransformOutcome<T> = {
  records: T[];
  duplicates: number;
  errors: string[];
};

export const transformBook = (book: RawBook, rate: number): CleanBook => {
  const priceGbp = parsePrice(book.price);
  if (priceGbp === null) {
    throw new Error(`unparseable price "${book.price}"`);
  }
  const title = normalizeWhitespace(book.title);
  const category = normalizeWhitespace(book.category) || "Uncategorized";
  const availability = parseAvailability(book.availability);

  return {
    title,
    category,
    categorySlug: slugify(category),
    priceGbp,
    priceEur: convertPrice(priceGbp, rate),
    rating: parseRating(book.ratingToken),
    inStock: availability.inStock,
    availableCount: availability.count,
    url: book.url,
    imageUrl: book.imageUrl,
    contentHash: contentHash(`${title}|${book.url}`),
    scrapedAt: book.metadata.fetchedAt,
    batchId: book.metadata.batchId,
  };
};

export const transformBooks = (books: RawBook[], rate: number): TransformOutcome<CleanBook> => {
  const errors: string[] = [];
  const transformed: CleanBook[] = [];
  for (const book of books) {
    try {
      transformed.push(transformBook(book, rate));
    } catch (error) {
      errors.push(`book "${book.title}": ${describeError(error)}`);
      console.warn(`[transform] book "${book.title}" skipped:`, describeError(error));
    }
  }
  const { kept, dropped } = dedupeByContent(transformed, (book) => book.contentHash);
  console.log(`[transform] ${kept.length} books transformed (${dropped} duplicates dropped)`);
  return { records: kept, duplicates: dropped, errors };
};

export const transformQuote = (quote: RawQuote): CleanQuote => {
  const text = normalizeWhitespace(quote.text);
  if (!text) {
    throw new Error("empty quote text");
  }
  const author = normalizeWhitespace(quote.author) || "Unknown";
  const tags = Array.from(
    new Set(quote.tags.map((tag) => slugify(tag)).filter(Boolean)),
  );

  return {
    text,
    textHash: contentHash(text),
    author,
    authorSlug: slugify(author),
    authorUrl: quote.authorUrl,
    tags,
    scrapedAt: quote.metadata.fetchedAt,
    batchId: quote.metadata.batchId,
  };
};

export const transformQuotes = (quotes: RawQuote[]): TransformOutcome<CleanQuote> => {
  const errors: string[] = [];
  const transformed: CleanQuote[] = [];
  for (const quote of quotes) {
    try {
      transformed.push(transformQuote(quote));
    } catch (error) {
      errors.push(`quote by ${quote.author}: ${describeError(error)}`);
      console.warn(`[transform] quote by ${quote.author} skipped:`, describeError(error));
    }
  }
  const { kept, dropped } = dedupeByContent(transformed, (quote) => quote.textHash);
  console.log(`[transform] ${kept.length} quotes transformed (${dropped} duplicates dropped)`);
  return { records: kept, duplicates: dropped, errors };
};

/**
 * Bronze -> silver for partner rows. Contact fields only survive as the salted
 * hash; revenue only as its bucket label.
 */
export const anonymizeLibrairie = (record: RawLibrairie, salt: string): CleanLibrairie => {
  const name = normalizeWhitespace(record.name);
  const postcode = record.postcode.trim();
  return {
    name,
    slug: slugify(`${name} ${postcode}`),
    address: normalizeWhitespace(record.address),
    postcode,
    city: titleCase(record.city),
    specialty: emptyToNull(record.specialty),
    partnershipDate: emptyToNull(record.partnershipDate),
    revenueRange: bucketRevenue(record.annualRevenue),
    contactHash: pseudonymize(
      [record.contactName, record.contactEmail, record.contactPhone],
      salt,
    ),
    latitude: null,
    longitude: null,
    geocodeScore: null,
    importedAt: record.metadata.fetchedAt,
    batchId: record.metadata.batchId,
  };
};

export const applyGeocoding = (
  librairies: CleanLibrairie[],
  entries: GeocodeBatchEntry[],
): CleanLibrairie[] => {
  const byId = new Map(entries.map((entry) => [entry.id, entry]));
  return librairies.map((librairie, index) => {
    const result = byId.get(index)?.result;
    if (!result) {
      return librairie;
    }
    return {
      ...librairie,
      latitude: result.latitude,
      longitude: result.longitude,
      geocodeScore: result.score,
    };
  });
};

export const transformLibrairies = (
  records: RawLibrairie[],
  salt: string,
): TransformOutcome<CleanLibrairie> => {
  const cleaned = records.map((record) => anonymizeLibrairie(record, salt));
  const { kept, dropped } = dedupeByContent(cleaned, (librairie) => librairie.slug);
  console.log(`[transform] ${kept.length} librairies anonymized (${dropped} duplicates dropped)`);
  return { records: kept, duplicates: dropped, errors: [] };
};
