/**
 * Schemas for layer exports read back from the object store. Dates travel as
 * ISO strings in the JSON and are coerced back here.
 */

import { z, type ZodType } from "zod";
import { describeError, ParseError } from "./errors";
import type { CleanBook, CleanLibrairie, CleanQuote, RawBook, RawQuote } from "./types";

const sourceMetadataSchema = z.object({
  source: z.string(),
  fetchedAt: z.coerce.date(),
  batchId: z.string(),
});

// Bronze

export const rawBookSchema: ZodType<RawBook> = z.object({
  title: z.string(),
  price: z.string(),
  ratingToken: z.string(),
  availability: z.string(),
  category: z.string(),
  url: z.string(),
  imageUrl: z.string().nullable(),
  metadata: sourceMetadataSchema,
});

export const rawQuoteSchema: ZodType<RawQuote> = z.object({
  text: z.string(),
  author: z.string(),
  authorUrl: z.string().nullable(),
  tags: z.array(z.string()),
  metadata: sourceMetadataSchema,
});

// Silver

export const cleanBookSchema: ZodType<CleanBook> = z.object({
  title: z.string(),
  category: z.string(),
  categorySlug: z.string().min(1),
  priceGbp: z.number(),
  priceEur: z.number(),
  rating: z.number().int().min(0).max(5),
  inStock: z.boolean(),
  availableCount: z.number().int(),
  url: z.string(),
  imageUrl: z.string().nullable(),
  contentHash: z.string().min(1),
  scrapedAt: z.coerce.date(),
  batchId: z.string(),
});

export const cleanQuoteSchema: ZodType<CleanQuote> = z.object({
  text: z.string(),
  textHash: z.string().min(1),
  author: z.string(),
  authorSlug: z.string().min(1),
  authorUrl: z.string().nullable(),
  tags: z.array(z.string()),
  scrapedAt: z.coerce.date(),
  batchId: z.string(),
});

export const cleanLibrairieSchema: ZodType<CleanLibrairie> = z.object({
  name: z.string(),
  slug: z.string().min(1),
  address: z.string(),
  postcode: z.string(),
  city: z.string(),
  specialty: z.string().nullable(),
  partnershipDate: z.string().nullable(),
  revenueRange: z.string(),
  contactHash: z.string().nullable(),
  latitude: z.number().nullable(),
  longitude: z.number().nullable(),
  geocodeScore: z.number().nullable(),
  importedAt: z.coerce.date(),
  batchId: z.string(),
});

export const reviveLayer = <T>(schema: ZodType<T>, body: string, source: string): T[] => {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    throw new ParseError(source, `invalid JSON (${describeError(error)})`);
  }
  const result = z.array(schema).safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`);
    throw new ParseError(source, issues.join("; "));
  }
  return result.data;
};
