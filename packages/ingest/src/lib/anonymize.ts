import { createHash } from "crypto";
import { REVENUE_BUCKETS, REVENUE_MISSING_LABEL } from "../config/sources";

/**
 * Salted SHA-256 over the non-empty personal fields, joined with `|`.
 * Returns null when there is nothing to hash.
 */
export const pseudonymize = (values: Array<string | null | undefined>, salt: string) => {
  const present = values
    .map((value) => value?.trim() ?? "")
    .filter(Boolean);
  if (!present.length) {
    return null;
  }
  return createHash("sha256").update(`${salt}:${present.join("|")}`, "utf8").digest("hex");
};

export const bucketRevenue = (value: number | null | undefined) => {
  if (value === null || value === undefined || !Number.isFinite(value)) {
    return REVENUE_MISSING_LABEL;
  }
  const bucket = REVENUE_BUCKETS.find((candidate) => value < candidate.below);
  return bucket ? bucket.label : REVENUE_MISSING_LABEL;
};
