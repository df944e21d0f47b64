import { randomBytes } from "crypto";
import type { Domain, DomainCounters, DomainState } from "./types";

const pad = (value: number) => String(value).padStart(2, "0");

/** `YYYYMMDD_HHMMSS` in UTC. */
export const formatTimestamp = (date: Date) =>
  `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
  `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;

export const createBatchId = (date: Date, suffix = randomBytes(4).toString("hex")) =>
  `pipeline_${formatTimestamp(date)}_${suffix}`;

export const emptyCounters = (): DomainCounters => ({
  extracted: 0,
  transformed: 0,
  loaded: 0,
  duplicates: 0,
  invalid: 0,
  failed: 0,
});

export type DomainProgress = {
  domain: Domain;
  state: DomainState;
  counters: DomainCounters;
  error: string | null;
};

export type BatchMetadata = {
  batchId: string;
  startedAt: Date;
  endedAt: Date | null;
  domains: DomainProgress[];
  errors: string[];
};

export const createBatchMetadata = (
  startedAt: Date,
  domains: Domain[],
  batchId = createBatchId(startedAt),
): BatchMetadata => ({
  batchId,
  startedAt,
  endedAt: null,
  domains: domains.map((domain): DomainProgress => ({ domain, state: "pending", counters: emptyCounters(), error: null })),
  errors: [],
});
