import { existsSync } from "fs";
import { dirname, join, resolve } from "path";
import { config as readEnvFile } from "dotenv";
import type { PoolConfig } from "pg";
import type { S3StoreConfig } from "../repo/s3";
import { DEFAULT_PAGE_CAP } from "./paginate";
import type { Buckets } from "./loader";
import type { Domain, PipelinePhase } from "./types";

export const ALL_DOMAINS: Domain[] = ["books", "quotes", "librairies"];

export const PIPELINE_PHASES: PipelinePhase[] = ["all", "extract", "transform", "load"];

type NumberBound = "positive" | "non-negative";

/**
 * Reads a numeric variable. Unset values give null; out-of-range ones are
 * logged and also give null so the caller's default applies.
 */
const readNumber = (key: string, bound: NumberBound, integer = true): number | null => {
  const raw = process.env[key]?.trim();
  if (!raw) {
    return null;
  }
  const parsed = Number(raw);
  const value = integer ? Math.floor(parsed) : parsed;
  if (!Number.isFinite(value) || (bound === "positive" ? value <= 0 : value < 0)) {
    console.warn(`[settings] ignoring ${key}="${raw}": expected a ${bound} ${integer ? "integer" : "number"}`);
    return null;
  }
  return value;
};

/**
 * Loads the nearest .env at or above `from`. Variables already set in the
 * environment keep their value.
 */
export const loadEnvironment = (from = process.cwd()): string | null => {
  for (let dir = resolve(from); ; dir = dirname(dir)) {
    const envPath = join(dir, ".env");
    if (existsSync(envPath)) {
      readEnvFile({ path: envPath });
      return envPath;
    }
    if (dirname(dir) === dir) {
      return null;
    }
  }
};

const isDomain = (value: string): value is Domain =>
  value === "books" || value === "quotes" || value === "librairies";

export const parseDomains = (raw: string | undefined): Domain[] => {
  if (!raw) {
    return ALL_DOMAINS;
  }
  const domains = raw
    .split(",")
    .map((value) => value.trim().toLowerCase())
    .filter(isDomain);
  return domains.length ? Array.from(new Set(domains)) : ALL_DOMAINS;
};

export const getDomains = (): Domain[] => parseDomains(process.env.ETL_DOMAINS);

export const getDatabaseConfig = (): PoolConfig => {
  if (process.env.DATABASE_URL) {
    return { connectionString: process.env.DATABASE_URL };
  }
  return {
    host: process.env.POSTGRES_HOST || "localhost",
    port: readNumber("POSTGRES_PORT", "positive") ?? 5432,
    user: process.env.POSTGRES_USER || "etl",
    password: process.env.POSTGRES_PASSWORD,
    database: process.env.POSTGRES_DB || "etl",
  };
};

export const getObjectStoreConfig = (): S3StoreConfig => {
  const endpoint = process.env.MINIO_ENDPOINT || "localhost:9000";
  return {
    endpoint: /^https?:\/\//.test(endpoint) ? endpoint : `http://${endpoint}`,
    region: process.env.MINIO_REGION || "us-east-1",
    accessKeyId: process.env.MINIO_ROOT_USER ?? "",
    secretAccessKey: process.env.MINIO_ROOT_PASSWORD ?? "",
  };
};

export const getBuckets = (): Buckets => ({
  images: process.env.BUCKET_IMAGES || "images",
  exports: process.env.BUCKET_EXPORTS || "exports",
  backups: process.env.BUCKET_BACKUPS || "backups",
});

// Required only when the librairies domain runs.
export const getHashSalt = (): string | null => process.env.ETL_HASH_SALT || null;

export const getGbpToEurRate = (): number => readNumber("ETL_GBP_TO_EUR", "positive", false) ?? 1.17;

export const getRequestDelayMs = (): number =>
  readNumber("ETL_REQUEST_DELAY_MS", "non-negative") ?? 1000;

export const getGeocodeDelayMs = (): number =>
  readNumber("ETL_GEOCODE_DELAY_MS", "non-negative") ?? 20;

export const getRetryBaseDelayMs = (): number =>
  readNumber("ETL_RETRY_DELAY_MS", "non-negative") ?? 1000;

export const getMaxRetries = (): number => readNumber("ETL_MAX_RETRIES", "positive") ?? 3;

export const getMaxPages = (): number | null => readNumber("ETL_MAX_PAGES", "positive");

export const getPageCap = (): number => readNumber("ETL_MAX_PAGES_CAP", "positive") ?? DEFAULT_PAGE_CAP;

export const getHttpTimeoutMs = (): number => readNumber("ETL_HTTP_TIMEOUT_MS", "positive") ?? 30_000;

export const getGeocodeTimeoutMs = (): number =>
  readNumber("ETL_GEOCODE_TIMEOUT_MS", "positive") ?? 10_000;

export const getReportPath = (): string =>
  process.env.ETL_REPORT_PATH ?? "artifacts/run-report.json";

export const shouldBackup = (): boolean => process.env.ETL_BACKUP === "1";

export const shouldDownloadImages = (): boolean => process.env.ETL_DOWNLOAD_IMAGES === "1";

export const getLibrairiesFile = (): string =>
  process.env.ETL_LIBRAIRIES_FILE ?? "data/partenaire_librairies.xlsx";

export const shouldReadAnalytics = (): boolean => process.env.ETL_ANALYTICS === "1";

export const getPhase = (): PipelinePhase => {
  const raw = process.env.ETL_PHASE?.trim().toLowerCase();
  return PIPELINE_PHASES.find((phase) => phase === raw) ?? "all";
};
