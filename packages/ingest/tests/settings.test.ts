import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  getGbpToEurRate,
  getMaxPages,
  getMaxRetries,
  getPhase,
  getRequestDelayMs,
  loadEnvironment,
  shouldReadAnalytics,
} from "../src/lib/settings";
import { tempDir } from "./helpers";

afterEach(() => {
  vi.unstubAllEnvs();
  delete process.env.ETL_SETTINGS_FROM_FILE;
});

describe("loadEnvironment", () => {
  it("finds the nearest .env above the working directory", () => {
    const root = tempDir();
    const nested = join(root, "packages", "ingest");
    mkdirSync(nested, { recursive: true });
    writeFileSync(join(root, ".env"), "ETL_SETTINGS_FROM_FILE=loaded\nETL_SETTINGS_KEPT=from-file\n");
    vi.stubEnv("ETL_SETTINGS_KEPT", "from-shell");

    expect(loadEnvironment(nested)).toBe(join(root, ".env"));
    expect(process.env.ETL_SETTINGS_FROM_FILE).toBe("loaded");
    expect(process.env.ETL_SETTINGS_KEPT).toBe("from-shell");
  });
});

describe("numeric settings", () => {
  it("falls back to the default outside the allowed range", () => {
    vi.stubEnv("ETL_MAX_RETRIES", "0");
    vi.stubEnv("ETL_REQUEST_DELAY_MS", "-5");
    vi.stubEnv("ETL_GBP_TO_EUR", "abc");

    expect(getMaxRetries()).toBe(3);
    expect(getRequestDelayMs()).toBe(1000);
    expect(getGbpToEurRate()).toBe(1.17);
  });

  it("truncates integers and keeps rates as given", () => {
    vi.stubEnv("ETL_MAX_RETRIES", "2.7");
    vi.stubEnv("ETL_REQUEST_DELAY_MS", "0");
    vi.stubEnv("ETL_GBP_TO_EUR", "1.2");
    vi.stubEnv("ETL_MAX_PAGES", "");

    expect(getMaxRetries()).toBe(2);
    expect(getRequestDelayMs()).toBe(0);
    expect(getGbpToEurRate()).toBe(1.2);
    expect(getMaxPages()).toBeNull();
  });
});

describe("run mode settings", () => {
  it("reads the phase and the analytics switch", () => {
    vi.stubEnv("ETL_PHASE", " Load ");
    vi.stubEnv("ETL_ANALYTICS", "1");

    expect(getPhase()).toBe("load");
    expect(shouldReadAnalytics()).toBe(true);
  });

  it("runs every stage for an unknown phase", () => {
    vi.stubEnv("ETL_PHASE", "publish");
    expect(getPhase()).toBe("all");
  });
});
