import { readFileSync } from "fs";
import { join } from "path";
import { describe, expect, it } from "vitest";
import { createBatchId, createBatchMetadata, formatTimestamp } from "../src/lib/batch";
import { buildRunReport, formatReportSummary, writeRunReport } from "../src/lib/report";
import { tempDir } from "./helpers";

const startedAt = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

const finishedBatch = () => {
  const batch = createBatchMetadata(startedAt, ["books", "quotes"], "batch-test");
  batch.endedAt = new Date(startedAt.getTime() + 65_000);
  return batch;
};

describe("batch ids", () => {
  it("formats UTC timestamps", () => {
    expect(formatTimestamp(startedAt)).toBe("20240102_030405");
    expect(createBatchId(startedAt, "deadbeef")).toBe("pipeline_20240102_030405_deadbeef");
    expect(createBatchId(startedAt)).toMatch(/^pipeline_20240102_030405_[0-9a-f]{8}$/);
  });
});

describe("buildRunReport", () => {
  it("completes only when every domain is done", () => {
    const batch = finishedBatch();
    batch.domains[0].state = "done";
    batch.domains[0].counters.loaded = 4;
    batch.domains[1].state = "done";
    batch.domains[1].counters.loaded = 2;
    batch.domains[1].counters.duplicates = 1;

    const report = buildRunReport(batch, { aborted: false, exports: [], backupUri: null });

    expect(report.status).toBe("completed");
    expect(report.durationMs).toBe(65_000);
    expect(report.startedAt).toBe("2024-01-02T03:04:05.000Z");
    expect(report.totals).toEqual({ extracted: 0, transformed: 0, loaded: 6, duplicates: 1, invalid: 0, failed: 0 });
  });

  it("fails when a domain failed or the run aborted", () => {
    const batch = finishedBatch();
    batch.domains[0].state = "done";
    batch.domains[1].state = "failed";
    expect(buildRunReport(batch, { aborted: false, exports: [], backupUri: null }).status).toBe("failed");

    batch.domains[1].state = "done";
    expect(buildRunReport(batch, { aborted: true, exports: [], backupUri: null }).status).toBe("failed");
  });

  it("keeps the first fifty errors and the full count", () => {
    const batch = finishedBatch();
    batch.errors.push(...Array.from({ length: 60 }, (_, index) => `error ${index + 1}`));

    const report = buildRunReport(batch, { aborted: false, exports: [], backupUri: null });

    expect(report.errorCount).toBe(60);
    expect(report.errors).toHaveLength(50);
    expect(report.errors[49]).toBe("error 50");
  });
});

describe("report output", () => {
  it("renders a markdown summary", () => {
    const batch = finishedBatch();
    batch.domains[0].state = "done";
    batch.domains[0].counters.extracted = 3;
    batch.domains[0].counters.loaded = 3;
    batch.domains[1].state = "failed";
    batch.errors.push("quotes: boom");

    const lines = formatReportSummary(buildRunReport(batch, { aborted: false, exports: [], backupUri: null })).split(
      "\n",
    );

    expect(lines.slice(0, 4)).toEqual([
      "## ETL Run Report",
      "",
      "Batch: **batch-test**",
      "Status: **failed**",
    ]);
    expect(lines).toContain("Duration: **65s**");
    expect(lines).toContain("| books | done | 3 | 0 | 3 | 0 | 0 | 0 |");
    expect(lines).toContain("| quotes | failed | 0 | 0 | 0 | 0 | 0 | 0 |");
    expect(lines.slice(-2)).toEqual(["### Errors (1)", "- quotes: boom"]);
  });

  it("shows the stage and the reporting views", () => {
    const batch = finishedBatch();
    batch.domains[0].state = "done";
    batch.domains[1].state = "done";
    const report = buildRunReport(batch, {
      aborted: false,
      phase: "load",
      exports: [],
      backupUri: null,
      analytics: {
        categories: [
          { category: "Poetry", books: 2, avgPriceEur: 30.5, avgRating: 3, minPriceEur: 20, maxPriceEur: 41 },
        ],
        topAuthors: [{ author: "Jane Austen", quotes: 2, tags: ["love"] }],
        librairiesByCity: [
          { city: "Paris", librairies: 2, specialties: [], firstPartnership: "2021-03-15" },
          { city: null, librairies: 1, specialties: [], firstPartnership: null },
        ],
      },
    });

    const lines = formatReportSummary(report).split("\n");

    expect(lines).toContain("Phase: **load only**");
    expect(lines.slice(-10)).toEqual([
      "",
      "### Analytics",
      "",
      "| Category | Books | Avg price (EUR) | Avg rating |",
      "| --- | --- | --- | --- |",
      "| Poetry | 2 | 30.5 | 3 |",
      "",
      "Top authors: Jane Austen (2)",
      "",
      "Librairies by city: Paris (2), unknown (1)",
    ]);
  });

  it("writes the JSON report, creating its directory", () => {
    const path = join(tempDir(), "artifacts", "run-report.json");
    const report = buildRunReport(finishedBatch(), { aborted: false, exports: ["minio://exports/x.json"], backupUri: null });

    writeRunReport(report, path);

    expect(JSON.parse(readFileSync(path, "utf-8"))).toMatchObject({
      batchId: "batch-test",
      status: "failed",
      exports: ["minio://exports/x.json"],
    });
  });
});
