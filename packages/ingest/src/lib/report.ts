import { appendFileSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import { MAX_REPORTED_ERRORS } from "../config/sources";
import type { AnalyticsSnapshot } from "./analytics";
import { emptyCounters, type BatchMetadata, type DomainProgress } from "./batch";
import type { DomainCounters, PipelinePhase } from "./types";

export type RunStatus = "completed" | "failed";

export type RunReport = {
  batchId: string;
  startedAt: string;
  endedAt: string;
  durationMs: number;
  status: RunStatus;
  aborted: boolean;
  phase: PipelinePhase;
  domains: DomainProgress[];
  totals: DomainCounters;
  errorCount: number;
  errors: string[];
  exports: string[];
  backupUri: string | null;
  analytics: AnalyticsSnapshot | null;
};

export type RunOutcome = {
  aborted: boolean;
  phase?: PipelinePhase;
  exports: string[];
  backupUri: string | null;
  analytics?: AnalyticsSnapshot | null;
};

const sumCounters = (progress: DomainProgress[]) => {
  const totals = emptyCounters();
  for (const { counters } of progress) {
    totals.extracted += counters.extracted;
    totals.transformed += counters.transformed;
    totals.loaded += counters.loaded;
    totals.duplicates += counters.duplicates;
    totals.invalid += counters.invalid;
    totals.failed += counters.failed;
  }
  return totals;
};

/**
 * A run is completed only when every requested domain reached `done` and
 * nothing aborted it.
 */
export const buildRunReport = (batch: BatchMetadata, outcome: RunOutcome): RunReport => {
  const endedAt = batch.endedAt ?? new Date();
  const progress = batch.domains;
  const allDone = progress.length > 0 && progress.every((domain) => domain.state === "done");

  return {
    batchId: batch.batchId,
    startedAt: batch.startedAt.toISOString(),
    endedAt: endedAt.toISOString(),
    durationMs: endedAt.getTime() - batch.startedAt.getTime(),
    status: allDone && !outcome.aborted ? "completed" : "failed",
    aborted: outcome.aborted,
    phase: outcome.phase ?? "all",
    domains: batch.domains,
    totals: sumCounters(progress),
    errorCount: batch.errors.length,
    errors: batch.errors.slice(0, MAX_REPORTED_ERRORS),
    exports: outcome.exports,
    backupUri: outcome.backupUri,
    analytics: outcome.analytics ?? null,
  };
};

export const writeRunReport = (report: RunReport, filePath: string) => {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, `${JSON.stringify(report, null, 2)}\n`, "utf-8");
};

const formatAnalytics = ({ categories, topAuthors, librairiesByCity }: AnalyticsSnapshot) => {
  const lines = ["", "### Analytics", "", "| Category | Books | Avg price (EUR) | Avg rating |", "| --- | --- | --- | --- |"];
  for (const category of categories) {
    lines.push(
      `| ${category.category} | ${category.books} | ${category.avgPriceEur ?? "-"} | ${category.avgRating ?? "-"} |`,
    );
  }
  if (topAuthors.length) {
    lines.push("", `Top authors: ${topAuthors.map((author) => `${author.author} (${author.quotes})`).join(", ")}`);
  }
  if (librairiesByCity.length) {
    lines.push(
      "",
      `Librairies by city: ${librairiesByCity
        .map((city) => `${city.city ?? "unknown"} (${city.librairies})`)
        .join(", ")}`,
    );
  }
  return lines;
};

export const formatReportSummary = (report: RunReport) => {
  const lines: string[] = [];
  lines.push("## ETL Run Report");
  lines.push("");
  lines.push(`Batch: **${report.batchId}**`);
  lines.push(`Status: **${report.status}**${report.aborted ? " (aborted)" : ""}`);
  lines.push(`Duration: **${Math.round(report.durationMs / 1000)}s**`);
  if (report.phase !== "all") {
    lines.push(`Phase: **${report.phase} only**`);
  }
  lines.push("");
  lines.push("| Domain | State | Extracted | Transformed | Loaded | Duplicates | Invalid | Failed |");
  lines.push("| --- | --- | --- | --- | --- | --- | --- | --- |");
  for (const progress of report.domains) {
    const { counters } = progress;
    lines.push(
      `| ${progress.domain} | ${progress.state} | ${counters.extracted} | ${counters.transformed} | ${counters.loaded} | ` +
        `${counters.duplicates} | ${counters.invalid} | ${counters.failed} |`,
    );
  }
  if (report.analytics) {
    lines.push(...formatAnalytics(report.analytics));
  }
  if (report.errorCount) {
    lines.push("");
    lines.push(`### Errors (${report.errorCount})`);
    for (const error of report.errors.slice(0, 10)) {
      lines.push(`- ${error}`);
    }
  }
  return lines.join("\n");
};

export const writeReportSummary = (report: RunReport) => {
  const summaryPath = process.env.GITHUB_STEP_SUMMARY;
  if (!summaryPath) {
    return;
  }
  appendFileSync(summaryPath, `${formatReportSummary(report)}\n`, "utf-8");
};
