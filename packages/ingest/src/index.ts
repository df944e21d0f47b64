import { parseCliArgs } from "./lib/cli";
import { loadPipelineConfig, PipelineOrchestrator, type ResourceFactory } from "./lib/pipeline";
import { writeReportSummary, writeRunReport } from "./lib/report";
import { getDatabaseConfig, getObjectStoreConfig, getReportPath, loadEnvironment } from "./lib/settings";
import { PostgresStore } from "./repo/postgres";
import { S3ObjectStore } from "./repo/s3";

const createResources: ResourceFactory = async () => {
  const store = new PostgresStore(getDatabaseConfig());
  try {
    await store.applySchema();
  } catch (error) {
    await store.close();
    throw error;
  }
  return { store, objects: new S3ObjectStore(getObjectStoreConfig()) };
};

const main = async () => {
  const envPath = loadEnvironment();
  if (envPath) {
    console.log(`[etl] loaded ${envPath}`);
  }

  const config = loadPipelineConfig(parseCliArgs(process.argv.slice(2)));
  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.warn("[etl] interrupt received, cancelling after the current step");
    controller.abort(new Error("cancelled by SIGINT"));
  });

  const orchestrator = new PipelineOrchestrator({ config, createResources });
  const report = await orchestrator.run(controller.signal);

  const reportPath = getReportPath();
  writeRunReport(report, reportPath);
  writeReportSummary(report);
  console.log(`[etl] report written to ${reportPath}`);

  if (report.status !== "completed") {
    process.exitCode = 1;
  }
};

main().catch((error) => {
  console.error("[etl] failed:", error);
  process.exitCode = 1;
});
