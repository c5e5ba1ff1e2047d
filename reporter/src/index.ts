import "dotenv/config";
import type { ReportConfig } from "@mlreport/shared";
import { ElasticsearchClient, type FetchLike } from "./elasticsearch/client.js";
import { loadConfigFromEnv } from "./config/env-config.js";
import { runReport, type RunOutcome } from "./report-runner.js";
import { toError } from "./elasticsearch/errors.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("mlreport");

export { ElasticsearchClient } from "./elasticsearch/client.js";
export { fetchAnomalies } from "./anomalies/retrieval.js";
export { classifySeverity, countBySeverity } from "./anomalies/severity.js";
export { groupByPartition } from "./anomalies/grouping.js";
export { runReport } from "./report-runner.js";

const RULE = "=".repeat(50);

export function exitCodeFor(outcome: RunOutcome): number {
  return outcome.status === "completed" || outcome.status === "no_data" ? 0 : 1;
}

export async function main(config: ReportConfig, fetch?: FetchLike): Promise<RunOutcome> {
  process.stdout.write(`${RULE}\nML ANOMALY REPORT GENERATOR\n${RULE}\n`);

  const client = new ElasticsearchClient({ ...config.elasticsearch, fetch });
  const outcome = await runReport(config, { client });

  if (outcome.status === "completed") {
    const lines = [
      RULE,
      "REPORT GENERATION COMPLETED",
      "Files generated:",
      ...outcome.files.map((file) => `  - ${file}`),
      RULE,
    ];
    process.stdout.write(`\n${lines.join("\n")}\n`);
  }

  return outcome;
}

export async function start(): Promise<void> {
  let config: ReportConfig;
  try {
    config = loadConfigFromEnv();
  } catch (err) {
    log.error("Invalid configuration", { error: toError(err).message });
    process.exitCode = 1;
    return;
  }

  const outcome = await main(config);
  process.exitCode = exitCodeFor(outcome);
}

// Start when run directly
const isMain =
  process.argv[1]?.endsWith("index.ts") ||
  process.argv[1]?.endsWith("index.js");
if (isMain) {
  start().catch((err) => {
    log.error("Fatal error", { error: toError(err).message });
    process.exitCode = 1;
  });
}
