import * as path from "node:path";
import type { OutputConfig, ReportConfig } from "@mlreport/shared";
import type { ElasticsearchClient } from "./elasticsearch/client.js";
import { toError } from "./elasticsearch/errors.js";
import { fetchAnomalies, type RetrievalResult } from "./anomalies/retrieval.js";
import { checkConnection, checkJob, type JobStatus } from "./preflight.js";
import { ensureReportsDirectory } from "./report/output.js";
import { writePdfReport } from "./report/pdf-report.js";
import { writeMarkdownReport } from "./report/markdown-report.js";
import type { ReportInput, ReportSource } from "./report/types.js";
import { createLogger } from "./utils/logger.js";

// ---------------------------------------------------------------------------
// Dependency injection types
// ---------------------------------------------------------------------------

export type ReportClient = Pick<
  ElasticsearchClient,
  "host" | "clusterHealth" | "getJob" | "getJobStats" | "search" | "listMlIndices"
>;

export type ReportDeps = {
  client: ReportClient;
  now?: () => number;
};

export type RunOutcome =
  | { status: "unreachable" }
  | { status: "job_missing"; jobId: string }
  | { status: "fetch_failed"; error: Error }
  | { status: "write_failed"; error: Error }
  | { status: "no_data"; job: JobStatus }
  | { status: "completed"; job: JobStatus; source: ReportSource; recordCount: number; files: string[] };

const log = createLogger("report-runner");

async function writeArtifacts(output: OutputConfig, dir: string, input: ReportInput): Promise<string[]> {
  const files: string[] = [];

  if (output.formats.includes("pdf")) {
    const pdfPath = path.join(dir, output.pdfFile);
    await writePdfReport(pdfPath, input);
    log.info("PDF report generated", { file: pdfPath });
    files.push(pdfPath);
  }

  if (output.formats.includes("markdown")) {
    const written = await writeMarkdownReport(
      dir,
      {
        markdown: output.markdownFile,
        timelineChart: output.timelineChartFile,
        topChart: output.topChartFile,
      },
      input,
    );
    log.info("Markdown report generated", { file: written.markdown });
    files.push(written.markdown, written.timelineChart, written.topChart);
  }

  return files;
}

/**
 * One report run: reports directory, connectivity, job lookup, fetch, then
 * one artifact set per configured format. Steps run strictly in order and
 * every failure ends the run with an outcome instead of an exception.
 */
export async function runReport(config: ReportConfig, deps: ReportDeps): Promise<RunOutcome> {
  const now = deps.now ?? Date.now;
  let dir: string;
  try {
    dir = await ensureReportsDirectory(config.output.dir);
  } catch (err) {
    const error = toError(err);
    log.error("Cannot prepare reports directory", { dir: config.output.dir, error: error.message });
    return { status: "write_failed", error };
  }

  if (!(await checkConnection(deps.client))) {
    log.error("Cannot connect to Elasticsearch. Make sure the cluster is running.");
    return { status: "unreachable" };
  }

  const job = await checkJob(deps.client, config.job.id);
  if (!job) {
    log.error("ML job not found or not running.", { jobId: config.job.id });
    return { status: "job_missing", jobId: config.job.id };
  }

  log.info("Fetching anomaly data", { lookbackDays: config.job.lookbackDays });
  let result: RetrievalResult;
  try {
    result = await fetchAnomalies(deps.client, {
      jobId: config.job.id,
      lookbackDays: config.job.lookbackDays,
      minScore: config.job.minScore,
      sort: config.job.sort,
      maxResults: config.job.maxResults,
      now: now(),
    });
  } catch (err) {
    const error = toError(err);
    log.error("Error fetching data. No data available for report generation.", { error: error.message });
    return { status: "fetch_failed", error };
  }

  if (result.kind === "empty") {
    log.info("No data available for report generation. Make sure the ML job has processed data and generated anomalies.");
    return { status: "no_data", job };
  }

  const input: ReportInput = {
    jobId: config.job.id,
    generatedAt: now(),
    window: result.window,
    records: result.records,
    source: result.kind,
  };

  log.info("Generating report", { records: input.records.length, formats: config.output.formats });
  let files: string[];
  try {
    files = await writeArtifacts(config.output, dir, input);
  } catch (err) {
    const error = toError(err);
    log.error("Error writing report files", { dir, error: error.message });
    return { status: "write_failed", error };
  }

  return {
    status: "completed",
    job,
    source: result.kind,
    recordCount: input.records.length,
    files,
  };
}
