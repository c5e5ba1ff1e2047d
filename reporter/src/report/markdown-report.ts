import { promises as fs } from "node:fs";
import * as path from "node:path";
import { classifySeverity, SEVERITY_LABEL } from "../anomalies/severity.js";
import { buildTimelineChart, buildTopAnomaliesChart } from "./charts.js";
import { renderSvg } from "./svg.js";
import { summarizeAnomalies } from "./summary.js";
import { formatMinute, formatOptional, formatScore, formatSecond } from "./format.js";
import type { ReportInput } from "./types.js";

export type MarkdownFiles = {
  markdown: string;
  timelineChart: string;
  topChart: string;
};

/** Pipes and line breaks would split a table cell. */
function cell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

export function renderMarkdownReport(
  input: ReportInput,
  charts: { timeline: string; top: string },
): string {
  const summary = summarizeAnomalies(input.records);
  const out: string[] = [
    "# ML Anomaly Detection Report",
    "",
    `- **Job ID:** ${input.jobId}`,
    `- **Generated:** ${formatSecond(input.generatedAt)}`,
    `- **Window:** ${formatMinute(input.window.start)} to ${formatMinute(input.window.end)}`,
  ];
  if (input.source === "buckets") {
    out.push("- **Source:** bucket results (no per-record anomalies in window)");
  }

  out.push(
    "",
    "## Summary",
    "",
    "| Severity | Count |",
    "| --- | ---: |",
    `| Critical (score > 75) | ${summary.counts.critical} |`,
    `| Major (50 < score <= 75) | ${summary.counts.major} |`,
    `| Minor (25 < score <= 50) | ${summary.counts.minor} |`,
    `| Negligible (score <= 25) | ${summary.counts.negligible} |`,
    `| **Total** | ${summary.total} |`,
    "",
    "## Tests",
    "",
    "| Test | Anomalies | Max Score |",
    "| --- | ---: | ---: |",
    ...summary.partitions.map((p) => `| ${cell(p.partition)} | ${p.count} | ${formatScore(p.maxScore)} |`),
    "",
    "## Charts",
    "",
    `![Anomaly scores over time](${charts.timeline})`,
    "",
    `![Top anomalies](${charts.top})`,
    "",
    "## Anomalies",
    "",
    "| Time | Test | Score | Severity | Actual | Typical |",
    "| --- | --- | ---: | --- | ---: | ---: |",
  );

  for (const r of input.records) {
    out.push(
      `| ${formatMinute(r.timestamp)} | ${cell(r.partition)} | ${formatScore(r.score)} | ${SEVERITY_LABEL[classifySeverity(r.score)]} | ${formatOptional(r.actual)} | ${formatOptional(r.typical)} |`,
    );
  }

  out.push("");
  return out.join("\n");
}

/** Writes the Markdown file and both SVG charts side by side in `dir`. */
export async function writeMarkdownReport(
  dir: string,
  names: { markdown: string; timelineChart: string; topChart: string },
  input: ReportInput,
): Promise<MarkdownFiles> {
  const files: MarkdownFiles = {
    markdown: path.join(dir, names.markdown),
    timelineChart: path.join(dir, names.timelineChart),
    topChart: path.join(dir, names.topChart),
  };

  await fs.writeFile(files.timelineChart, renderSvg(buildTimelineChart(input.records, { jobId: input.jobId })), "utf-8");
  await fs.writeFile(files.topChart, renderSvg(buildTopAnomaliesChart(input.records)), "utf-8");
  await fs.writeFile(
    files.markdown,
    renderMarkdownReport(input, { timeline: names.timelineChart, top: names.topChart }),
    "utf-8",
  );

  return files;
}
