import { describe, it, expect, afterEach } from "vitest";
import { promises as fs } from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { renderMarkdownReport, writeMarkdownReport } from "../markdown-report.js";
import { makeInput, makeRecord } from "./fixtures.js";

const CHARTS = { timeline: "anomaly_chart.svg", top: "top_anomalies.svg" };

describe("renderMarkdownReport", () => {
  it("writes the header and the severity table", () => {
    const lines = renderMarkdownReport(makeInput(), CHARTS).split("\n");

    expect(lines.slice(0, 5)).toEqual([
      "# ML Anomaly Detection Report",
      "",
      "- **Job ID:** j1",
      "- **Generated:** 2024-03-01 12:30:00",
      "- **Window:** 2024-01-11 00:00 to 2024-03-01 00:00",
    ]);
    expect(lines).toContain("| Critical (score > 75) | 2 |");
    expect(lines).toContain("| Minor (25 < score <= 50) | 1 |");
    expect(lines).toContain("| **Total** | 3 |");
  });

  it("summarizes anomalies per test", () => {
    const lines = renderMarkdownReport(makeInput(), CHARTS).split("\n");
    const header = lines.indexOf("| Test | Anomalies | Max Score |");

    expect(lines[header - 2]).toBe("## Tests");
    expect(lines.slice(header + 2, header + 5)).toEqual([
      "| login_flow | 2 | 100.0 |",
      "| cart_flow | 1 | 40.0 |",
      "",
    ]);
  });

  it("links both chart images", () => {
    const lines = renderMarkdownReport(makeInput(), CHARTS).split("\n");
    expect(lines).toContain("![Anomaly scores over time](anomaly_chart.svg)");
    expect(lines).toContain("![Top anomalies](top_anomalies.svg)");
  });

  it("lists one table row per record in input order", () => {
    const lines = renderMarkdownReport(makeInput(), CHARTS).split("\n");
    const header = lines.indexOf("| Time | Test | Score | Severity | Actual | Typical |");

    expect(lines.slice(header + 2, header + 5)).toEqual([
      "| 2024-02-24 00:00 | login_flow | 100.0 | Critical | - | - |",
      "| 2024-02-20 00:00 | login_flow | 80.0 | Critical | - | - |",
      "| 2024-02-22 00:00 | cart_flow | 40.0 | Minor | - | - |",
    ]);
  });

  it("escapes pipes in partition names and prints actual and typical", () => {
    const input = makeInput({ records: [makeRecord({ partition: "a|b", score: 60, actual: 1250, typical: 310.5 })] });
    const lines = renderMarkdownReport(input, CHARTS).split("\n");
    expect(lines).toContain("| 2024-02-20 00:00 | a\\|b | 60.0 | Major | 1250 | 310.5 |");
  });

  it("marks bucket-sourced reports", () => {
    const lines = renderMarkdownReport(makeInput({ source: "buckets" }), CHARTS).split("\n");
    expect(lines[5]).toBe("- **Source:** bucket results (no per-record anomalies in window)");
  });
});

describe("writeMarkdownReport", () => {
  let dir = "";

  afterEach(async () => {
    if (dir) await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes the report and both charts into the directory", async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "mlreport-md-"));

    const files = await writeMarkdownReport(
      dir,
      { markdown: "report.md", timelineChart: "timeline.svg", topChart: "top.svg" },
      makeInput(),
    );

    expect(files).toEqual({
      markdown: path.join(dir, "report.md"),
      timelineChart: path.join(dir, "timeline.svg"),
      topChart: path.join(dir, "top.svg"),
    });
    const markdown = await fs.readFile(files.markdown, "utf-8");
    expect(markdown.split("\n")).toContain("![Top anomalies](top.svg)");
    expect((await fs.readFile(files.timelineChart, "utf-8")).startsWith("<svg")).toBe(true);
    expect((await fs.readFile(files.topChart, "utf-8")).startsWith("<svg")).toBe(true);
  });
});
