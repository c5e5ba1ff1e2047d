import { promises as fs } from "node:fs";
import { PDFDocument, StandardFonts, rgb, type PDFPage } from "pdf-lib";
import { buildActualTypicalChart, buildTimelineChart, type Chart } from "./charts.js";
import { drawChart, type ChartFonts } from "./pdf-chart.js";
import { toWinAnsi } from "./pdf-text.js";
import { RECOMMENDATIONS, summarizeAnomalies } from "./summary.js";
import { formatMinute, formatScore, formatSecond } from "./format.js";
import type { ReportInput } from "./types.js";

const PAGE_WIDTH = 595.28;
const PAGE_HEIGHT = 841.89;
const MARGIN = 40;
const TEXT_COLOR = rgb(0.1, 0.1, 0.12);

export type Row =
  | { kind: "blank"; height: number }
  | { kind: "text"; text: string; size: number; bold?: boolean; align?: "left" | "center" }
  | { kind: "chart"; chart: Chart; height: number }
  | { kind: "page" };

function heading(text: string, size: number, align: "left" | "center" = "left"): Row {
  return { kind: "text", text, size, bold: true, align };
}

function line(text: string, size = 10): Row {
  return { kind: "text", text, size };
}

/** Layout of the report as rows; page breaks are explicit. */
export function buildPdfRows(input: ReportInput): Row[] {
  const summary = summarizeAnomalies(input.records);
  const rows: Row[] = [
    heading("ML Anomaly Detection Report", 20, "center"),
    heading(`Job ID: ${input.jobId}`, 14, "center"),
    { kind: "text", text: `Generated: ${formatSecond(input.generatedAt)}`, size: 10, align: "center" },
    { kind: "blank", height: 5 },
  ];

  if (summary.total > 0) {
    rows.push(
      heading("Summary Statistics:", 12),
      line(`Total Anomalies Detected: ${summary.total}`),
      line(`  - Critical (score > 75): ${summary.counts.critical}`),
      line(`  - Major (50 < score <= 75): ${summary.counts.major}`),
      line(`  - Minor (25 < score <= 50): ${summary.counts.minor}`),
    );
    if (input.source === "buckets") {
      rows.push(line("  Source: bucket results (no per-record anomalies in window)"));
    }
    rows.push({ kind: "blank", height: 5 });

    rows.push({ kind: "chart", chart: buildTimelineChart(input.records, { jobId: input.jobId }), height: 280 });
    const actualTypical = buildActualTypicalChart(input.records);
    if (actualTypical) {
      rows.push({ kind: "chart", chart: actualTypical, height: 220 });
    }
  }

  rows.push({ kind: "page" }, heading("Key Findings:", 14));

  if (summary.total > 0) {
    rows.push(line("Top 5 Anomalies:"));
    summary.top.forEach((record, i) => {
      rows.push(
        line(
          `  ${i + 1}. Test: ${record.partition}, Score: ${formatScore(record.score)}, Time: ${formatMinute(record.timestamp)}`,
        ),
      );
    });
  }

  rows.push({ kind: "blank", height: 11 }, line("Recommendations:"));
  RECOMMENDATIONS.forEach((text, i) => rows.push(line(`${i + 1}. ${text}`)));

  return rows;
}

export async function renderPdfReport(input: ReportInput): Promise<Uint8Array> {
  const pdf = await PDFDocument.create();
  pdf.setTitle(`ML Anomaly Detection Report - ${input.jobId}`);
  pdf.setCreationDate(new Date(input.generatedAt));

  const fonts: ChartFonts = {
    regular: await pdf.embedFont(StandardFonts.Helvetica),
    bold: await pdf.embedFont(StandardFonts.HelveticaBold),
  };

  let page: PDFPage = pdf.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
  let y = PAGE_HEIGHT - MARGIN;

  const ensureRoom = (height: number) => {
    if (y - height < MARGIN) {
      page = pdf.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
      y = PAGE_HEIGHT - MARGIN;
    }
  };

  for (const row of buildPdfRows(input)) {
    switch (row.kind) {
      case "page":
        page = pdf.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
        y = PAGE_HEIGHT - MARGIN;
        break;
      case "blank":
        y -= row.height;
        break;
      case "text": {
        const lineHeight = row.size * 1.5;
        ensureRoom(lineHeight);
        const font = row.bold ? fonts.bold : fonts.regular;
        const text = toWinAnsi(row.text);
        const width = font.widthOfTextAtSize(text, row.size);
        const x = row.align === "center" ? (PAGE_WIDTH - width) / 2 : MARGIN;
        y -= lineHeight;
        page.drawText(text, { x, y: y + row.size * 0.3, size: row.size, font, color: TEXT_COLOR });
        break;
      }
      case "chart":
        ensureRoom(row.height);
        y -= row.height;
        drawChart(page, row.chart, { x: MARGIN, y, width: PAGE_WIDTH - MARGIN * 2, height: row.height }, fonts);
        break;
    }
  }

  return pdf.save();
}

export async function writePdfReport(filePath: string, input: ReportInput): Promise<void> {
  const bytes = await renderPdfReport(input);
  await fs.writeFile(filePath, bytes);
}
