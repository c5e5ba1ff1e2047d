import { rgb, type PDFFont, type PDFPage, type RGB } from "pdf-lib";
import type { AxisTick, Chart, LegendEntry } from "./charts.js";
import { toWinAnsi } from "./pdf-text.js";

export type Box = { x: number; y: number; width: number; height: number };

export type ChartFonts = { regular: PDFFont; bold: PDFFont };

const LEGEND_WIDTH = 110;
const AXIS_COLOR = rgb(0.2, 0.2, 0.2);
const GRID_COLOR = rgb(0.87, 0.87, 0.87);

export function hexColor(hex: string): RGB {
  const match = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex);
  if (!match) return rgb(0, 0, 0);
  const [, r = "00", g = "00", b = "00"] = match;
  return rgb(parseInt(r, 16) / 255, parseInt(g, 16) / 255, parseInt(b, 16) / 255);
}

type Plot = Box & {
  at: (fx: number, fy: number) => { x: number; y: number };
};

function plotArea(box: Box, left: number): Plot {
  const plot = {
    x: box.x + left,
    y: box.y + 30,
    width: box.width - left - LEGEND_WIDTH,
    height: box.height - 56,
  };
  return {
    ...plot,
    at: (fx, fy) => ({ x: plot.x + fx * plot.width, y: plot.y + fy * plot.height }),
  };
}

function label(page: PDFPage, content: string, x: number, y: number, font: PDFFont, size: number, align: "left" | "center" | "right" = "left"): void {
  const safe = toWinAnsi(content);
  const width = font.widthOfTextAtSize(safe, size);
  const left = align === "center" ? x - width / 2 : align === "right" ? x - width : x;
  page.drawText(safe, { x: left, y, size, font, color: AXIS_COLOR });
}

function drawFrame(page: PDFPage, plot: Plot): void {
  page.drawRectangle({
    x: plot.x,
    y: plot.y,
    width: plot.width,
    height: plot.height,
    borderColor: AXIS_COLOR,
    borderWidth: 0.75,
  });
}

function drawXTicks(page: PDFPage, plot: Plot, ticks: AxisTick[], axisLabel: string, fonts: ChartFonts): void {
  for (const t of ticks) {
    label(page, t.label, plot.at(t.position, 0).x, plot.y - 10, fonts.regular, 6, "center");
  }
  label(page, axisLabel, plot.x + plot.width / 2, plot.y - 22, fonts.regular, 7, "center");
}

function drawYTicks(page: PDFPage, plot: Plot, ticks: AxisTick[], fonts: ChartFonts): void {
  for (const t of ticks) {
    const { y } = plot.at(0, t.position);
    page.drawLine({
      start: { x: plot.x, y },
      end: { x: plot.x + plot.width, y },
      thickness: 0.3,
      color: GRID_COLOR,
    });
    label(page, t.label, plot.x - 3, y - 2, fonts.regular, 6, "right");
  }
}

function drawLegend(page: PDFPage, entries: LegendEntry[], x: number, top: number, fonts: ChartFonts): void {
  entries.forEach((entry, i) => {
    const y = top - i * 10;
    const color = hexColor(entry.color);
    if (entry.marker === "dot") {
      page.drawCircle({ x: x + 3, y: y + 2, size: 2.5, color });
    } else {
      page.drawLine({
        start: { x, y: y + 2 },
        end: { x: x + 8, y: y + 2 },
        thickness: 1,
        color,
        ...(entry.marker === "dash" ? { dashArray: [2, 1.5] } : {}),
      });
    }
    label(page, entry.label, x + 12, y, fonts.regular, 6);
  });
}

/** Draws a chart model inside the given box on a pdf-lib page. */
export function drawChart(page: PDFPage, chart: Chart, box: Box, fonts: ChartFonts): void {
  label(page, chart.title, box.x + box.width / 2, box.y + box.height - 12, fonts.bold, 10, "center");

  if (chart.kind === "bar") {
    const plot = plotArea(box, 150);
    drawFrame(page, plot);
    const slot = chart.bars.length > 0 ? plot.height / chart.bars.length : plot.height;
    const barHeight = slot * 0.7;
    chart.bars.forEach((bar, i) => {
      const y = plot.y + plot.height - (i + 1) * slot + (slot - barHeight) / 2;
      page.drawRectangle({
        x: plot.x,
        y,
        width: bar.fraction * plot.width,
        height: barHeight,
        color: hexColor(bar.color),
      });
      label(page, bar.label, plot.x - 3, y + barHeight / 2 - 2, fonts.regular, 6, "right");
    });
    drawXTicks(page, plot, chart.xTicks, chart.xLabel, fonts);
    drawLegend(page, chart.legend, plot.x + plot.width + 8, plot.y + plot.height - 6, fonts);
    return;
  }

  const plot = plotArea(box, 40);
  drawYTicks(page, plot, chart.yTicks, fonts);
  drawFrame(page, plot);

  if (chart.kind === "scatter") {
    for (const t of chart.thresholds) {
      const { y } = plot.at(0, t.y);
      page.drawLine({
        start: { x: plot.x, y },
        end: { x: plot.x + plot.width, y },
        thickness: 0.8,
        color: hexColor(t.color),
        dashArray: [4, 3],
        opacity: 0.6,
      });
    }
    for (const p of chart.points) {
      const { x, y } = plot.at(p.x, p.y);
      page.drawCircle({ x, y, size: 2.5, color: hexColor(p.color), opacity: 0.7 });
    }
    const thresholdLegend: LegendEntry[] = chart.thresholds.map((t) => ({ label: t.label, color: t.color, marker: "dash" }));
    drawLegend(page, [...chart.legend, ...thresholdLegend], plot.x + plot.width + 8, plot.y + plot.height - 6, fonts);
  } else {
    for (const s of chart.series) {
      for (let i = 1; i < s.points.length; i++) {
        const from = s.points[i - 1];
        const to = s.points[i];
        if (!from || !to) continue;
        page.drawLine({
          start: plot.at(from.x, from.y),
          end: plot.at(to.x, to.y),
          thickness: 1,
          color: hexColor(s.color),
          ...(s.dashed ? { dashArray: [3, 2] } : {}),
        });
      }
    }
    drawLegend(page, chart.legend, plot.x + plot.width + 8, plot.y + plot.height - 6, fonts);
  }

  drawXTicks(page, plot, chart.xTicks, chart.xLabel, fonts);
  label(page, chart.yLabel, box.x, plot.y + plot.height + 6, fonts.regular, 7);
}
