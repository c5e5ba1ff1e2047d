import type { AxisTick, BarChart, Chart, LegendEntry, LineChart, ScatterChart } from "./charts.js";

const WIDTH = 900;
const HEIGHT = 440;
const LEGEND_WIDTH = 190;

type Plot = { left: number; top: number; width: number; height: number };

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

function px(plot: Plot, x: number): number {
  return round(plot.left + x * plot.width);
}

function py(plot: Plot, y: number): number {
  return round(plot.top + (1 - y) * plot.height);
}

function text(x: number, y: number, content: string, attrs = ""): string {
  const extra = attrs ? ` ${attrs}` : "";
  return `<text x="${round(x)}" y="${round(y)}"${extra}>${escapeXml(content)}</text>`;
}

function frame(plot: Plot): string[] {
  return [
    `<rect x="${plot.left}" y="${plot.top}" width="${plot.width}" height="${plot.height}" fill="none" stroke="#333333" stroke-width="1"/>`,
  ];
}

function xAxis(plot: Plot, ticks: AxisTick[], label: string): string[] {
  const bottom = plot.top + plot.height;
  const out = ticks.map((t) =>
    text(px(plot, t.position), bottom + 16, t.label, 'font-size="11" text-anchor="middle"'),
  );
  out.push(text(plot.left + plot.width / 2, bottom + 36, label, 'font-size="12" text-anchor="middle"'));
  return out;
}

function yAxis(plot: Plot, ticks: AxisTick[], label: string): string[] {
  const out = ticks.flatMap((t) => [
    `<line x1="${plot.left}" y1="${py(plot, t.position)}" x2="${plot.left + plot.width}" y2="${py(plot, t.position)}" stroke="#dddddd" stroke-width="1"/>`,
    text(plot.left - 6, py(plot, t.position) + 4, t.label, 'font-size="11" text-anchor="end"'),
  ]);
  const cx = 16;
  const cy = plot.top + plot.height / 2;
  out.push(text(cx, cy, label, `font-size="12" text-anchor="middle" transform="rotate(-90 ${cx} ${round(cy)})"`));
  return out;
}

function legend(entries: LegendEntry[], x: number, y: number): string[] {
  return entries.flatMap((entry, i) => {
    const rowY = y + i * 18;
    const marker =
      entry.marker === "dot"
        ? `<circle cx="${x + 6}" cy="${rowY}" r="5" fill="${entry.color}"/>`
        : `<line x1="${x}" y1="${rowY}" x2="${x + 14}" y2="${rowY}" stroke="${entry.color}" stroke-width="2"${entry.marker === "dash" ? ' stroke-dasharray="4 3"' : ""}/>`;
    return [marker, text(x + 20, rowY + 4, entry.label, 'font-size="11"')];
  });
}

function scatter(chart: ScatterChart, plot: Plot): string[] {
  const out = [...yAxis(plot, chart.yTicks, chart.yLabel), ...frame(plot)];
  for (const t of chart.thresholds) {
    out.push(
      `<line x1="${plot.left}" y1="${py(plot, t.y)}" x2="${plot.left + plot.width}" y2="${py(plot, t.y)}" stroke="${t.color}" stroke-width="1.5" stroke-dasharray="6 4" opacity="0.6"/>`,
    );
  }
  for (const p of chart.points) {
    out.push(`<circle cx="${px(plot, p.x)}" cy="${py(plot, p.y)}" r="5" fill="${p.color}" fill-opacity="0.7"/>`);
  }
  out.push(...xAxis(plot, chart.xTicks, chart.xLabel));
  const thresholdLegend: LegendEntry[] = chart.thresholds.map((t) => ({ label: t.label, color: t.color, marker: "dash" }));
  out.push(...legend([...chart.legend, ...thresholdLegend], plot.left + plot.width + 16, plot.top + 8));
  return out;
}

function line(chart: LineChart, plot: Plot): string[] {
  const out = [...yAxis(plot, chart.yTicks, chart.yLabel), ...frame(plot)];
  for (const s of chart.series) {
    const points = s.points.map((p) => `${px(plot, p.x)},${py(plot, p.y)}`).join(" ");
    out.push(
      `<polyline points="${points}" fill="none" stroke="${s.color}" stroke-width="1.5"${s.dashed ? ' stroke-dasharray="6 4"' : ""}/>`,
    );
  }
  out.push(...xAxis(plot, chart.xTicks, chart.xLabel));
  out.push(...legend(chart.legend, plot.left + plot.width + 16, plot.top + 8));
  return out;
}

function bars(chart: BarChart, plot: Plot): string[] {
  const out = [...frame(plot)];
  const slot = chart.bars.length > 0 ? plot.height / chart.bars.length : plot.height;
  const barHeight = slot * 0.7;
  chart.bars.forEach((bar, i) => {
    const y = plot.top + i * slot + (slot - barHeight) / 2;
    out.push(
      `<rect x="${plot.left}" y="${round(y)}" width="${round(bar.fraction * plot.width)}" height="${round(barHeight)}" fill="${bar.color}"/>`,
    );
    out.push(text(plot.left - 6, y + barHeight / 2 + 4, bar.label, 'font-size="11" text-anchor="end"'));
    out.push(text(plot.left + bar.fraction * plot.width + 4, y + barHeight / 2 + 4, bar.value.toFixed(1), 'font-size="11"'));
  });
  out.push(...xAxis(plot, chart.xTicks, chart.xLabel));
  out.push(...legend(chart.legend, plot.left + plot.width + 16, plot.top + 8));
  return out;
}

/** Standalone SVG document for a chart model. */
export function renderSvg(chart: Chart): string {
  // bar labels sit left of the plot and need the room
  const left = chart.kind === "bar" ? 260 : 70;
  const plot: Plot = { left, top: 50, width: WIDTH - left - LEGEND_WIDTH, height: HEIGHT - 110 };

  const body =
    chart.kind === "scatter" ? scatter(chart, plot) : chart.kind === "line" ? line(chart, plot) : bars(chart, plot);

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}" font-family="Helvetica, Arial, sans-serif">`,
    `<rect width="${WIDTH}" height="${HEIGHT}" fill="#ffffff"/>`,
    text(WIDTH / 2, 28, chart.title, 'font-size="16" font-weight="bold" text-anchor="middle"'),
    ...body,
    "</svg>",
    "",
  ].join("\n");
}
