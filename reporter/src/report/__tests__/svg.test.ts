import { describe, it, expect } from "vitest";
import { buildActualTypicalChart, buildTimelineChart, buildTopAnomaliesChart } from "../charts.js";
import { escapeXml, renderSvg } from "../svg.js";
import { DAY_MS, T0, makeRecord, sampleRecords } from "./fixtures.js";

function count(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe("escapeXml", () => {
  it("escapes markup characters", () => {
    expect(escapeXml(`a<b>&"c'`)).toBe("a&lt;b&gt;&amp;&quot;c&apos;");
  });
});

describe("renderSvg", () => {
  it("renders a standalone document", () => {
    const svg = renderSvg(buildTimelineChart(sampleRecords(), { jobId: "j1" }));
    expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="900" height="440"')).toBe(true);
    expect(svg.trimEnd().endsWith("</svg>")).toBe(true);
  });

  it("draws one circle per point plus one per partition legend entry", () => {
    const svg = renderSvg(buildTimelineChart(sampleRecords(), { jobId: "j1" }));
    expect(count(svg, "<circle")).toBe(5);
  });

  it("escapes the job id in the title", () => {
    const svg = renderSvg(buildTimelineChart(sampleRecords(), { jobId: "a<b>&c" }));
    expect(svg).toContain(">Anomaly Detection Report: a&lt;b&gt;&amp;c</text>");
  });

  it("draws one rect per bar besides background and frame", () => {
    const svg = renderSvg(buildTopAnomaliesChart(sampleRecords()));
    expect(count(svg, "<rect")).toBe(5);
    expect(svg).toContain(">100.0</text>");
  });

  it("draws one polyline per line series", () => {
    const chart = buildActualTypicalChart([
      makeRecord({ timestamp: T0, actual: 100, typical: 50 }),
      makeRecord({ timestamp: T0 + DAY_MS, actual: 300, typical: 60 }),
    ]);
    if (!chart) throw new Error("expected a chart");
    const svg = renderSvg(chart);
    expect(count(svg, "<polyline")).toBe(2);
    expect(count(svg, 'stroke-dasharray="6 4"/>')).toBe(1);
  });
});
