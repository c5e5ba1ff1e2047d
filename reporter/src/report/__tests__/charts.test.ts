import { describe, it, expect } from "vitest";
import {
  buildActualTypicalChart,
  buildTimelineChart,
  buildTopAnomaliesChart,
  partitionColors,
  PARTITION_PALETTE,
} from "../charts.js";
import { DAY_MS, T0, makeRecord, sampleRecords } from "./fixtures.js";

describe("buildTimelineChart", () => {
  it("places points by time and score, colored by partition", () => {
    const chart = buildTimelineChart(sampleRecords(), { jobId: "j1" });

    expect(chart.title).toBe("Anomaly Detection Report: j1");
    expect(chart.points).toEqual([
      { x: 1, y: 1, color: "#1f77b4" },
      { x: 0, y: 0.8, color: "#1f77b4" },
      { x: 0.5, y: 0.4, color: "#ff7f0e" },
    ]);
    expect(chart.legend).toEqual([
      { label: "login_flow", color: "#1f77b4", marker: "dot" },
      { label: "cart_flow", color: "#ff7f0e", marker: "dot" },
    ]);
  });

  it("draws the three severity thresholds", () => {
    const chart = buildTimelineChart(sampleRecords(), { jobId: "j1" });
    expect(chart.thresholds.map((t) => [t.y, t.label])).toEqual([
      [0.75, "Critical (>75)"],
      [0.5, "Major (>50)"],
      [0.25, "Minor (>25)"],
    ]);
  });

  it("labels five time ticks across the span", () => {
    const chart = buildTimelineChart(sampleRecords(), { jobId: "j1" });
    expect(chart.xTicks.map((t) => t.label)).toEqual([
      "2024-02-20",
      "2024-02-21",
      "2024-02-22",
      "2024-02-23",
      "2024-02-24",
    ]);
    expect(chart.yTicks.map((t) => t.label)).toEqual(["0", "25", "50", "75", "100"]);
  });

  it("centers a single record", () => {
    const chart = buildTimelineChart([makeRecord({ score: 30 })], { jobId: "j1" });
    expect(chart.points).toEqual([{ x: 0.5, y: 0.3, color: "#1f77b4" }]);
    expect(chart.xTicks).toEqual([{ position: 0.5, label: "2024-02-20" }]);
  });

  it("has no points or time ticks without records", () => {
    const chart = buildTimelineChart([], { jobId: "j1" });
    expect(chart.points).toEqual([]);
    expect(chart.xTicks).toEqual([]);
  });
});

describe("partitionColors", () => {
  it("cycles the palette past ten partitions", () => {
    const records = Array.from({ length: 11 }, (_, i) => makeRecord({ partition: `t${i}` }));
    const colors = partitionColors(records);
    expect(colors.get("t10")).toBe(PARTITION_PALETTE[0]);
    expect(colors.get("t9")).toBe(PARTITION_PALETTE[9]);
  });
});

describe("buildTopAnomaliesChart", () => {
  it("orders bars by score and colors them by tier", () => {
    const chart = buildTopAnomaliesChart(sampleRecords());

    expect(chart.title).toBe("Top 3 Anomalies by Score");
    expect(chart.bars).toEqual([
      { label: "login_flow (2024-02-24 00:00)", value: 100, fraction: 1, color: "#d62728" },
      { label: "login_flow (2024-02-20 00:00)", value: 80, fraction: 0.8, color: "#d62728" },
      { label: "cart_flow (2024-02-22 00:00)", value: 40, fraction: 0.4, color: "#e6c229" },
    ]);
  });

  it("lists the severity tiers in the legend from most to least severe", () => {
    expect(buildTopAnomaliesChart(sampleRecords()).legend).toEqual([
      { label: "Critical", color: "#d62728", marker: "dot" },
      { label: "Major", color: "#ff7f0e", marker: "dot" },
      { label: "Minor", color: "#e6c229", marker: "dot" },
      { label: "Negligible", color: "#7f7f7f", marker: "dot" },
    ]);
  });

  it("limits the number of bars", () => {
    const records = [10, 20, 30, 40].map((score) => makeRecord({ score }));
    expect(buildTopAnomaliesChart(records, 2).bars.map((b) => b.value)).toEqual([40, 30]);
  });
});

describe("buildActualTypicalChart", () => {
  it("returns null when no record has actual or typical values", () => {
    expect(buildActualTypicalChart(sampleRecords())).toBeNull();
  });

  it("scales both series over the shared value range", () => {
    const chart = buildActualTypicalChart([
      makeRecord({ timestamp: T0 + DAY_MS, actual: 300 }),
      makeRecord({ timestamp: T0, actual: 100, typical: 50 }),
    ]);

    expect(chart?.series).toEqual([
      {
        label: "Actual",
        color: "#1f77b4",
        dashed: false,
        points: [
          { x: 0, y: 0.2 },
          { x: 1, y: 1 },
        ],
      },
      { label: "Typical", color: "#2ca02c", dashed: true, points: [{ x: 0, y: 0 }] },
    ]);
    expect(chart?.legend.map((l) => l.marker)).toEqual(["line", "dash"]);
  });
});
