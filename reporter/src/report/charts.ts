import type { AnomalyRecord, SeverityTier } from "@mlreport/shared";
import { classifySeverity, SEVERITY_LABEL, SEVERITY_ORDER, SEVERITY_THRESHOLDS } from "../anomalies/severity.js";
import { partitionNames } from "../anomalies/grouping.js";
import { topAnomalies } from "./summary.js";
import { formatDay, formatMinute } from "./format.js";

// ---------------------------------------------------------------------------
// Renderer-independent chart models. Positions are fractions of the plot
// area: x from left (0) to right (1), y from bottom (0) to top (1).
// ---------------------------------------------------------------------------

export type AxisTick = { position: number; label: string };
export type LegendEntry = { label: string; color: string; marker: "dot" | "line" | "dash" };

export type ScatterPoint = { x: number; y: number; color: string };
export type ThresholdLine = { y: number; color: string; label: string };

export type ScatterChart = {
  kind: "scatter";
  title: string;
  xLabel: string;
  yLabel: string;
  points: ScatterPoint[];
  thresholds: ThresholdLine[];
  xTicks: AxisTick[];
  yTicks: AxisTick[];
  legend: LegendEntry[];
};

export type LineSeries = {
  label: string;
  color: string;
  dashed: boolean;
  points: { x: number; y: number }[];
};

export type LineChart = {
  kind: "line";
  title: string;
  xLabel: string;
  yLabel: string;
  series: LineSeries[];
  xTicks: AxisTick[];
  yTicks: AxisTick[];
  legend: LegendEntry[];
};

export type Bar = { label: string; value: number; fraction: number; color: string };

export type BarChart = {
  kind: "bar";
  title: string;
  xLabel: string;
  bars: Bar[];
  xTicks: AxisTick[];
  legend: LegendEntry[];
};

export type Chart = ScatterChart | LineChart | BarChart;

// matplotlib's tab10, which the partitions cycle through
export const PARTITION_PALETTE: readonly string[] = [
  "#1f77b4", "#ff7f0e", "#2ca02c", "#d62728", "#9467bd",
  "#8c564b", "#e377c2", "#7f7f7f", "#bcbd22", "#17becf",
];

export const SEVERITY_COLOR: Record<SeverityTier, string> = {
  critical: "#d62728",
  major: "#ff7f0e",
  minor: "#e6c229",
  negligible: "#7f7f7f",
};

const MAX_SCORE = 100;
const TIME_TICKS = 5;

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

type Scale = {
  toFraction: (value: number) => number;
  ticks: (count: number, format: (value: number) => string) => AxisTick[];
};

/** Linear scale over [min, max]; a zero-width domain maps everything to the middle. */
function linearScale(min: number, max: number): Scale {
  const span = max - min;
  return {
    toFraction: (value) => (span === 0 ? 0.5 : clamp01((value - min) / span)),
    ticks: (count, format) => {
      if (span === 0) return [{ position: 0.5, label: format(min) }];
      const ticks: AxisTick[] = [];
      for (let i = 0; i < count; i++) {
        const position = i / (count - 1);
        ticks.push({ position, label: format(min + span * position) });
      }
      return ticks;
    },
  };
}

function scoreTicks(): AxisTick[] {
  return [0, 25, 50, 75, 100].map((v) => ({ position: v / MAX_SCORE, label: String(v) }));
}

export function partitionColors(records: readonly AnomalyRecord[]): Map<string, string> {
  const colors = new Map<string, string>();
  partitionNames(records).forEach((name, i) => {
    colors.set(name, PARTITION_PALETTE[i % PARTITION_PALETTE.length] ?? "#000000");
  });
  return colors;
}

export type TimelineOptions = {
  jobId: string;
};

/** Severity-over-time scatter, one color per partition. */
export function buildTimelineChart(
  records: readonly AnomalyRecord[],
  options: TimelineOptions,
): ScatterChart {
  const colors = partitionColors(records);
  const timestamps = records.map((r) => r.timestamp);
  const x = linearScale(
    timestamps.length > 0 ? Math.min(...timestamps) : 0,
    timestamps.length > 0 ? Math.max(...timestamps) : 0,
  );

  return {
    kind: "scatter",
    title: `Anomaly Detection Report: ${options.jobId}`,
    xLabel: "Timestamp",
    yLabel: "Anomaly Score",
    points: records.map((r) => ({
      x: x.toFraction(r.timestamp),
      y: clamp01(r.score / MAX_SCORE),
      color: colors.get(r.partition) ?? "#000000",
    })),
    thresholds: [
      { y: SEVERITY_THRESHOLDS.critical / MAX_SCORE, color: SEVERITY_COLOR.critical, label: "Critical (>75)" },
      { y: SEVERITY_THRESHOLDS.major / MAX_SCORE, color: SEVERITY_COLOR.major, label: "Major (>50)" },
      { y: SEVERITY_THRESHOLDS.minor / MAX_SCORE, color: SEVERITY_COLOR.minor, label: "Minor (>25)" },
    ],
    xTicks: records.length > 0 ? x.ticks(TIME_TICKS, formatDay) : [],
    yTicks: scoreTicks(),
    legend: [...colors].map(([label, color]) => ({ label, color, marker: "dot" as const })),
  };
}

/** Horizontal bars for the highest-scoring records, colored by tier. */
export function buildTopAnomaliesChart(records: readonly AnomalyRecord[], topN = 10): BarChart {
  const bars = topAnomalies(records, topN).map((r) => ({
    label: `${r.partition} (${formatMinute(r.timestamp)})`,
    value: r.score,
    fraction: clamp01(r.score / MAX_SCORE),
    color: SEVERITY_COLOR[classifySeverity(r.score)],
  }));

  return {
    kind: "bar",
    title: `Top ${bars.length} Anomalies by Score`,
    xLabel: "Anomaly Score",
    bars,
    xTicks: scoreTicks(),
    legend: SEVERITY_ORDER.map((tier) => ({
      label: SEVERITY_LABEL[tier],
      color: SEVERITY_COLOR[tier],
      marker: "dot" as const,
    })),
  };
}

/** Observed against expected values; null when no record carries either. */
export function buildActualTypicalChart(records: readonly AnomalyRecord[]): LineChart | null {
  const withValues = records
    .filter((r) => r.actual !== undefined || r.typical !== undefined)
    .sort((a, b) => a.timestamp - b.timestamp);
  if (withValues.length === 0) return null;

  const values: number[] = [];
  for (const r of withValues) {
    if (r.actual !== undefined) values.push(r.actual);
    if (r.typical !== undefined) values.push(r.typical);
  }

  const x = linearScale(withValues[0]?.timestamp ?? 0, withValues[withValues.length - 1]?.timestamp ?? 0);
  const y = linearScale(Math.min(...values), Math.max(...values));

  const actual: LineSeries = { label: "Actual", color: "#1f77b4", dashed: false, points: [] };
  const typical: LineSeries = { label: "Typical", color: "#2ca02c", dashed: true, points: [] };
  for (const r of withValues) {
    if (r.actual !== undefined) actual.points.push({ x: x.toFraction(r.timestamp), y: y.toFraction(r.actual) });
    if (r.typical !== undefined) typical.points.push({ x: x.toFraction(r.timestamp), y: y.toFraction(r.typical) });
  }

  const series = [actual, typical].filter((s) => s.points.length > 0);

  return {
    kind: "line",
    title: "Actual vs Expected Performance",
    xLabel: "Timestamp",
    yLabel: "Test Execution Time (ms)",
    series,
    xTicks: x.ticks(TIME_TICKS, formatDay),
    yTicks: y.ticks(TIME_TICKS, (v) => String(Math.round(v))),
    legend: series.map((s) => ({ label: s.label, color: s.color, marker: s.dashed ? "dash" as const : "line" as const })),
  };
}
