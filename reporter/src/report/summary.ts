import type { AnomalyRecord, SeverityCounts } from "@mlreport/shared";
import { countBySeverity } from "../anomalies/severity.js";
import { groupByPartition } from "../anomalies/grouping.js";

export type PartitionSummary = {
  partition: string;
  count: number;
  maxScore: number;
};

export type AnomalySummary = {
  total: number;
  counts: SeverityCounts;
  top: AnomalyRecord[];
  /** One entry per test, in first-seen order. */
  partitions: PartitionSummary[];
};

export const RECOMMENDATIONS: readonly string[] = [
  "Investigate tests with critical anomaly scores (>75)",
  "Review performance during peak anomaly periods",
  "Consider infrastructure scaling if anomalies correlate with load",
  "Implement alerting for real-time anomaly detection",
  "Regular review of ML job configuration for optimization",
];

/** Highest scores first; ties keep input order. */
export function topAnomalies(records: readonly AnomalyRecord[], n: number): AnomalyRecord[] {
  return [...records].sort((a, b) => b.score - a.score).slice(0, n);
}

export function summarizeAnomalies(records: readonly AnomalyRecord[], topN = 5): AnomalySummary {
  return {
    total: records.length,
    counts: countBySeverity(records),
    top: topAnomalies(records, topN),
    partitions: [...groupByPartition(records)].map(([partition, points]) => ({
      partition,
      count: points.length,
      maxScore: Math.max(...points.map((p) => p.score)),
    })),
  };
}
