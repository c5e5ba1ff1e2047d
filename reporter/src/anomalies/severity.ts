import type { AnomalyRecord, SeverityCounts, SeverityTier } from "@mlreport/shared";

/** Lower bounds (exclusive) of each tier above negligible. */
export const SEVERITY_THRESHOLDS = {
  critical: 75,
  major: 50,
  minor: 25,
} as const;

export const SEVERITY_ORDER: readonly SeverityTier[] = ["critical", "major", "minor", "negligible"];

export const SEVERITY_LABEL: Record<SeverityTier, string> = {
  critical: "Critical",
  major: "Major",
  minor: "Minor",
  negligible: "Negligible",
};

export function classifySeverity(score: number): SeverityTier {
  if (score > SEVERITY_THRESHOLDS.critical) return "critical";
  if (score > SEVERITY_THRESHOLDS.major) return "major";
  if (score > SEVERITY_THRESHOLDS.minor) return "minor";
  return "negligible";
}

export function emptySeverityCounts(): SeverityCounts {
  return { critical: 0, major: 0, minor: 0, negligible: 0 };
}

export function countBySeverity(records: readonly AnomalyRecord[]): SeverityCounts {
  const counts = emptySeverityCounts();
  for (const record of records) {
    counts[classifySeverity(record.score)]++;
  }
  return counts;
}
