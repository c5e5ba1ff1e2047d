import type { AnomalyRecord, GroupedAnomalies, PartitionPoint } from "@mlreport/shared";

/** Partitions in first-seen order; points keep the order of the input. */
export function groupByPartition(records: readonly AnomalyRecord[]): GroupedAnomalies {
  const groups: GroupedAnomalies = new Map();
  for (const record of records) {
    const points = groups.get(record.partition) ?? [];
    const point: PartitionPoint = { timestamp: record.timestamp, score: record.score };
    points.push(point);
    groups.set(record.partition, points);
  }
  return groups;
}

export function partitionNames(records: readonly AnomalyRecord[]): string[] {
  return [...new Set(records.map((r) => r.partition))];
}
