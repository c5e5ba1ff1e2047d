export type SeverityTier = "critical" | "major" | "minor" | "negligible";

export type ResultType = "record" | "bucket";

export type AnomalyRecord = {
  jobId: string;
  resultType: ResultType;
  /** Epoch milliseconds. */
  timestamp: number;
  /** 0 (none) to 100 (extreme). */
  score: number;
  /** Partition field value, usually the test name. */
  partition: string;
  actual?: number;
  typical?: number;
};

export type SeverityCounts = Record<SeverityTier, number>;

export type PartitionPoint = {
  timestamp: number;
  score: number;
};

export type GroupedAnomalies = Map<string, PartitionPoint[]>;

export type TimeWindow = {
  start: number;
  end: number;
};

export type SortOrder = "score" | "timestamp";
