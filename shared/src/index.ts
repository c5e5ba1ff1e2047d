export type {
  SeverityTier,
  ResultType,
  AnomalyRecord,
  SeverityCounts,
  PartitionPoint,
  GroupedAnomalies,
  TimeWindow,
  SortOrder,
} from "./anomaly.js";

export {
  type ReportConfig,
  type ElasticsearchConfig,
  type JobConfig,
  type OutputConfig,
  type ReportFormat,
  ReportConfigSchema,
  MAX_SEARCH_SIZE,
  parseConfig,
} from "./config.js";

export type {
  RecordSource,
  BucketSource,
  SearchResponse,
  SearchHit,
  ClusterHealth,
  JobList,
  JobStatsList,
} from "./results.js";

export {
  RecordSourceSchema,
  BucketSourceSchema,
  SearchResponseSchema,
  ClusterHealthSchema,
  JobListSchema,
  JobStatsListSchema,
  totalHits,
} from "./results.js";
