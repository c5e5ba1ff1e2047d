import { z } from "zod";

export const MAX_SEARCH_SIZE = 1000;

const ElasticsearchConfigSchema = z.object({
  host: z.string().url().default("http://localhost:9200"),
  username: z.string().min(1).optional(),
  password: z.string().optional(),
  apiKey: z.string().min(1).optional(),
});

const JobConfigSchema = z.object({
  id: z.string().min(1).default("analyze_test_results"),
  lookbackDays: z.number().int().positive().default(50),
  minScore: z.number().min(0).max(100).default(0),
  sort: z.enum(["score", "timestamp"]).default("score"),
  maxResults: z.number().int().positive().max(MAX_SEARCH_SIZE).default(MAX_SEARCH_SIZE),
});

const OutputConfigSchema = z.object({
  dir: z.string().min(1).default("reports"),
  formats: z.array(z.enum(["pdf", "markdown"])).min(1).default(["pdf"]),
  pdfFile: z.string().min(1).default("anomaly_report.pdf"),
  markdownFile: z.string().min(1).default("anomaly_report.md"),
  timelineChartFile: z.string().min(1).default("anomaly_chart.svg"),
  topChartFile: z.string().min(1).default("top_anomalies.svg"),
});

export const ReportConfigSchema = z.object({
  elasticsearch: ElasticsearchConfigSchema.default({}),
  job: JobConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
});

export type ReportConfig = z.infer<typeof ReportConfigSchema>;
export type ElasticsearchConfig = ReportConfig["elasticsearch"];
export type JobConfig = ReportConfig["job"];
export type OutputConfig = ReportConfig["output"];
export type ReportFormat = OutputConfig["formats"][number];

export function parseConfig(raw: unknown): ReportConfig {
  return ReportConfigSchema.parse(raw);
}
