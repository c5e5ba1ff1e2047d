import type { AnomalyRecord, TimeWindow } from "@mlreport/shared";

export type ReportSource = "records" | "buckets";

export type ReportInput = {
  jobId: string;
  generatedAt: number;
  window: TimeWindow;
  records: AnomalyRecord[];
  source: ReportSource;
};
