import type { ResultType, SortOrder, TimeWindow } from "@mlreport/shared";

export type TermClause = { term: Record<string, string> };
export type RangeClause = {
  range: Record<string, { gte?: number; lte?: number }>;
};
export type FilterClause = TermClause | RangeClause;
export type SortClause = Record<string, { order: "asc" | "desc" }>;

export type SearchBody = {
  size: number;
  query: { bool: { filter: FilterClause[] } };
  sort: SortClause[];
};

export type ResultQueryOptions = {
  jobId: string;
  window: TimeWindow;
  minScore: number;
  size: number;
};

export type RecordQueryOptions = ResultQueryOptions & {
  sort: SortOrder;
};

const SCORE_FIELD: Record<ResultType, string> = {
  record: "record_score",
  bucket: "anomaly_score",
};

export function resultsIndex(jobId: string): string {
  return `.ml-anomalies-${jobId}`;
}

export const SHARED_RESULTS_INDEX = ".ml-anomalies-shared";

function resultFilter(resultType: ResultType, options: ResultQueryOptions): FilterClause[] {
  return [
    { term: { job_id: options.jobId } },
    { term: { result_type: resultType } },
    { range: { timestamp: { gte: options.window.start, lte: options.window.end } } },
    { range: { [SCORE_FIELD[resultType]]: { gte: options.minScore } } },
  ];
}

/** Per-record anomaly results, highest score first or oldest first. */
export function buildRecordQuery(options: RecordQueryOptions): SearchBody {
  const sort: SortClause =
    options.sort === "score"
      ? { record_score: { order: "desc" } }
      : { timestamp: { order: "asc" } };

  return {
    size: options.size,
    query: { bool: { filter: resultFilter("record", options) } },
    sort: [sort],
  };
}

/** Bucket-level results, oldest first. */
export function buildBucketQuery(options: ResultQueryOptions): SearchBody {
  return {
    size: options.size,
    query: { bool: { filter: resultFilter("bucket", options) } },
    sort: [{ timestamp: { order: "asc" } }],
  };
}
