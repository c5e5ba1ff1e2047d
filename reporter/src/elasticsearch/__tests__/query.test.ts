import { describe, it, expect } from "vitest";
import { buildBucketQuery, buildRecordQuery, resultsIndex, SHARED_RESULTS_INDEX } from "../query.js";

const window = { start: 1704931200000, end: 1709251200000 };

describe("resultsIndex", () => {
  it("names the job-specific results index", () => {
    expect(resultsIndex("analyze_test_results")).toBe(".ml-anomalies-analyze_test_results");
    expect(SHARED_RESULTS_INDEX).toBe(".ml-anomalies-shared");
  });
});

describe("buildRecordQuery", () => {
  it("filters by job, result type, time range and record score, highest score first", () => {
    const body = buildRecordQuery({ jobId: "j1", window, minScore: 25, sort: "score", size: 1000 });

    expect(body).toEqual({
      size: 1000,
      query: {
        bool: {
          filter: [
            { term: { job_id: "j1" } },
            { term: { result_type: "record" } },
            { range: { timestamp: { gte: 1704931200000, lte: 1709251200000 } } },
            { range: { record_score: { gte: 25 } } },
          ],
        },
      },
      sort: [{ record_score: { order: "desc" } }],
    });
  });

  it("sorts oldest first when asked for timestamp order", () => {
    const body = buildRecordQuery({ jobId: "j1", window, minScore: 50, sort: "timestamp", size: 200 });
    expect(body.sort).toEqual([{ timestamp: { order: "asc" } }]);
    expect(body.size).toBe(200);
  });
});

describe("buildBucketQuery", () => {
  it("filters bucket results by anomaly score, oldest first", () => {
    const body = buildBucketQuery({ jobId: "j1", window, minScore: 10, size: 1000 });

    expect(body.query.bool.filter).toEqual([
      { term: { job_id: "j1" } },
      { term: { result_type: "bucket" } },
      { range: { timestamp: { gte: 1704931200000, lte: 1709251200000 } } },
      { range: { anomaly_score: { gte: 10 } } },
    ]);
    expect(body.sort).toEqual([{ timestamp: { order: "asc" } }]);
  });
});
