import {
  MAX_SEARCH_SIZE,
  totalHits,
  type AnomalyRecord,
  type SearchResponse,
  type SortOrder,
  type TimeWindow,
} from "@mlreport/shared";
import type { ElasticsearchClient } from "../elasticsearch/client.js";
import { ElasticsearchHttpError, toError } from "../elasticsearch/errors.js";
import {
  AllIndicesMissingError,
  searchWithIndexFallback,
} from "../elasticsearch/index-fallback.js";
import {
  SHARED_RESULTS_INDEX,
  buildBucketQuery,
  buildRecordQuery,
  resultsIndex,
  type SearchBody,
} from "../elasticsearch/query.js";
import { toAnomalyRecord, toBucketRecord } from "./normalizer.js";
import { inWindow, lookbackWindow } from "./window.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("retrieval");

export type RetrievalOptions = {
  jobId: string;
  lookbackDays: number;
  minScore: number;
  sort: SortOrder;
  maxResults?: number;
  /** Query bucket results when no record matches. Defaults to true. */
  bucketFallback?: boolean;
  now?: number;
};

type Fetched = {
  records: AnomalyRecord[];
  window: TimeWindow;
  index: string;
  /** Hit count Elasticsearch reported, which may exceed records.length. */
  total: number;
};

export type RetrievalResult =
  | ({ kind: "records" } & Fetched)
  | ({ kind: "buckets" } & Fetched)
  | { kind: "empty"; window: TimeWindow };

export type RetrievalClient = Pick<ElasticsearchClient, "search" | "listMlIndices">;

type Projector = (source: unknown, jobId: string) => AnomalyRecord | null;

export function sortRecords(records: readonly AnomalyRecord[], sort: SortOrder): AnomalyRecord[] {
  const sorted = [...records];
  if (sort === "score") {
    sorted.sort((a, b) => b.score - a.score);
  } else {
    sorted.sort((a, b) => a.timestamp - b.timestamp);
  }
  return sorted;
}

async function logAvailableIndices(client: RetrievalClient): Promise<void> {
  try {
    const listing = await client.listMlIndices();
    log.info("Available ML indices", { listing });
  } catch (err) {
    log.warn("Could not list ML indices", { error: toError(err).message });
  }
}

type SearchOptions = {
  /** Log an HTTP error and report no results instead of rethrowing. */
  tolerateHttpError: boolean;
};

async function runSearch(
  client: RetrievalClient,
  jobId: string,
  body: SearchBody,
  options: SearchOptions,
): Promise<{ index: string; response: SearchResponse } | null> {
  const indices = [resultsIndex(jobId), SHARED_RESULTS_INDEX];
  try {
    return await searchWithIndexFallback(client, indices, body);
  } catch (err) {
    if (err instanceof AllIndicesMissingError) {
      log.warn("No results index exists for job", { jobId, indices });
      await logAvailableIndices(client);
      return null;
    }
    if (err instanceof ElasticsearchHttpError) {
      log.error("HTTP error fetching anomaly results", {
        status: err.status,
        path: err.path,
        response: err.body,
      });
      await logAvailableIndices(client);
      if (options.tolerateHttpError) return null;
    }
    throw err;
  }
}

function project(
  response: SearchResponse,
  projector: Projector,
  options: RetrievalOptions,
  window: TimeWindow,
): AnomalyRecord[] {
  const records: AnomalyRecord[] = [];
  let unusable = 0;
  let outOfRange = 0;

  for (const hit of response.hits.hits) {
    const record = projector(hit._source, options.jobId);
    if (!record) {
      unusable++;
      continue;
    }
    if (!inWindow(record.timestamp, window) || record.score < options.minScore) {
      outOfRange++;
      continue;
    }
    records.push(record);
  }

  if (unusable > 0 || outOfRange > 0) {
    log.debug("Dropped hits at ingestion", { unusable, outOfRange });
  }
  return records;
}

/**
 * Fetches anomaly records for a job within the lookback window, trying the
 * job's own results index before the shared one, and falling back to bucket
 * results when no record matches or the record query fails with an HTTP
 * error. Transport failures propagate, as do HTTP errors on the bucket
 * query other than a missing index.
 */
export async function fetchAnomalies(
  client: RetrievalClient,
  options: RetrievalOptions,
): Promise<RetrievalResult> {
  const window = lookbackWindow(options.now ?? Date.now(), options.lookbackDays);
  const size = Math.min(options.maxResults ?? MAX_SEARCH_SIZE, MAX_SEARCH_SIZE);
  const query = { jobId: options.jobId, window, minScore: options.minScore, size };

  log.info("Querying anomaly records", {
    jobId: options.jobId,
    from: new Date(window.start).toISOString(),
    to: new Date(window.end).toISOString(),
    minScore: options.minScore,
  });

  const recordSearch = await runSearch(
    client,
    options.jobId,
    buildRecordQuery({ ...query, sort: options.sort }),
    { tolerateHttpError: true },
  );

  if (recordSearch) {
    const records = project(recordSearch.response, toAnomalyRecord, options, window);
    const total = totalHits(recordSearch.response);
    if (records.length > 0) {
      log.info("Fetched anomaly records", { count: records.length, index: recordSearch.index });
      if (total > recordSearch.response.hits.hits.length) {
        log.warn("Result set truncated", { total, returned: recordSearch.response.hits.hits.length });
      }
      return {
        kind: "records",
        records: sortRecords(records, options.sort),
        window,
        index: recordSearch.index,
        total,
      };
    }
    log.info("No anomaly records found", { total });
  }

  if (options.bucketFallback === false) {
    return { kind: "empty", window };
  }

  log.info("Trying bucket results as fallback", { jobId: options.jobId });
  const bucketSearch = await runSearch(client, options.jobId, buildBucketQuery(query), {
    tolerateHttpError: false,
  });
  if (!bucketSearch) {
    return { kind: "empty", window };
  }

  const buckets = project(bucketSearch.response, toBucketRecord, options, window);
  if (buckets.length === 0) {
    log.info("No bucket results found");
    return { kind: "empty", window };
  }

  log.info("Fetched bucket results as fallback", { count: buckets.length, index: bucketSearch.index });
  return {
    kind: "buckets",
    records: sortRecords(buckets, "timestamp"),
    window,
    index: bucketSearch.index,
    total: totalHits(bucketSearch.response),
  };
}
