import {
  BucketSourceSchema,
  RecordSourceSchema,
  type AnomalyRecord,
} from "@mlreport/shared";

export const UNKNOWN_PARTITION = "Unknown";

/**
 * Epoch milliseconds from the forms Elasticsearch returns: a number, a numeric
 * string, or an ISO-8601 date string. Null when nothing usable is there.
 */
export function parseTimestamp(value: number | string | undefined): number | null {
  if (value === undefined) return null;
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) return null;
  if (/^-?\d+$/.test(trimmed)) return Number(trimmed);

  const parsed = Date.parse(trimmed);
  return Number.isNaN(parsed) ? null : parsed;
}

function firstValue(value: number[] | number | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "number") return value;
  return value[0];
}

export function toAnomalyRecord(source: unknown, jobId: string): AnomalyRecord | null {
  const parsed = RecordSourceSchema.safeParse(source);
  if (!parsed.success) return null;

  const doc = parsed.data;
  const timestamp = parseTimestamp(doc.timestamp);
  if (timestamp === null) return null;

  const record: AnomalyRecord = {
    jobId: doc.job_id ?? jobId,
    resultType: "record",
    timestamp,
    score: doc.record_score ?? 0,
    partition: doc.partition_field_value ?? UNKNOWN_PARTITION,
  };

  const actual = firstValue(doc.actual);
  const typical = firstValue(doc.typical);
  if (actual !== undefined) record.actual = actual;
  if (typical !== undefined) record.typical = typical;

  return record;
}

/** Buckets have no partition; their overall anomaly_score stands in for the score. */
export function toBucketRecord(source: unknown, jobId: string): AnomalyRecord | null {
  const parsed = BucketSourceSchema.safeParse(source);
  if (!parsed.success) return null;

  const doc = parsed.data;
  const timestamp = parseTimestamp(doc.timestamp);
  if (timestamp === null) return null;

  return {
    jobId: doc.job_id ?? jobId,
    resultType: "bucket",
    timestamp,
    score: doc.anomaly_score ?? 0,
    partition: UNKNOWN_PARTITION,
  };
}
