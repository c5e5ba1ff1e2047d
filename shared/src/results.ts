import { z } from "zod";

// ---------------------------------------------------------------------------
// Documents stored in the .ml-anomalies-* results indices
// ---------------------------------------------------------------------------

const TimestampSchema = z.union([z.number(), z.string()]);

// actual/typical are arrays for most detector functions, a bare number for a few
const ValueSchema = z.union([z.array(z.number()), z.number()]);

export const RecordSourceSchema = z
  .object({
    job_id: z.string().optional(),
    result_type: z.string().optional(),
    timestamp: TimestampSchema.optional(),
    record_score: z.number().optional(),
    partition_field_value: z.string().optional(),
    actual: ValueSchema.optional(),
    typical: ValueSchema.optional(),
  })
  .passthrough();

export const BucketSourceSchema = z
  .object({
    job_id: z.string().optional(),
    result_type: z.string().optional(),
    timestamp: TimestampSchema.optional(),
    anomaly_score: z.number().optional(),
    bucket_span: z.number().optional(),
  })
  .passthrough();

export type RecordSource = z.infer<typeof RecordSourceSchema>;
export type BucketSource = z.infer<typeof BucketSourceSchema>;

// ---------------------------------------------------------------------------
// Search API envelope
// ---------------------------------------------------------------------------

const TotalSchema = z.union([
  z.number(),
  z.object({ value: z.number(), relation: z.string().optional() }),
]);

export const SearchResponseSchema = z.object({
  took: z.number().optional(),
  timed_out: z.boolean().optional(),
  hits: z
    .object({
      total: TotalSchema.optional(),
      hits: z
        .array(
          z.object({
            _index: z.string().optional(),
            _id: z.string().optional(),
            _source: z.record(z.unknown()).optional(),
          }),
        )
        .default([]),
    })
    .default({ hits: [] }),
});

export type SearchResponse = z.infer<typeof SearchResponseSchema>;
export type SearchHit = SearchResponse["hits"]["hits"][number];

export function totalHits(response: SearchResponse): number {
  const total = response.hits.total;
  if (total === undefined) return response.hits.hits.length;
  return typeof total === "number" ? total : total.value;
}

// ---------------------------------------------------------------------------
// Cluster and job metadata
// ---------------------------------------------------------------------------

export const ClusterHealthSchema = z
  .object({
    cluster_name: z.string().optional(),
    status: z.string(),
  })
  .passthrough();

export type ClusterHealth = z.infer<typeof ClusterHealthSchema>;

export const JobListSchema = z.object({
  count: z.number().optional(),
  jobs: z.array(
    z
      .object({
        job_id: z.string(),
        description: z.string().optional(),
        create_time: z.number().optional(),
      })
      .passthrough(),
  ),
});

export type JobList = z.infer<typeof JobListSchema>;

export const JobStatsListSchema = z.object({
  count: z.number().optional(),
  jobs: z.array(
    z
      .object({
        job_id: z.string(),
        state: z.string(),
        data_counts: z
          .object({
            processed_record_count: z.number().optional(),
          })
          .passthrough()
          .optional(),
      })
      .passthrough(),
  ),
});

export type JobStatsList = z.infer<typeof JobStatsListSchema>;
