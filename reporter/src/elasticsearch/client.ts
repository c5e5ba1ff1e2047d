import type { ZodTypeAny, output } from "zod";
import {
  ClusterHealthSchema,
  JobListSchema,
  JobStatsListSchema,
  SearchResponseSchema,
  type ClusterHealth,
  type ElasticsearchConfig,
  type JobList,
  type SearchResponse,
} from "@mlreport/shared";
import {
  ElasticsearchConnectionError,
  ElasticsearchHttpError,
  ElasticsearchResponseError,
  toError,
} from "./errors.js";
import type { SearchBody } from "./query.js";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type ElasticsearchClientOptions = Partial<ElasticsearchConfig> & {
  fetch?: FetchLike;
};

export type JobDescriptor = JobList["jobs"][number];

export type JobStats = {
  jobId: string;
  state: string;
  processedRecordCount: number;
};

type Method = "GET" | "POST";

const DEFAULT_HOST = "http://localhost:9200";

/**
 * Thin client for the handful of Elasticsearch endpoints the reporter needs.
 * Every call is a single request; there is no retry and no timeout beyond
 * whatever the fetch implementation applies.
 */
export class ElasticsearchClient {
  readonly host: string;

  private fetchFn: FetchLike;
  private authorization: string | undefined;

  constructor(options: ElasticsearchClientOptions = {}) {
    this.host = (options.host ?? DEFAULT_HOST).replace(/\/+$/, "");
    this.fetchFn = options.fetch ?? ((url, init) => globalThis.fetch(url, init));

    if (options.apiKey) {
      this.authorization = `ApiKey ${options.apiKey}`;
    } else if (options.username) {
      const credentials = `${options.username}:${options.password ?? ""}`;
      this.authorization = `Basic ${Buffer.from(credentials, "utf-8").toString("base64")}`;
    }
  }

  async clusterHealth(): Promise<ClusterHealth> {
    const path = "/_cluster/health";
    const body = await this.readJson(await this.request("GET", path), path);
    return this.validate(ClusterHealthSchema, body, path);
  }

  /** Returns null when the job does not exist. */
  async getJob(jobId: string): Promise<JobDescriptor | null> {
    const path = `/_ml/anomaly_detectors/${encodeURIComponent(jobId)}`;
    const res = await this.request("GET", path);
    if (res.status === 404) return null;

    const list = this.validate(JobListSchema, await this.readJson(res, path), path);
    return list.jobs.find((job) => job.job_id === jobId) ?? list.jobs[0] ?? null;
  }

  /** Returns null when the job does not exist. */
  async getJobStats(jobId: string): Promise<JobStats | null> {
    const path = `/_ml/anomaly_detectors/${encodeURIComponent(jobId)}/_stats`;
    const res = await this.request("GET", path);
    if (res.status === 404) return null;

    const list = this.validate(JobStatsListSchema, await this.readJson(res, path), path);
    const stats = list.jobs.find((job) => job.job_id === jobId) ?? list.jobs[0];
    if (!stats) return null;

    return {
      jobId: stats.job_id,
      state: stats.state,
      processedRecordCount: stats.data_counts?.processed_record_count ?? 0,
    };
  }

  /** Throws ElasticsearchHttpError (status 404) when the index does not exist. */
  async search(index: string, body: SearchBody): Promise<SearchResponse> {
    const path = `/${encodeURIComponent(index)}/_search`;
    const json = await this.readJson(await this.request("POST", path, body), path);
    return this.validate(SearchResponseSchema, json, path);
  }

  async listMlIndices(): Promise<string> {
    const path = "/_cat/indices/.ml-*?v";
    const res = await this.request("GET", path);
    const text = await res.text();
    if (!res.ok) {
      throw new ElasticsearchHttpError(res.status, path, text);
    }
    return text;
  }

  private async request(method: Method, path: string, body?: unknown): Promise<Response> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (body !== undefined) headers["Content-Type"] = "application/json";
    if (this.authorization) headers.Authorization = this.authorization;

    try {
      return await this.fetchFn(`${this.host}${path}`, {
        method,
        headers,
        ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
      });
    } catch (err) {
      throw new ElasticsearchConnectionError(this.host, toError(err));
    }
  }

  private async readJson(res: Response, path: string): Promise<unknown> {
    if (!res.ok) {
      throw new ElasticsearchHttpError(res.status, path, await res.text());
    }
    try {
      const parsed: unknown = await res.json();
      return parsed;
    } catch (err) {
      throw new ElasticsearchResponseError(path, toError(err).message);
    }
  }

  private validate<S extends ZodTypeAny>(schema: S, body: unknown, path: string): output<S> {
    const result = schema.safeParse(body);
    if (!result.success) {
      const detail = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new ElasticsearchResponseError(path, detail);
    }
    return result.data;
  }
}
