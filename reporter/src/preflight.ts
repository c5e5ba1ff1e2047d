import type { ElasticsearchClient, JobStats } from "./elasticsearch/client.js";
import { toError } from "./elasticsearch/errors.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("preflight");

export type JobStatus = {
  jobId: string;
  state: string;
  processedRecordCount: number;
};

type PreflightClient = Pick<ElasticsearchClient, "host" | "clusterHealth" | "getJob" | "getJobStats">;

export async function checkConnection(client: PreflightClient): Promise<boolean> {
  try {
    const health = await client.clusterHealth();
    log.info("Elasticsearch cluster reachable", { host: client.host, status: health.status });
    return true;
  } catch (err) {
    log.error("Cannot connect to Elasticsearch", { host: client.host, error: toError(err).message });
    return false;
  }
}

/** Stats are informational; a failed lookup leaves the job usable. */
async function readJobStats(client: PreflightClient, jobId: string): Promise<JobStats | null> {
  try {
    return await client.getJobStats(jobId);
  } catch (err) {
    log.warn("Could not read ML job stats", { jobId, error: toError(err).message });
    return null;
  }
}

/** Null when the job is missing or could not be looked up. */
export async function checkJob(client: PreflightClient, jobId: string): Promise<JobStatus | null> {
  try {
    const job = await client.getJob(jobId);
    if (!job) {
      log.error("ML job not found", { jobId });
      return null;
    }
    log.info("ML job found", { jobId: job.job_id });

    const stats = await readJobStats(client, jobId);
    const status: JobStatus = {
      jobId: job.job_id,
      state: stats?.state ?? "unknown",
      processedRecordCount: stats?.processedRecordCount ?? 0,
    };
    log.info("ML job state", {
      state: status.state,
      processedRecords: status.processedRecordCount,
    });
    return status;
  } catch (err) {
    log.error("Error checking ML job", { jobId, error: toError(err).message });
    return null;
  }
}
