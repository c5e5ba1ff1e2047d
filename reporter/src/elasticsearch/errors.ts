export class ElasticsearchHttpError extends Error {
  readonly status: number;
  readonly path: string;
  readonly body: string;

  constructor(status: number, path: string, body: string) {
    super(`Elasticsearch returned HTTP ${status} for ${path}`);
    this.name = "ElasticsearchHttpError";
    this.status = status;
    this.path = path;
    this.body = body;
  }
}

export class ElasticsearchConnectionError extends Error {
  readonly host: string;

  constructor(host: string, cause: Error) {
    super(`Cannot reach Elasticsearch at ${host}: ${cause.message}`, { cause });
    this.name = "ElasticsearchConnectionError";
    this.host = host;
  }
}

export class ElasticsearchResponseError extends Error {
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`Unexpected response body from ${path}: ${detail}`);
    this.name = "ElasticsearchResponseError";
    this.path = path;
  }
}

export function isNotFound(err: unknown): err is ElasticsearchHttpError {
  return err instanceof ElasticsearchHttpError && err.status === 404;
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
