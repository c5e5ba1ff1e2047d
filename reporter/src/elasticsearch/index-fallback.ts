import type { SearchResponse } from "@mlreport/shared";
import type { ElasticsearchClient } from "./client.js";
import { isNotFound, toError } from "./errors.js";
import type { SearchBody } from "./query.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("index-fallback");

export type IndexError = {
  index: string;
  error: Error;
};

export class AllIndicesMissingError extends Error {
  readonly errors: IndexError[];

  constructor(errors: IndexError[]) {
    const summary = errors.map((e) => `${e.index}: ${e.error.message}`).join("; ");
    super(`No results index found: ${summary}`);
    this.name = "AllIndicesMissingError";
    this.errors = errors;
  }
}

export type FallbackSearchResult = {
  index: string;
  response: SearchResponse;
};

type SearchClient = Pick<ElasticsearchClient, "search">;

/**
 * Runs the search against each index in turn, moving on only when an index
 * does not exist (HTTP 404). Any other failure is rethrown as-is.
 */
export async function searchWithIndexFallback(
  client: SearchClient,
  indices: string[],
  body: SearchBody,
): Promise<FallbackSearchResult> {
  if (indices.length === 0) {
    throw new Error("At least one index is required");
  }

  const errors: IndexError[] = [];

  for (const index of indices) {
    try {
      const response = await client.search(index, body);
      return { index, response };
    } catch (err) {
      if (!isNotFound(err)) throw err;
      log.debug("Results index not found, trying next", { index });
      errors.push({ index, error: toError(err) });
    }
  }

  throw new AllIndicesMissingError(errors);
}
