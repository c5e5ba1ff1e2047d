import { parseConfig, type ReportConfig } from "@mlreport/shared";

type Env = Record<string, string | undefined>;

function str(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

// NaN is left in place so the schema reports which variable is wrong
function num(env: Env, key: string): number | undefined {
  const value = str(env, key);
  return value === undefined ? undefined : Number(value);
}

function list(env: Env, key: string): string[] | undefined {
  const value = str(env, key);
  if (value === undefined) return undefined;
  return value
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

/**
 * Maps ES_HOST, ES_USERNAME, ES_PASSWORD, ES_API_KEY, ML_JOB_ID, LOOKBACK_DAYS,
 * MIN_SCORE, SORT_BY, MAX_RESULTS, REPORTS_DIR and REPORT_FORMATS onto the
 * report config. Unset variables are passed as undefined and take the defaults.
 */
export function loadConfigFromEnv(env: Env = process.env): ReportConfig {
  return parseConfig({
    elasticsearch: {
      host: str(env, "ES_HOST"),
      username: str(env, "ES_USERNAME"),
      password: env.ES_PASSWORD,
      apiKey: str(env, "ES_API_KEY"),
    },
    job: {
      id: str(env, "ML_JOB_ID"),
      lookbackDays: num(env, "LOOKBACK_DAYS"),
      minScore: num(env, "MIN_SCORE"),
      sort: str(env, "SORT_BY"),
      maxResults: num(env, "MAX_RESULTS"),
    },
    output: {
      dir: str(env, "REPORTS_DIR"),
      formats: list(env, "REPORT_FORMATS"),
    },
  });
}
