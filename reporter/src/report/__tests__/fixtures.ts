import type { AnomalyRecord } from "@mlreport/shared";
import type { ReportInput } from "../types.js";

export const DAY_MS = 24 * 60 * 60 * 1000;
/** 2024-02-20T00:00:00Z */
export const T0 = Date.UTC(2024, 1, 20);

export function makeRecord(overrides: Partial<AnomalyRecord> = {}): AnomalyRecord {
  return {
    jobId: "j1",
    resultType: "record",
    timestamp: T0,
    score: 50,
    partition: "login_flow",
    ...overrides,
  };
}

/** Highest score first, the way a score-sorted fetch returns them. */
export function sampleRecords(): AnomalyRecord[] {
  return [
    makeRecord({ partition: "login_flow", timestamp: T0 + 4 * DAY_MS, score: 100 }),
    makeRecord({ partition: "login_flow", timestamp: T0, score: 80 }),
    makeRecord({ partition: "cart_flow", timestamp: T0 + 2 * DAY_MS, score: 40 }),
  ];
}

export function makeInput(overrides: Partial<ReportInput> = {}): ReportInput {
  return {
    jobId: "j1",
    generatedAt: Date.UTC(2024, 2, 1, 12, 30, 0),
    window: { start: Date.UTC(2024, 0, 11), end: Date.UTC(2024, 2, 1) },
    records: sampleRecords(),
    source: "records",
    ...overrides,
  };
}
