import type { TimeWindow } from "@mlreport/shared";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Inclusive [now - days, now] range in epoch milliseconds. */
export function lookbackWindow(now: number, days: number): TimeWindow {
  return { start: now - days * DAY_MS, end: now };
}

export function inWindow(timestamp: number, window: TimeWindow): boolean {
  return timestamp >= window.start && timestamp <= window.end;
}
