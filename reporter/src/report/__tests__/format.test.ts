import { describe, it, expect } from "vitest";
import { formatDay, formatMinute, formatOptional, formatScore, formatSecond } from "../format.js";

const TS = Date.UTC(2024, 1, 20, 9, 5, 7);

describe("format helpers", () => {
  it("formats timestamps in UTC", () => {
    expect(formatMinute(TS)).toBe("2024-02-20 09:05");
    expect(formatSecond(TS)).toBe("2024-02-20 09:05:07");
    expect(formatDay(TS)).toBe("2024-02-20");
  });

  it("formats scores with one decimal", () => {
    expect(formatScore(87.456)).toBe("87.5");
    expect(formatScore(40)).toBe("40.0");
  });

  it("formats optional values with a dash for missing ones", () => {
    expect(formatOptional(undefined)).toBe("-");
    expect(formatOptional(1200)).toBe("1200");
    expect(formatOptional(1 / 3)).toBe("0.333");
  });
});
