import { describe, it, expect } from "vitest";
import { inWindow, lookbackWindow } from "../window.js";

const NOW = Date.UTC(2024, 2, 1);

describe("lookbackWindow", () => {
  it("spans the given number of days ending now", () => {
    expect(lookbackWindow(NOW, 50)).toEqual({ start: Date.UTC(2024, 0, 11), end: NOW });
  });

  it("handles a single day", () => {
    expect(lookbackWindow(NOW, 1)).toEqual({ start: Date.UTC(2024, 1, 29), end: NOW });
  });
});

describe("inWindow", () => {
  const window = { start: 100, end: 200 };

  it("includes both bounds", () => {
    expect(inWindow(100, window)).toBe(true);
    expect(inWindow(200, window)).toBe(true);
  });

  it("excludes timestamps outside the range", () => {
    expect(inWindow(99, window)).toBe(false);
    expect(inWindow(201, window)).toBe(false);
  });
});
