import { describe, expect, it } from "vitest";
import { elapsedWholeMinutes, epochSecondsToWallClock, toDate, wallClock } from "../../src/lib/time.js";

describe("toDate", () => {
  it("normalizes ISO strings, numbers and timestamp-like objects", () => {
    expect(toDate("2024-01-01T00:00:00.000Z")?.toISOString()).toBe("2024-01-01T00:00:00.000Z");
    expect(toDate(1704067200000)?.toISOString()).toBe("2024-01-01T00:00:00.000Z");
    expect(toDate({ toDate: () => new Date("2024-01-01T00:00:00.000Z") })?.toISOString()).toBe("2024-01-01T00:00:00.000Z");
  });

  it("returns null for invalid values", () => {
    expect(toDate("not-a-date")).toBeNull();
    expect(toDate(null)).toBeNull();
    expect(toDate(new Date(Number.NaN))).toBeNull();
  });
});

describe("wallClock", () => {
  it("shifts to standard time in winter", () => {
    const local = wallClock(new Date("2024-01-15T18:30:05.250Z"), "America/Chicago");
    expect(local.toISOString()).toBe("2024-01-15T12:30:05.250Z");
  });

  it("shifts to daylight time in summer", () => {
    const local = wallClock(new Date("2024-07-15T18:30:00.000Z"), "America/Chicago");
    expect(local.toISOString()).toBe("2024-07-15T13:30:00.000Z");
  });

  it("crosses midnight backwards", () => {
    const local = wallClock(new Date("2024-03-01T02:00:00.000Z"), "America/Chicago");
    expect(local.toISOString()).toBe("2024-02-29T20:00:00.000Z");
  });
});

describe("epochSecondsToWallClock", () => {
  it("subtracts the provider offset", () => {
    expect(epochSecondsToWallClock(1704067200, 5).toISOString()).toBe("2023-12-31T19:00:00.000Z");
    expect(epochSecondsToWallClock(1704067200, 0).toISOString()).toBe("2024-01-01T00:00:00.000Z");
  });
});

describe("elapsedWholeMinutes", () => {
  it("floors partial minutes", () => {
    const start = new Date("2024-01-01T00:00:00.000Z");
    expect(elapsedWholeMinutes(start, new Date("2024-01-01T00:10:59.999Z"))).toBe(10);
    expect(elapsedWholeMinutes(start, new Date("2024-01-02T01:00:00.000Z"))).toBe(1500);
  });

  it("never goes negative", () => {
    expect(elapsedWholeMinutes(new Date("2024-01-01T00:05:00.000Z"), new Date("2024-01-01T00:00:00.000Z"))).toBe(0);
  });
});
