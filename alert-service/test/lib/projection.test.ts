import { describe, expect, it } from "vitest";
import { centralMeridian, planarDistanceMeters, projectUtm } from "../../src/lib/projection.js";
import { northOf } from "../testUtils/testEnv.js";

describe("projectUtm", () => {
  it("places the equator on the central meridian at the false origin", () => {
    const point = projectUtm({ lat: 0, lon: centralMeridian(15) }, 15);
    expect(point.easting).toBeCloseTo(500_000, 6);
    expect(point.northing).toBeCloseTo(0, 6);
  });

  it("matches the scaled meridian arc at 45 degrees north", () => {
    const point = projectUtm({ lat: 45, lon: -93 }, 15);
    expect(point.easting).toBeCloseTo(500_000, 6);
    expect(point.northing).toBeCloseTo(4_982_950.4, 0);
  });

  it("puts points west of the central meridian below the false easting", () => {
    const west = projectUtm({ lat: 41.6, lon: -94 }, 15);
    const east = projectUtm({ lat: 41.6, lon: -92 }, 15);
    expect(west.easting).toBeLessThan(500_000);
    expect(east.easting).toBeGreaterThan(500_000);
    expect(west.easting + east.easting).toBeCloseTo(1_000_000, 6);
  });
});

describe("centralMeridian", () => {
  it("returns the middle longitude of a zone", () => {
    expect(centralMeridian(1)).toBe(-177);
    expect(centralMeridian(15)).toBe(-93);
    expect(centralMeridian(31)).toBe(3);
  });
});

describe("planarDistanceMeters", () => {
  const origin = { lat: 41.6, lon: -93 };

  it("measures short north-south offsets in meters", () => {
    const distance = planarDistanceMeters(origin, northOf(origin, 500), 15);
    expect(distance).toBeGreaterThan(495);
    expect(distance).toBeLessThan(500);
  });

  it("is symmetric", () => {
    const other = { lat: 41.61, lon: -93.02 };
    expect(planarDistanceMeters(origin, other, 15)).toBeCloseTo(planarDistanceMeters(other, origin, 15), 9);
  });

  it("is zero for the same point", () => {
    expect(planarDistanceMeters(origin, origin, 15)).toBe(0);
  });
});
