import { describe, expect, it } from "vitest";
import { bearingDegrees, distanceKm, hasCoordinates } from "./geo.js";

describe("distanceKm", () => {
  it("is zero between identical points", () => {
    expect(distanceKm({ latitude: 34, longitude: -118 }, { latitude: 34, longitude: -118 })).toBe(0);
  });

  it("measures one degree of longitude on the equator", () => {
    // 2π·6371/360
    expect(distanceKm({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 1 })).toBe(111.195);
  });
});

describe("bearingDegrees", () => {
  it("points north, east, south and west", () => {
    const origin = { latitude: 0, longitude: 0 };
    expect(bearingDegrees(origin, { latitude: 1, longitude: 0 })).toBe(0);
    expect(bearingDegrees(origin, { latitude: 0, longitude: 1 })).toBe(90);
    expect(bearingDegrees(origin, { latitude: -1, longitude: 0 })).toBe(180);
    expect(bearingDegrees(origin, { latitude: 0, longitude: -1 })).toBe(270);
  });
});

describe("hasCoordinates", () => {
  it("requires both latitude and longitude", () => {
    expect(hasCoordinates({ latitude: 1, longitude: 2 })).toBe(true);
    expect(hasCoordinates({ latitude: null, longitude: 2 })).toBe(false);
    expect(hasCoordinates({ latitude: 0, longitude: null })).toBe(false);
  });
});
