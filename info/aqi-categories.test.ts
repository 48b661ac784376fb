import { describe, expect, it } from "vitest";
import { getAqiCategory } from "./aqi-categories";

describe("getAqiCategory", () => {
  it.each([
    [0, "Good"],
    [50, "Good"],
    [51, "Satisfactory"],
    [100, "Satisfactory"],
    [101, "Moderate"],
    [200, "Moderate"],
    [201, "Poor"],
    [300, "Poor"],
    [301, "Very Poor"],
    [400, "Very Poor"],
    [401, "Severe"],
    [1331, "Severe"],
  ])("classifies %i as %s", (aqi, level) => {
    expect(getAqiCategory(aqi)?.level).toBe(level);
  });

  it("has no category without an AQI", () => {
    expect(getAqiCategory(null)).toBeNull();
  });
});
