import { describe, expect, it } from "vitest";
import { parseCoordinateQuery } from "../coordinateQuery.js";

describe("parseCoordinateQuery", () => {
  it("parses numeric strings", () => {
    expect(parseCoordinateQuery("25.5138", "90.2065")).toEqual({ lat: 25.5138, lng: 90.2065 });
    expect(parseCoordinateQuery("-33.9", "151.2")).toEqual({ lat: -33.9, lng: 151.2 });
  });

  it("passes numbers through", () => {
    expect(parseCoordinateQuery(1, 2)).toEqual({ lat: 1, lng: 2 });
  });

  it("leaves range checks to the caller", () => {
    expect(parseCoordinateQuery("95", "0")).toEqual({ lat: 95, lng: 0 });
  });

  it("returns null for missing or invalid values", () => {
    expect(parseCoordinateQuery(undefined, "90")).toBe(null);
    expect(parseCoordinateQuery("25", "")).toBe(null);
    expect(parseCoordinateQuery("abc", "90")).toBe(null);
    expect(parseCoordinateQuery(["25", "26"], "90")).toBe(null);
    expect(parseCoordinateQuery("Infinity", "90")).toBe(null);
  });
});
