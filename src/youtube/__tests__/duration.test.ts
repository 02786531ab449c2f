import { describe, it, expect } from "vitest";
import { parseIsoDuration } from "../duration.js";

describe("parseIsoDuration", () => {
  it("converts hours, minutes and seconds", () => {
    expect(parseIsoDuration("PT1H2M10S")).toBe(3730);
    expect(parseIsoDuration("PT45S")).toBe(45);
    expect(parseIsoDuration("PT12M")).toBe(720);
  });

  it("counts days for long live streams", () => {
    expect(parseIsoDuration("P1DT2H")).toBe(93600);
  });

  it("drops fractional seconds", () => {
    expect(parseIsoDuration("PT1.5S")).toBe(1);
  });

  it("returns 0 for missing or unparseable values", () => {
    expect(parseIsoDuration(undefined)).toBe(0);
    expect(parseIsoDuration("P0D")).toBe(0);
    expect(parseIsoDuration("4:05")).toBe(0);
  });
});
