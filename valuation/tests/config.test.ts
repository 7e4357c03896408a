import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env";

describe("loadConfig", () => {
  it("should fall back to the defaults", () => {
    expect(loadConfig({})).toEqual({
      mode: "development",
      logLevel: "info",
      inputFile: "realestates.txt",
      outputFile: "valuation-report.txt",
      targetCity: "Budapest",
      currency: "Ft",
      sampleFallback: false,
    });
  });

  it("should read overrides from the environment", () => {
    const cfg = loadConfig({
      MODE: "batch",
      LOG_LEVEL: "DEBUG",
      INPUT_FILE: "data/listings.txt",
      TARGET_CITY: "Debrecen",
      CURRENCY_LABEL: "EUR",
      SAMPLE_FALLBACK: "true",
    });

    expect(cfg).toMatchObject({
      mode: "batch",
      logLevel: "debug",
      inputFile: "data/listings.txt",
      targetCity: "Debrecen",
      currency: "EUR",
      sampleFallback: true,
    });
  });

  it("should name every invalid variable", () => {
    expect(() => loadConfig({ SAMPLE_FALLBACK: "maybe", LOG_LEVEL: "loud" })).toThrow(
      /SAMPLE_FALLBACK.*LOG_LEVEL|LOG_LEVEL.*SAMPLE_FALLBACK/
    );
  });
});
