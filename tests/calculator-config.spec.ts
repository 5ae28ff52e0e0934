import { describe, expect, it } from "vitest";
import { readCalculatorConfig } from "../modules/environment/config";

describe("calculator config", () => {
  it("defaults to full precision, single-footed skids and info logging", () => {
    expect(readCalculatorConfig({})).toEqual({ digits: null, ambidextrous: false, logLevel: "info" });
  });

  it("reads the environment", () => {
    expect(
      readCalculatorConfig({
        BICYCLE_DIGITS: "2",
        BICYCLE_AMBIDEXTROUS: "true",
        BICYCLE_LOG_LEVEL: "DEBUG",
      }),
    ).toEqual({ digits: 2, ambidextrous: true, logLevel: "debug" });
  });

  it("falls back on unusable values", () => {
    expect(
      readCalculatorConfig({
        BICYCLE_DIGITS: "-1",
        BICYCLE_AMBIDEXTROUS: "maybe",
        BICYCLE_LOG_LEVEL: "loud",
      }),
    ).toEqual({ digits: null, ambidextrous: false, logLevel: "info" });
    expect(readCalculatorConfig({ BICYCLE_DIGITS: "1.5" }).digits).toBeNull();
  });
});
