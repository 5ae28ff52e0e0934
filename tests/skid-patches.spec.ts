import { describe, expect, it } from "vitest";
import { gcd, numSkidPatches, reduceRatio } from "../modules/drivetrain/skid-patches";

describe("gcd", () => {
  it("finds the greatest common divisor", () => {
    expect(gcd(48, 18)).toBe(6);
    expect(gcd(17, 5)).toBe(1);
    expect(gcd(0, 5)).toBe(5);
  });

  it("reduces a ratio to lowest terms", () => {
    expect(reduceRatio(50, 30)).toEqual({ numerator: 5, denominator: 3 });
  });
});

describe("skid patches", () => {
  it("counts the reduced denominator for a single-footed skidder", () => {
    expect(numSkidPatches([50], [25])).toEqual({ "50:25": 1 });
    expect(numSkidPatches([50], [25, 30], false)).toEqual({ "50:25": 1, "50:30": 3 });
    expect(numSkidPatches([48], [17])).toEqual({ "48:17": 17 });
  });

  it("doubles for an ambidextrous skidder when the reduced numerator is odd", () => {
    expect(numSkidPatches([50], [30], true)).toEqual({ "50:30": 6 });
    expect(numSkidPatches([49], [14], true)).toEqual({ "49:14": 4 });
  });

  it("does not double when the reduced numerator is even", () => {
    expect(numSkidPatches([50], [25], true)).toEqual({ "50:25": 1 });
    expect(numSkidPatches([48], [17], true)).toEqual({ "48:17": 17 });
  });

  it("handles a 1:1 ratio", () => {
    expect(numSkidPatches([17], [17])).toEqual({ "17:17": 1 });
    expect(numSkidPatches([17], [17], true)).toEqual({ "17:17": 2 });
  });
});
