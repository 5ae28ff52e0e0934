import { describe, expect, it } from "vitest";
import { createBicycle, createWheel } from "../modules/bicycle/records";
import {
  assertValid,
  checkCogs,
  checkDiameterInputs,
  checkGearing,
  checkSpokeGeometry,
  checkTrail,
} from "../modules/bicycle/validator";
import { InvalidInputError } from "../modules/core/errors";

const spokedWheel = (numSpokes: number) =>
  createWheel({
    erd: 560,
    centerToFlange: { left: 37.1, right: 20.9 },
    flangeDiameter: { left: 45, right: 45 },
    offset: 3,
    numSpokes,
  });

describe("record validator", () => {
  it("lists every missing gearing attribute", () => {
    expect(checkGearing(createBicycle())).toEqual({
      ok: false,
      issues: [
        { attribute: "frontCogs", reason: "empty" },
        { attribute: "rearCogs", reason: "empty" },
        { attribute: "crankLength", reason: "missing" },
        { attribute: "rearWheel.diameter", reason: "missing" },
      ],
    });
  });

  it("hands back the typed gearing inputs from the rear wheel", () => {
    const bicycle = createBicycle({
      frontCogs: [40],
      rearCogs: [30, 20],
      crankLength: 100,
      frontWheel: { diameter: 700 },
      rearWheel: { diameter: 600 },
    });
    expect(checkGearing(bicycle)).toEqual({
      ok: true,
      value: { frontCogs: [40], rearCogs: [20, 30], crankLength: 100, wheelDiameter: 600 },
    });
  });

  it("only needs cogs for cog-only calculations", () => {
    expect(checkCogs(createBicycle({ frontCogs: [50], rearCogs: [17] }))).toEqual({
      ok: true,
      value: { frontCogs: [50], rearCogs: [17] },
    });
  });

  it("reads the front wheel for trail", () => {
    const check = checkTrail(createBicycle({ headTubeAngle: 73, forkRake: 64, frontWheel: { diameter: -5 } }));
    expect(check.ok).toBe(false);
    if (!check.ok) {
      expect(check.issues).toHaveLength(1);
      expect(check.issues[0]).toMatchObject({ attribute: "frontWheel.diameter", reason: "out_of_range" });
    }
  });

  it("flags an odd spoke count", () => {
    expect(checkSpokeGeometry(spokedWheel(35))).toEqual({
      ok: false,
      issues: [{ attribute: "numSpokes", reason: "odd" }],
    });
  });

  it("returns the spoke geometry with defaults applied", () => {
    const check = checkSpokeGeometry(spokedWheel(36));
    expect(check).toEqual({
      ok: true,
      value: {
        centerToFlange: { left: 37.1, right: 20.9 },
        flangeDiameter: { left: 45, right: 45 },
        spokeHoleDiameter: 2.6,
        erd: 560,
        offset: 3,
        numSpokes: 36,
        numCrosses: 3,
      },
    });
  });

  it("reports a missing flange side", () => {
    const wheel = createWheel({
      erd: 560,
      centerToFlange: { left: 37.1 },
      flangeDiameter: { left: 45, right: 45 },
      numSpokes: 32,
    });
    expect(checkSpokeGeometry(wheel)).toEqual({
      ok: false,
      issues: [{ attribute: "centerToFlange.right", reason: "missing" }],
    });
  });

  it("checks diameter inputs", () => {
    expect(checkDiameterInputs(createWheel({ bsd: 584, tireWidth: 42 }))).toEqual({
      ok: true,
      value: { bsd: 584, tireWidth: 42 },
    });
  });

  it("turns a failed check into an InvalidInputError", () => {
    const bicycle = createBicycle({ frontCogs: [40], rearCogs: [20] });
    expect(() => assertValid(checkGearing(bicycle), "Nameless bicycle")).toThrow(
      new InvalidInputError(
        [
          { attribute: "crankLength", reason: "missing" },
          { attribute: "rearWheel.diameter", reason: "missing" },
        ],
        "Nameless bicycle",
      ),
    );
    expect(() => assertValid(checkGearing(bicycle), "Nameless bicycle")).toThrow(
      "Nameless bicycle: crankLength is missing; rearWheel.diameter is missing",
    );
  });
});
