import { describe, expect, it } from "vitest";
import { copyBicycle, copyWheel, createBicycle, createWheel, parseBicycle, parseWheel } from "../modules/bicycle/records";
import { InvalidInputError } from "../modules/core/errors";

describe("wheel records", () => {
  it("fills every default", () => {
    expect(createWheel()).toEqual({
      name: null,
      bsd: null,
      erd: null,
      tireWidth: null,
      diameter: null,
      centerToFlange: { left: null, right: null },
      flangeDiameter: { left: null, right: null },
      spokeHoleDiameter: 2.6,
      numSpokes: null,
      numCrosses: 3,
      offset: 0,
    });
  });

  it("builds fresh side maps for every wheel", () => {
    const a = createWheel();
    const b = createWheel();
    expect(a.centerToFlange).not.toBe(b.centerToFlange);
    expect(a.flangeDiameter).not.toBe(b.flangeDiameter);
  });

  it("keeps an explicit null instead of substituting a default", () => {
    expect(createWheel({ spokeHoleDiameter: null, numCrosses: null })).toMatchObject({
      spokeHoleDiameter: null,
      numCrosses: null,
    });
  });

  it("copies with overrides and leaves the source untouched", () => {
    const wheel = createWheel({ name: "Rear", erd: 602, numSpokes: 32 });
    const laced = copyWheel(wheel, { numSpokes: 36 });
    expect(laced.numSpokes).toBe(36);
    expect(laced.erd).toBe(602);
    expect(wheel.numSpokes).toBe(32);
  });
});

describe("bicycle records", () => {
  it("sorts cog lists without touching the caller's arrays", () => {
    const frontCogs = [42, 28];
    const bicycle = createBicycle({ frontCogs, rearCogs: [30, 12, 21] });
    expect(bicycle.frontCogs).toEqual([28, 42]);
    expect(bicycle.rearCogs).toEqual([12, 21, 30]);
    expect(frontCogs).toEqual([42, 28]);
  });

  it("freezes the record", () => {
    const bicycle = createBicycle({ frontCogs: [42] });
    expect(Object.isFrozen(bicycle)).toBe(true);
    expect(Object.isFrozen(bicycle.frontCogs)).toBe(true);
    expect(Object.isFrozen(bicycle.rearWheel)).toBe(true);
  });

  it("defaults to empty cogs and blank wheels", () => {
    const bicycle = createBicycle();
    expect(bicycle.frontCogs).toEqual([]);
    expect(bicycle.rearWheel).toEqual(createWheel());
    expect(bicycle.frontWheel).not.toBe(bicycle.rearWheel);
  });

  it("deep-copies with overrides", () => {
    const bicycle = createBicycle({ name: "Road", crankLength: 172.5, rearWheel: { diameter: 668 } });
    const copy = copyBicycle(bicycle, { crankLength: 175 });
    expect(copy.crankLength).toBe(175);
    expect(bicycle.crankLength).toBe(172.5);
    expect(copy.rearWheel).toEqual(bicycle.rearWheel);
    expect(copy.rearWheel).not.toBe(bicycle.rearWheel);
  });
});

describe("parsing JSON records", () => {
  it("parses a complete bicycle", () => {
    const bicycle = parseBicycle({
      name: "Touring",
      frontCogs: [48, 36, 26],
      rearCogs: [11, 32],
      crankLength: 170,
      rearWheel: { erd: 602, centerToFlange: { left: 35.2, right: 19.4 } },
    });
    expect(bicycle.name).toBe("Touring");
    expect(bicycle.frontCogs).toEqual([26, 36, 48]);
    expect(bicycle.rearWheel.centerToFlange).toEqual({ left: 35.2, right: 19.4 });
    expect(bicycle.headTubeAngle).toBeNull();
  });

  it("reports the path of a malformed attribute", () => {
    try {
      parseBicycle({ frontCogs: [40], rearCogs: ["x"] });
      throw new Error("expected parseBicycle to throw");
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      const error = err as InvalidInputError;
      expect(error.label).toBe("bicycle");
      expect(error.issues).toEqual([
        { attribute: "rearCogs.0", reason: "invalid", detail: "Expected number, received string" },
      ]);
    }
  });

  it("rejects a fractional spoke count", () => {
    expect(() => parseWheel({ numSpokes: 32.5 }, "rear")).toThrow(/^rear: numSpokes is invalid/);
  });
});
