import { DRIVETRAIN_CONSTANTS } from "../core/drivetrain-constants";
import { CalculationDomainError, InvalidInputError, type RecordIssue } from "../core/errors";
import { roundSides, type Digits } from "../core/rounding";
import { SIDES, type SideMap } from "../../shared/bicycle-schema";

export interface SpokeGeometry {
  centerToFlange: SideMap<number>;
  flangeDiameter: SideMap<number>;
  spokeHoleDiameter: number;
  erd: number;
  /** Positive shifts the rim toward the right (drive) side. */
  offset: number;
  numSpokes: number;
  numCrosses: number;
}

export type SpokeLengths = SideMap<number>;

const geometryIssues = (geometry: SpokeGeometry): RecordIssue[] => {
  const issues: RecordIssue[] = [];
  const { numSpokes, numCrosses, erd } = geometry;
  if (!Number.isInteger(numSpokes) || numSpokes <= 0) {
    issues.push({ attribute: "numSpokes", reason: "out_of_range", detail: `expected a positive integer, got ${numSpokes}` });
  } else if (numSpokes % 2 !== 0) {
    issues.push({ attribute: "numSpokes", reason: "odd", detail: `got ${numSpokes}` });
  }
  if (!Number.isInteger(numCrosses) || numCrosses < 0) {
    issues.push({ attribute: "numCrosses", reason: "out_of_range", detail: `expected a non-negative integer, got ${numCrosses}` });
  }
  if (!Number.isFinite(erd) || erd <= 0) {
    issues.push({ attribute: "erd", reason: "out_of_range", detail: `expected a positive length, got ${erd}` });
  }
  return issues;
};

/**
 * Angle (radians) between a spoke's hub hole and its rim hole, seen from the
 * axle. Each flange carries half the spokes.
 */
export function crossAngle(numSpokes: number, numCrosses: number): number {
  return (DRIVETRAIN_CONSTANTS.TWO_PI * numCrosses) / (numSpokes / 2);
}

/**
 * Left (non-drive) and right (drive) spoke lengths, by the law of cosines on
 * the flange circle and the ERD circle, offset axially by the flange distance
 * and shortened by the spoke-hole radius.
 *
 * See John Allen, "Measurements for Spoke Length Calculations".
 */
export function spokeLength(geometry: SpokeGeometry, digits?: Digits): SpokeLengths {
  const issues = geometryIssues(geometry);
  if (issues.length > 0) {
    throw new InvalidInputError(issues);
  }

  const phi = crossAngle(geometry.numSpokes, geometry.numCrosses);
  const r2 = geometry.erd / 2;
  const r3 = geometry.spokeHoleDiameter / 2;
  const result: SpokeLengths = { left: 0, right: 0 };

  for (const side of SIDES) {
    const o = side === "right" ? geometry.offset : -geometry.offset;
    const d = geometry.centerToFlange[side] + o;
    const r1 = geometry.flangeDiameter[side] / 2;
    const radicand = d ** 2 + r1 ** 2 + r2 ** 2 - 2 * r1 * r2 * Math.cos(phi);
    if (!(radicand >= 0)) {
      throw new CalculationDomainError("spokeLength", `no real solution on the ${side} side`, { side, radicand });
    }
    const length = Math.sqrt(radicand) - r3;
    if (length <= 0) {
      throw new CalculationDomainError("spokeLength", `spoke hole swallows the ${side} spoke`, {
        side,
        length,
      });
    }
    result[side] = length;
  }

  return roundSides(result, digits);
}
