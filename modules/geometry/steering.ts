import { DRIVETRAIN_CONSTANTS, degreesToRadians } from "../core/drivetrain-constants";
import { CalculationDomainError, invalidInput } from "../core/errors";
import { roundTriple, type Digits } from "../core/rounding";

export type SteeringGeometry = readonly [trail: number, mechanicalTrail: number, wheelFlop: number];

/**
 * Trail, mechanical trail and wheel flop for a head tube angle (degrees), fork
 * rake and front wheel diameter (mm).
 *
 *   trail           = (r·cos α − rake) / sin α
 *   mechanicalTrail = trail·sin α
 *   wheelFlop       = trail·sin α·cos α
 *
 * `trail(73, 64, 700, 1)` -> `[40.1, 38.3, 11.2]`.
 */
export function trail(
  headTubeAngle: number,
  forkRake: number,
  wheelDiameter: number,
  digits?: Digits,
): SteeringGeometry {
  if (!Number.isFinite(headTubeAngle)) {
    throw invalidInput("headTubeAngle", "invalid", `expected a finite angle, got ${headTubeAngle}`);
  }
  if (!Number.isFinite(forkRake)) {
    throw invalidInput("forkRake", "invalid", `expected a finite length, got ${forkRake}`);
  }
  if (!Number.isFinite(wheelDiameter) || wheelDiameter <= 0) {
    throw invalidInput("wheelDiameter", "out_of_range", `expected a positive length, got ${wheelDiameter}`);
  }

  const vertical = () =>
    new CalculationDomainError("trail", "head tube angle is a multiple of 180 degrees", { headTubeAngle });
  if (headTubeAngle % 180 === 0) {
    throw vertical();
  }

  // Reduce before converting; radians of a large angle lose the sine's zeros.
  const a = degreesToRadians(headTubeAngle % 360);
  const sinA = Math.sin(a);
  const cosA = Math.cos(a);
  if (Math.abs(sinA) < DRIVETRAIN_CONSTANTS.SIN_EPSILON) {
    throw vertical();
  }

  const wheelRadius = wheelDiameter / 2;
  const t = (wheelRadius * cosA - forkRake) / sinA;
  const mechanicalTrail = t * sinA;
  const wheelFlop = t * sinA * cosA;
  if (![t, mechanicalTrail, wheelFlop].every(Number.isFinite)) {
    throw new CalculationDomainError("trail", "result is not finite", { headTubeAngle, forkRake, wheelDiameter });
  }

  return roundTriple([t, mechanicalTrail, wheelFlop], digits);
}
