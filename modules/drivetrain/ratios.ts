import { tabulateCogPairs, type CogPairTable } from "../core/cog-pairs";
import { CalculationDomainError, invalidInput } from "../core/errors";
import { roundTable, type Digits } from "../core/rounding";

/**
 * Gear ratio: front teeth over rear teeth, e.g. 40/20 -> 2.
 */
export function gearRatios(
  frontCogs: readonly number[],
  rearCogs: readonly number[],
  digits?: Digits,
): CogPairTable {
  return roundTable(
    tabulateCogPairs(frontCogs, rearCogs, (front, rear) => front / rear),
    digits,
  );
}

/**
 * Wheel radius over crank length, the factor that turns a gear ratio into a
 * gain ratio.
 */
export function radiusRatio(crankLength: number, wheelDiameter: number): number {
  if (!Number.isFinite(wheelDiameter) || wheelDiameter <= 0) {
    throw invalidInput("wheelDiameter", "out_of_range", `expected a positive length, got ${wheelDiameter}`);
  }
  if (!Number.isFinite(crankLength) || crankLength <= 0) {
    throw new CalculationDomainError("gainRatio", "crank length must be positive", { crankLength });
  }
  return wheelDiameter / 2 / crankLength;
}

/**
 * Gain ratio (Sheldon Brown): distance the bicycle travels per unit distance
 * the pedal travels around its circle. `wheelDiameter` is the rear wheel's.
 *
 * Example: `gainRatios([40], [20, 30], 100, 600)` -> `{ "40:20": 6, "40:30": 4 }`.
 */
export function gainRatios(
  frontCogs: readonly number[],
  rearCogs: readonly number[],
  crankLength: number,
  wheelDiameter: number,
  digits?: Digits,
): CogPairTable {
  const w = radiusRatio(crankLength, wheelDiameter);
  return roundTable(
    tabulateCogPairs(frontCogs, rearCogs, (front, rear) => (w * front) / rear),
    digits,
  );
}
