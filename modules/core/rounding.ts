import { mapCogPairTable, type CogPairTable } from "./cog-pairs";
import { invalidInput } from "./errors";
import type { SideMap } from "../../shared/bicycle-schema";

/**
 * Output rounding. Calculators keep full precision internally and call these
 * once on the values they return; `digits` null/undefined means no rounding.
 */

export type Digits = number | null | undefined;

const assertDigits = (digits: number): void => {
  if (!Number.isInteger(digits) || digits < 0) {
    throw invalidInput("digits", "out_of_range", `expected a non-negative integer, got ${digits}`);
  }
};

// A double carries no decimal places past this to round away.
const MAX_DIGITS = 15;

/** Rounds half away from zero, so `-0.25` and `0.25` round to the same magnitude. */
export function roundTo(value: number, digits: number): number {
  assertDigits(digits);
  if (digits > MAX_DIGITS) return value;
  const scale = 10 ** digits;
  const scaled = Math.abs(value) * scale;
  if (!Number.isFinite(scaled)) return value;
  const rounded = Math.round(scaled) / scale;
  return value < 0 ? -rounded : rounded;
}

export const maybeRound = (value: number, digits: Digits): number =>
  digits === null || digits === undefined ? value : roundTo(value, digits);

export function roundTable(table: CogPairTable, digits: Digits): CogPairTable {
  return mapCogPairTable(table, (value) => maybeRound(value, digits));
}

export function roundSides(sides: SideMap<number>, digits: Digits): SideMap<number> {
  return {
    left: maybeRound(sides.left, digits),
    right: maybeRound(sides.right, digits),
  };
}

export function roundTriple(
  values: readonly [number, number, number],
  digits: Digits,
): [number, number, number] {
  return [maybeRound(values[0], digits), maybeRound(values[1], digits), maybeRound(values[2], digits)];
}
