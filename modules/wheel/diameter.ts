import { invalidInput } from "../core/errors";

/**
 * Approximate inflated diameter: bead seat diameter plus the tire's height on
 * both sides, taking height ≈ width. Ignores casing compression; prefer a
 * measured `diameter` when one exists.
 *
 * `approxWheelDiameter(584, 42)` -> 668.
 */
export function approxWheelDiameter(bsd: number, tireWidth: number): number {
  if (!Number.isFinite(bsd) || bsd <= 0) {
    throw invalidInput("bsd", "out_of_range", `expected a positive length, got ${bsd}`);
  }
  if (!Number.isFinite(tireWidth) || tireWidth < 0) {
    throw invalidInput("tireWidth", "out_of_range", `expected a non-negative length, got ${tireWidth}`);
  }
  return bsd + 2 * tireWidth;
}
