import { tabulateCogPairs, type CogPairTable } from "../core/cog-pairs";

export function gcd(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    [x, y] = [y, x % y];
  }
  return x;
}

export function reduceRatio(front: number, rear: number): { numerator: number; denominator: number } {
  const g = gcd(front, rear);
  return { numerator: front / g, denominator: rear / g };
}

/**
 * Number of distinct skid patches a fixed-gear rear tire wears for each
 * (front, rear) pair.
 *
 * Skid patch theorem: write front/rear in lowest terms as a/b. A rider who
 * always skids with the same foot forward gets b patches. An ambidextrous
 * skidder (either foot forward) doubles that exactly when a is odd, since the
 * half-crank-turn offset then lands between the existing patches.
 *
 * `numSkidPatches([50], [25, 30], true)` -> `{ "50:25": 1, "50:30": 6 }`.
 */
export function numSkidPatches(
  frontCogs: readonly number[],
  rearCogs: readonly number[],
  ambidextrous = false,
): CogPairTable {
  return tabulateCogPairs(frontCogs, rearCogs, (front, rear) => {
    const { numerator, denominator } = reduceRatio(front, rear);
    return ambidextrous && numerator % 2 !== 0 ? 2 * denominator : denominator;
  });
}
