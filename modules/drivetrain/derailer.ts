import { requireCogs } from "../core/cog-pairs";

const span = (cogs: readonly number[]): number => Math.abs(Math.max(...cogs) - Math.min(...cogs));

/** Total chain wrap the rear derailer has to take up across the cog set. */
export function derailerCapacity(frontCogs: readonly number[], rearCogs: readonly number[]): number {
  requireCogs(frontCogs, rearCogs);
  return span(frontCogs) + span(rearCogs);
}
