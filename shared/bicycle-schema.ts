import { z } from "zod";

/**
 * Bicycle + wheel measurement records (shared).
 *
 * Conventions:
 * - lengths in millimeters, angles in degrees;
 * - cogs are tooth counts, e.g. `frontCogs: [28, 42]`;
 * - `diameter` is the wheel with the tire on and inflated;
 * - hub measurements come as `{ left, right }` pairs, left being the non-drive side.
 */

export const SIDES = ["left", "right"] as const;
export type Side = (typeof SIDES)[number];
export type SideMap<T> = Record<Side, T>;

const Length = z.number().finite();
const OptionalLength = Length.nullable().optional();

export const ToothCount = z.number().int().positive();
export const CogList = z.array(ToothCount);

export const SideLengthsInput = z.object({
  left: OptionalLength,
  right: OptionalLength,
});
export type TSideLengthsInput = z.infer<typeof SideLengthsInput>;

export const WheelInput = z.object({
  name: z.string().min(1).nullable().optional(),
  bsd: OptionalLength,
  erd: OptionalLength,
  tireWidth: OptionalLength,
  diameter: OptionalLength,
  centerToFlange: SideLengthsInput.optional(),
  flangeDiameter: SideLengthsInput.optional(),
  spokeHoleDiameter: OptionalLength,
  numSpokes: z.number().int().positive().nullable().optional(),
  numCrosses: z.number().int().nonnegative().nullable().optional(),
  offset: Length.optional(),
});
export type TWheelInput = z.infer<typeof WheelInput>;

export const BicycleInput = z.object({
  name: z.string().min(1).nullable().optional(),
  headTubeAngle: OptionalLength,
  forkRake: OptionalLength,
  crankLength: OptionalLength,
  frontCogs: CogList.optional(),
  rearCogs: CogList.optional(),
  frontWheel: WheelInput.optional(),
  rearWheel: WheelInput.optional(),
});
export type TBicycleInput = z.infer<typeof BicycleInput>;

export interface Wheel {
  readonly name: string | null;
  readonly bsd: number | null;
  /** Effective rim diameter, measured at the nipple seats. */
  readonly erd: number | null;
  readonly tireWidth: number | null;
  readonly diameter: number | null;
  readonly centerToFlange: Readonly<SideMap<number | null>>;
  readonly flangeDiameter: Readonly<SideMap<number | null>>;
  readonly spokeHoleDiameter: number | null;
  readonly numSpokes: number | null;
  readonly numCrosses: number | null;
  /** Rim offset for off-center (asymmetric) rims; positive moves toward the drive side. */
  readonly offset: number;
}

export interface Bicycle {
  readonly name: string | null;
  readonly frontCogs: readonly number[];
  readonly rearCogs: readonly number[];
  readonly crankLength: number | null;
  readonly headTubeAngle: number | null;
  readonly forkRake: number | null;
  readonly frontWheel: Wheel;
  readonly rearWheel: Wheel;
}

export const DEFAULT_SPOKE_HOLE_DIAMETER = 2.6;
export const DEFAULT_NUM_CROSSES = 3;
