import {
  BicycleInput,
  DEFAULT_NUM_CROSSES,
  DEFAULT_SPOKE_HOLE_DIAMETER,
  WheelInput,
  type Bicycle,
  type SideMap,
  type TBicycleInput,
  type TSideLengthsInput,
  type TWheelInput,
  type Wheel,
} from "../../shared/bicycle-schema";
import { InvalidInputError } from "../core/errors";
import { toRecordIssues } from "./validator";

const orNull = <T>(value: T | null | undefined): T | null => value ?? null;

// A fresh map per call; records never share a default object.
const buildSides = (input?: TSideLengthsInput): Readonly<SideMap<number | null>> =>
  Object.freeze({
    left: orNull(input?.left),
    right: orNull(input?.right),
  });

const sortedCogs = (cogs?: readonly number[]): readonly number[] =>
  Object.freeze([...(cogs ?? [])].sort((a, b) => a - b));

export const createWheel = (input: TWheelInput = {}): Wheel =>
  Object.freeze({
    name: orNull(input.name),
    bsd: orNull(input.bsd),
    erd: orNull(input.erd),
    tireWidth: orNull(input.tireWidth),
    diameter: orNull(input.diameter),
    centerToFlange: buildSides(input.centerToFlange),
    flangeDiameter: buildSides(input.flangeDiameter),
    spokeHoleDiameter: input.spokeHoleDiameter === undefined ? DEFAULT_SPOKE_HOLE_DIAMETER : input.spokeHoleDiameter,
    numSpokes: orNull(input.numSpokes),
    numCrosses: input.numCrosses === undefined ? DEFAULT_NUM_CROSSES : input.numCrosses,
    offset: input.offset ?? 0,
  });

export const createBicycle = (input: TBicycleInput = {}): Bicycle =>
  Object.freeze({
    name: orNull(input.name),
    frontCogs: sortedCogs(input.frontCogs),
    rearCogs: sortedCogs(input.rearCogs),
    crankLength: orNull(input.crankLength),
    headTubeAngle: orNull(input.headTubeAngle),
    forkRake: orNull(input.forkRake),
    frontWheel: createWheel(input.frontWheel),
    rearWheel: createWheel(input.rearWheel),
  });

export const wheelToInput = (wheel: Wheel): TWheelInput => ({
  name: wheel.name,
  bsd: wheel.bsd,
  erd: wheel.erd,
  tireWidth: wheel.tireWidth,
  diameter: wheel.diameter,
  centerToFlange: { ...wheel.centerToFlange },
  flangeDiameter: { ...wheel.flangeDiameter },
  spokeHoleDiameter: wheel.spokeHoleDiameter,
  numSpokes: wheel.numSpokes,
  numCrosses: wheel.numCrosses,
  offset: wheel.offset,
});

export const bicycleToInput = (bicycle: Bicycle): TBicycleInput => ({
  name: bicycle.name,
  frontCogs: [...bicycle.frontCogs],
  rearCogs: [...bicycle.rearCogs],
  crankLength: bicycle.crankLength,
  headTubeAngle: bicycle.headTubeAngle,
  forkRake: bicycle.forkRake,
  frontWheel: wheelToInput(bicycle.frontWheel),
  rearWheel: wheelToInput(bicycle.rearWheel),
});

/** Deep copy, with `overrides` applied on top. The source record is untouched. */
export const copyWheel = (wheel: Wheel, overrides: TWheelInput = {}): Wheel =>
  createWheel({ ...wheelToInput(wheel), ...overrides });

export const copyBicycle = (bicycle: Bicycle, overrides: TBicycleInput = {}): Bicycle =>
  createBicycle({ ...bicycleToInput(bicycle), ...overrides });

/** Parses the JSON form of a bicycle record. */
export function parseBicycle(raw: unknown, label = "bicycle"): Bicycle {
  const parsed = BicycleInput.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError(toRecordIssues(parsed.error), label);
  }
  return createBicycle(parsed.data);
}

export function parseWheel(raw: unknown, label = "wheel"): Wheel {
  const parsed = WheelInput.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError(toRecordIssues(parsed.error), label);
  }
  return createWheel(parsed.data);
}
