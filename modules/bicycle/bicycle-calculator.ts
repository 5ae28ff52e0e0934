import type { Bicycle, Wheel } from "../../shared/bicycle-schema";
import type { CogPairTable } from "../core/cog-pairs";
import type { Digits } from "../core/rounding";
import { cadenceToSpeeds, speedToCadences } from "../drivetrain/cadence";
import { derailerCapacity } from "../drivetrain/derailer";
import { gainRatios, gearRatios } from "../drivetrain/ratios";
import { numSkidPatches } from "../drivetrain/skid-patches";
import { trail, type SteeringGeometry } from "../geometry/steering";
import { approxWheelDiameter } from "../wheel/diameter";
import { spokeLength, type SpokeLengths } from "../wheel/spoke-length";
import {
  assertValid,
  checkCogs,
  checkDiameterInputs,
  checkGearing,
  checkSpokeGeometry,
  checkTrail,
} from "./validator";

// Record-level entry points: validate the record once, then hand the typed
// inputs to the calculator. The front wheel drives steering, the rear wheel gearing.

export const bicycleLabel = (bicycle: Bicycle): string => bicycle.name ?? "Nameless bicycle";
export const wheelLabel = (wheel: Wheel): string => wheel.name ?? "Nameless wheel";

export function bicycleDerailerCapacity(bicycle: Bicycle): number {
  const { frontCogs, rearCogs } = assertValid(checkCogs(bicycle), bicycleLabel(bicycle));
  return derailerCapacity(frontCogs, rearCogs);
}

export function bicycleGearRatios(bicycle: Bicycle, digits?: Digits): CogPairTable {
  const { frontCogs, rearCogs } = assertValid(checkCogs(bicycle), bicycleLabel(bicycle));
  return gearRatios(frontCogs, rearCogs, digits);
}

export function bicycleGainRatios(bicycle: Bicycle, digits?: Digits): CogPairTable {
  const g = assertValid(checkGearing(bicycle), bicycleLabel(bicycle));
  return gainRatios(g.frontCogs, g.rearCogs, g.crankLength, g.wheelDiameter, digits);
}

export function bicycleCadenceToSpeeds(bicycle: Bicycle, cadence: number, digits?: Digits): CogPairTable {
  const g = assertValid(checkGearing(bicycle), bicycleLabel(bicycle));
  return cadenceToSpeeds(cadence, g.frontCogs, g.rearCogs, g.crankLength, g.wheelDiameter, digits);
}

export function bicycleSpeedToCadences(bicycle: Bicycle, speed: number, digits?: Digits): CogPairTable {
  const g = assertValid(checkGearing(bicycle), bicycleLabel(bicycle));
  return speedToCadences(speed, g.frontCogs, g.rearCogs, g.crankLength, g.wheelDiameter, digits);
}

export function bicycleSkidPatches(bicycle: Bicycle, ambidextrous = false): CogPairTable {
  const { frontCogs, rearCogs } = assertValid(checkCogs(bicycle), bicycleLabel(bicycle));
  return numSkidPatches(frontCogs, rearCogs, ambidextrous);
}

export function bicycleTrail(bicycle: Bicycle, digits?: Digits): SteeringGeometry {
  const t = assertValid(checkTrail(bicycle), bicycleLabel(bicycle));
  return trail(t.headTubeAngle, t.forkRake, t.wheelDiameter, digits);
}

export function wheelSpokeLength(wheel: Wheel, digits?: Digits): SpokeLengths {
  return spokeLength(assertValid(checkSpokeGeometry(wheel), wheelLabel(wheel)), digits);
}

export function wheelApproxDiameter(wheel: Wheel): number {
  const { bsd, tireWidth } = assertValid(checkDiameterInputs(wheel), wheelLabel(wheel));
  return approxWheelDiameter(bsd, tireWidth);
}
