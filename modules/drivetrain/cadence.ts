import { mapCogPairTable, type CogPairTable } from "../core/cog-pairs";
import { speedPerHertz } from "../core/drivetrain-constants";
import { invalidInput } from "../core/errors";
import { roundTable, type Digits } from "../core/rounding";
import { gainRatios } from "./ratios";

// Cadence is revolutions per second (Hz); speed is km/h.

const requireFinite = (attribute: string, value: number): void => {
  if (!Number.isFinite(value)) {
    throw invalidInput(attribute, "invalid", `expected a finite number, got ${value}`);
  }
};

export function cadenceToSpeeds(
  cadence: number,
  frontCogs: readonly number[],
  rearCogs: readonly number[],
  crankLength: number,
  wheelDiameter: number,
  digits?: Digits,
): CogPairTable {
  requireFinite("cadence", cadence);
  const gains = gainRatios(frontCogs, rearCogs, crankLength, wheelDiameter);
  return roundTable(
    mapCogPairTable(gains, (gain) => speedPerHertz(crankLength, gain) * cadence),
    digits,
  );
}

export function speedToCadences(
  speed: number,
  frontCogs: readonly number[],
  rearCogs: readonly number[],
  crankLength: number,
  wheelDiameter: number,
  digits?: Digits,
): CogPairTable {
  requireFinite("speed", speed);
  const gains = gainRatios(frontCogs, rearCogs, crankLength, wheelDiameter);
  return roundTable(
    mapCogPairTable(gains, (gain) => speed / speedPerHertz(crankLength, gain)),
    digits,
  );
}
