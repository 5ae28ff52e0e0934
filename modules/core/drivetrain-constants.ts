/**
 * Drivetrain constants and unit helpers.
 * Lengths are millimeters, angles degrees, cadence revolutions per second.
 */

export const DRIVETRAIN_CONSTANTS = {
  PI: Math.PI,
  TWO_PI: 2 * Math.PI,

  // Unit conversions
  DEG_TO_RAD: Math.PI / 180,
  MM_PER_S_TO_KPH: 3600 / 1e6, // mm/s -> km/h

  // |sin α| below this counts as a head tube lying along the ground
  SIN_EPSILON: 1e-12,
} as const;

export function degreesToRadians(degrees: number): number {
  return degrees * DRIVETRAIN_CONSTANTS.DEG_TO_RAD;
}

/**
 * Road speed (km/h) produced by one pedal revolution per second at the given
 * gain ratio: the pedal circle travels 2π·L, the wheel rim `gain` times that.
 */
export function speedPerHertz(crankLength: number, gainRatio: number): number {
  return DRIVETRAIN_CONSTANTS.TWO_PI * crankLength * gainRatio * DRIVETRAIN_CONSTANTS.MM_PER_S_TO_KPH;
}
