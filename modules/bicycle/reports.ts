import type { Bicycle, Wheel } from "../../shared/bicycle-schema";
import type { CogPairTable } from "../core/cog-pairs";
import { invalidInput } from "../core/errors";
import { ModuleRegistry, type CalculatorModule, type ReportOptions, type ReportResult } from "../core/module-registry";
import { roundTo } from "../core/rounding";
import {
  bicycleCadenceToSpeeds,
  bicycleDerailerCapacity,
  bicycleGainRatios,
  bicycleGearRatios,
  bicycleSkidPatches,
  bicycleSpeedToCadences,
  bicycleTrail,
  wheelApproxDiameter,
  wheelSpokeLength,
} from "./bicycle-calculator";
import { describeBicycle, formatCogPairTable, formatSides, formatSteering } from "./describe";

const tableResult = (table: CogPairTable): ReportResult => ({
  value: table,
  text: formatCogPairTable(table),
});

const scalarResult = (value: number): ReportResult => ({ value, text: String(value) });

const pickWheel = (bicycle: Bicycle, options: ReportOptions): Wheel =>
  options.wheel === "front" ? bicycle.frontWheel : bicycle.rearWheel;

const requireOption = (name: "cadence" | "speed", value: number | null): number => {
  if (value === null) {
    throw invalidInput(name, "missing", `pass --${name}`);
  }
  return value;
};

export const calculatorModules: CalculatorModule[] = [
  {
    name: "derailer-capacity",
    description: "Chain wrap the rear derailer must take up",
    run: (bicycle) => scalarResult(bicycleDerailerCapacity(bicycle)),
  },
  {
    name: "gear-ratios",
    description: "Front teeth over rear teeth for every cog pair",
    run: (bicycle, options) => tableResult(bicycleGearRatios(bicycle, options.digits)),
  },
  {
    name: "gain-ratios",
    description: "Wheel travel per pedal travel for every cog pair (rear wheel)",
    run: (bicycle, options) => tableResult(bicycleGainRatios(bicycle, options.digits)),
  },
  {
    name: "cadence-to-speeds",
    description: "Road speed (km/h) at --cadence revolutions per second",
    run: (bicycle, options) =>
      tableResult(bicycleCadenceToSpeeds(bicycle, requireOption("cadence", options.cadence), options.digits)),
  },
  {
    name: "speed-to-cadences",
    description: "Cadence (revolutions per second) at --speed km/h",
    run: (bicycle, options) =>
      tableResult(bicycleSpeedToCadences(bicycle, requireOption("speed", options.speed), options.digits)),
  },
  {
    name: "skid-patches",
    description: "Skid patches worn into a fixed-gear rear tire",
    run: (bicycle, options) => tableResult(bicycleSkidPatches(bicycle, options.ambidextrous)),
  },
  {
    name: "trail",
    description: "Trail, mechanical trail and wheel flop (front wheel)",
    run: (bicycle, options) => {
      const geometry = bicycleTrail(bicycle, options.digits);
      return { value: geometry, text: formatSteering(geometry) };
    },
  },
  {
    name: "spoke-length",
    description: "Left and right spoke lengths for --wheel",
    run: (bicycle, options) => {
      const lengths = wheelSpokeLength(pickWheel(bicycle, options), options.digits);
      return { value: lengths, text: formatSides(lengths) };
    },
  },
  {
    name: "approx-diameter",
    description: "Bead seat diameter plus twice the tire width for --wheel",
    run: (bicycle, options) => {
      const diameter = wheelApproxDiameter(pickWheel(bicycle, options));
      return scalarResult(options.digits === null ? diameter : roundTo(diameter, options.digits));
    },
  },
  {
    name: "describe",
    description: "Print the bicycle record",
    run: (bicycle) => {
      const text = describeBicycle(bicycle);
      return { value: text, text };
    },
  },
];

export const createReportRegistry = (): ModuleRegistry => {
  const registry = new ModuleRegistry();
  for (const module of calculatorModules) {
    registry.register(module);
  }
  return registry;
};

export const reportRegistry = createReportRegistry();
