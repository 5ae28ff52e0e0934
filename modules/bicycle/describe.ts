import type { Bicycle, SideMap, Wheel } from "../../shared/bicycle-schema";
import { cogPairEntries, type CogPairTable } from "../core/cog-pairs";
import type { SteeringGeometry } from "../geometry/steering";
import { bicycleLabel, wheelLabel } from "./bicycle-calculator";

type Printable = number | string | null | readonly number[] | Readonly<SideMap<number | null>>;

const formatValue = (value: Printable): string => {
  if (value === null) return "null";
  if (typeof value === "number" || typeof value === "string") return String(value);
  if (Array.isArray(value)) return `[${value.join(", ")}]`;
  if ("left" in value) return `{left: ${formatValue(value.left)}, right: ${formatValue(value.right)}}`;
  return String(value);
};

const heading = (title: string, rule: string): string[] => [title, rule.repeat(title.length)];

const WHEEL_KEYS = [
  "bsd",
  "centerToFlange",
  "diameter",
  "erd",
  "flangeDiameter",
  "numCrosses",
  "numSpokes",
  "offset",
  "spokeHoleDiameter",
  "tireWidth",
] as const satisfies ReadonlyArray<keyof Wheel>;

const BICYCLE_KEYS = ["frontCogs", "rearCogs", "crankLength", "headTubeAngle", "forkRake"] as const satisfies ReadonlyArray<
  keyof Bicycle
>;

export function describeWheel(wheel: Wheel): string {
  const lines = heading(wheelLabel(wheel), "-");
  for (const key of WHEEL_KEYS) {
    lines.push(`${key} = ${formatValue(wheel[key])}`);
  }
  return lines.join("\n");
}

export function describeBicycle(bicycle: Bicycle): string {
  const lines = heading(bicycleLabel(bicycle), "=");
  for (const key of BICYCLE_KEYS) {
    lines.push(`${key} = ${formatValue(bicycle[key])}`);
  }
  lines.push("", `frontWheel = ${describeWheel(bicycle.frontWheel)}`);
  lines.push("", `rearWheel = ${describeWheel(bicycle.rearWheel)}`);
  return lines.join("\n");
}

export function formatCogPairTable(table: CogPairTable): string {
  return cogPairEntries(table)
    .map(({ front, rear, value }) => `${front} x ${rear} = ${value}`)
    .join("\n");
}

export function formatSides(sides: SideMap<number>): string {
  return `left = ${sides.left}\nright = ${sides.right}`;
}

export function formatSteering([t, mechanicalTrail, wheelFlop]: SteeringGeometry): string {
  return [`trail = ${t}`, `mechanicalTrail = ${mechanicalTrail}`, `wheelFlop = ${wheelFlop}`].join("\n");
}
