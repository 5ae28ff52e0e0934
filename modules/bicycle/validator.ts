import { z } from "zod";
import { CogList } from "../../shared/bicycle-schema";
import type { Bicycle, Wheel } from "../../shared/bicycle-schema";
import { InvalidInputError, type RecordIssue } from "../core/errors";
import type { SpokeGeometry } from "../wheel/spoke-length";

/**
 * Upfront completeness checks. Each calculation has its own requirement
 * schema; a passing check hands back the typed inputs that calculation reads.
 */

export type RecordCheck<T> = { ok: true; value: T } | { ok: false; issues: RecordIssue[] };

const Finite = z.number().finite();
const PositiveLength = Finite.positive();
const NonNegativeLength = Finite.nonnegative();
const Cogs = CogList.min(1);

const CogRequirements = z.object({
  frontCogs: Cogs,
  rearCogs: Cogs,
});

// Crank length is only checked for presence; a zero crank surfaces from the
// calculator as a domain error.
const GearingRequirements = CogRequirements.extend({
  crankLength: Finite,
  rearWheel: z.object({ diameter: PositiveLength }),
});

const TrailRequirements = z.object({
  headTubeAngle: Finite,
  forkRake: Finite,
  frontWheel: z.object({ diameter: PositiveLength }),
});

const SpokeRequirements = z.object({
  centerToFlange: z.object({ left: NonNegativeLength, right: NonNegativeLength }),
  flangeDiameter: z.object({ left: PositiveLength, right: PositiveLength }),
  spokeHoleDiameter: NonNegativeLength,
  erd: PositiveLength,
  offset: Finite,
  numSpokes: z
    .number()
    .int()
    .positive()
    .refine((n) => n % 2 === 0, { message: "must be even", params: { reason: "odd" } }),
  numCrosses: z.number().int().nonnegative(),
});

const DiameterRequirements = z.object({
  bsd: PositiveLength,
  tireWidth: NonNegativeLength,
});

export type CogInputs = {
  frontCogs: number[];
  rearCogs: number[];
};

export type GearingInputs = CogInputs & {
  crankLength: number;
  wheelDiameter: number;
};

export type TrailInputs = {
  headTubeAngle: number;
  forkRake: number;
  wheelDiameter: number;
};

export type DiameterInputs = z.infer<typeof DiameterRequirements>;

export const toRecordIssues = (error: z.ZodError): RecordIssue[] =>
  error.issues.map((issue): RecordIssue => {
    const attribute = issue.path.join(".") || "(record)";
    switch (issue.code) {
      case z.ZodIssueCode.invalid_type:
        return issue.received === "null" || issue.received === "undefined"
          ? { attribute, reason: "missing" }
          : { attribute, reason: "invalid", detail: issue.message };
      case z.ZodIssueCode.too_small:
        return issue.type === "array"
          ? { attribute, reason: "empty" }
          : { attribute, reason: "out_of_range", detail: issue.message };
      case z.ZodIssueCode.custom:
        return issue.params?.reason === "odd"
          ? { attribute, reason: "odd" }
          : { attribute, reason: "invalid", detail: issue.message };
      default:
        return { attribute, reason: "invalid", detail: issue.message };
    }
  });

const runCheck = <Out, T>(
  schema: z.ZodType<Out, z.ZodTypeDef, unknown>,
  record: unknown,
  extract: (data: Out) => T,
): RecordCheck<T> => {
  const parsed = schema.safeParse(record);
  return parsed.success
    ? { ok: true, value: extract(parsed.data) }
    : { ok: false, issues: toRecordIssues(parsed.error) };
};

export const checkCogs = (bicycle: Bicycle): RecordCheck<CogInputs> =>
  runCheck(CogRequirements, bicycle, (data) => data);

export const checkGearing = (bicycle: Bicycle): RecordCheck<GearingInputs> =>
  runCheck(GearingRequirements, bicycle, (data) => ({
    frontCogs: data.frontCogs,
    rearCogs: data.rearCogs,
    crankLength: data.crankLength,
    wheelDiameter: data.rearWheel.diameter,
  }));

export const checkTrail = (bicycle: Bicycle): RecordCheck<TrailInputs> =>
  runCheck(TrailRequirements, bicycle, (data) => ({
    headTubeAngle: data.headTubeAngle,
    forkRake: data.forkRake,
    wheelDiameter: data.frontWheel.diameter,
  }));

export const checkSpokeGeometry = (wheel: Wheel): RecordCheck<SpokeGeometry> =>
  runCheck(SpokeRequirements, wheel, (data) => data);

export const checkDiameterInputs = (wheel: Wheel): RecordCheck<DiameterInputs> =>
  runCheck(DiameterRequirements, wheel, (data) => data);

export function assertValid<T>(check: RecordCheck<T>, label: string | null = null): T {
  if (!check.ok) {
    throw new InvalidInputError(check.issues, label);
  }
  return check.value;
}
