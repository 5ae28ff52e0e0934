export * from "../shared/bicycle-schema";
export * from "./core/cog-pairs";
export * from "./core/drivetrain-constants";
export * from "./core/errors";
export * from "./core/module-registry";
export * from "./core/rounding";
export { log, logDebug, logWarn, setLogLevel, type LogLevel } from "./core/log";
export * from "./drivetrain/cadence";
export * from "./drivetrain/derailer";
export * from "./drivetrain/ratios";
export * from "./drivetrain/skid-patches";
export * from "./geometry/steering";
export * from "./wheel/diameter";
export * from "./wheel/spoke-length";
export * from "./bicycle/records";
export * from "./bicycle/validator";
export * from "./bicycle/bicycle-calculator";
export * from "./bicycle/describe";
export * from "./bicycle/reports";
export * from "./environment/config";
