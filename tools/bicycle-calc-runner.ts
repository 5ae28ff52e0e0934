import { parseBicycle } from "../modules/bicycle/records";
import { reportRegistry } from "../modules/bicycle/reports";
import { isCalculatorError } from "../modules/core/errors";
import { log, logDebug, logWarn, setLogLevel } from "../modules/core/log";
import { defaultReportOptions, type WheelChoice } from "../modules/core/module-registry";
import { readCalculatorConfig } from "../modules/environment/config";

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile: (filePath: string) => Promise<string>;
  env: Record<string, string | undefined>;
};

export type CliArgs = {
  report?: string;
  bicyclePath?: string;
  rawJson?: string;
  digits?: number;
  cadence?: number;
  speed?: number;
  wheel?: WheelChoice;
  ambidextrous: boolean;
  json: boolean;
  help: boolean;
};

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_BAD_INPUT = 2;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = [
  "usage: bicycle-calc <report> [--bicycle file.json | --params json] [options]",
  "",
  "options:",
  "  --digits n        round reported values to n decimal places",
  "  --cadence hz      pedal revolutions per second (cadence-to-speeds)",
  "  --speed kph       road speed in km/h (speed-to-cadences)",
  "  --wheel front|rear  wheel for spoke-length and approx-diameter (default rear)",
  "  --ambidextrous    skid with either foot forward (skid-patches)",
  "  --json            print {report, value} as JSON",
  "",
  "run `bicycle-calc list` for the available reports",
].join("\n");

const takeValue = (args: string[], i: number, flag: string): string => {
  const value = args[i + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new CliUsageError(`${flag} needs a value`);
  }
  return value;
};

const parseNumberFlag = (flag: string, raw: string): number => {
  const parsed = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(parsed)) {
    throw new CliUsageError(`${flag} expects a number, got "${raw}"`);
  }
  return parsed;
};

export function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = { ambidextrous: false, json: false, help: false };
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (token === "-h" || token === "--help") {
      parsed.help = true;
    } else if (token === "-b" || token === "--bicycle") {
      parsed.bicyclePath = takeValue(args, i, token);
      i += 1;
    } else if (token === "--params") {
      parsed.rawJson = takeValue(args, i, token);
      i += 1;
    } else if (token === "--digits") {
      parsed.digits = parseNumberFlag(token, takeValue(args, i, token));
      i += 1;
    } else if (token === "--cadence") {
      parsed.cadence = parseNumberFlag(token, takeValue(args, i, token));
      i += 1;
    } else if (token === "--speed") {
      parsed.speed = parseNumberFlag(token, takeValue(args, i, token));
      i += 1;
    } else if (token === "--wheel") {
      const wheel = takeValue(args, i, token);
      if (wheel !== "front" && wheel !== "rear") {
        throw new CliUsageError(`--wheel expects front or rear, got "${wheel}"`);
      }
      parsed.wheel = wheel;
      i += 1;
    } else if (token === "--ambidextrous") {
      parsed.ambidextrous = true;
    } else if (token === "--json") {
      parsed.json = true;
    } else if (token.startsWith("-")) {
      throw new CliUsageError(`unknown option ${token}`);
    } else if (parsed.report === undefined) {
      parsed.report = token;
    } else {
      throw new CliUsageError(`unexpected argument ${token}`);
    }
  }
  return parsed;
}

async function loadBicycleJson(args: CliArgs, io: CliIo): Promise<unknown> {
  if (args.bicyclePath) {
    if (args.rawJson) {
      logWarn(`--params ignored; reading ${args.bicyclePath}`);
    }
    const raw: unknown = JSON.parse(await io.readFile(args.bicyclePath));
    log(`loaded ${args.bicyclePath}`);
    return raw;
  }
  if (args.rawJson) {
    return JSON.parse(args.rawJson);
  }
  return {};
}

const listReports = (): string => {
  const names = reportRegistry.getAvailable();
  const width = Math.max(...names.map((name) => name.length));
  return names.map((name) => `${name.padEnd(width + 2)}${reportRegistry.get(name).description}`).join("\n");
};

async function execute(args: CliArgs, io: CliIo): Promise<void> {
  const config = readCalculatorConfig(io.env);
  setLogLevel(config.logLevel);

  if (args.report === "list") {
    io.stdout(listReports());
    return;
  }
  if (!args.report || !reportRegistry.has(args.report)) {
    throw new CliUsageError(
      args.report ? `unknown report "${args.report}" (try \`bicycle-calc list\`)` : "missing report name",
    );
  }

  const raw = await loadBicycleJson(args, io);
  const label = args.bicyclePath ?? "bicycle";
  const bicycle = parseBicycle(raw, label);
  logDebug(`running ${args.report} on ${bicycle.name ?? label}`);

  const options = defaultReportOptions({
    digits: args.digits ?? config.digits,
    cadence: args.cadence ?? null,
    speed: args.speed ?? null,
    wheel: args.wheel ?? "rear",
    ambidextrous: args.ambidextrous || config.ambidextrous,
  });
  const result = reportRegistry.run(args.report, bicycle, options);

  io.stdout(args.json ? JSON.stringify({ report: args.report, value: result.value }, null, 2) : result.text);
}

/**
 * Runs one CLI invocation and returns its exit code: 0 on success, 2 when the
 * bicycle record is unusable for the report, 1 for usage and other failures.
 */
export async function runBicycleCalc(argv: string[], io: CliIo): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    io.stderr(`error: ${err instanceof Error ? err.message : String(err)}\n\n${USAGE}`);
    return EXIT_FAILURE;
  }
  if (args.help) {
    io.stdout(USAGE);
    return EXIT_OK;
  }

  try {
    await execute(args, io);
    return EXIT_OK;
  } catch (err) {
    if (isCalculatorError(err)) {
      io.stderr(`error: ${err.message}`);
      return EXIT_BAD_INPUT;
    }
    if (err instanceof CliUsageError) {
      io.stderr(`error: ${err.message}\n\n${USAGE}`);
      return EXIT_FAILURE;
    }
    io.stderr(`error: ${err instanceof Error ? err.message : String(err)}`);
    return EXIT_FAILURE;
  }
}
