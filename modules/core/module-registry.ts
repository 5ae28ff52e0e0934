/**
 * Report registry for the calculator front ends.
 * Maps a report name to a synchronous calculation over a bicycle record.
 */

import type { Bicycle, SideMap } from "../../shared/bicycle-schema";
import type { CogPairTable } from "./cog-pairs";

export type WheelChoice = "front" | "rear";

export interface ReportOptions {
  digits: number | null;
  /** Revolutions per second. */
  cadence: number | null;
  /** km/h. */
  speed: number | null;
  wheel: WheelChoice;
  ambidextrous: boolean;
}

export type ReportValue = number | string | readonly number[] | CogPairTable | SideMap<number>;

export interface ReportResult {
  value: ReportValue;
  text: string;
}

export interface CalculatorModule {
  name: string;
  description: string;
  run: (bicycle: Bicycle, options: ReportOptions) => ReportResult;
}

export const defaultReportOptions = (overrides: Partial<ReportOptions> = {}): ReportOptions => ({
  digits: null,
  cadence: null,
  speed: null,
  wheel: "rear",
  ambidextrous: false,
  ...overrides,
});

export class ModuleRegistry {
  private modules = new Map<string, CalculatorModule>();

  register(module: CalculatorModule): void {
    if (this.modules.has(module.name)) {
      throw new Error(`Module ${module.name} is already registered`);
    }
    this.modules.set(module.name, module);
  }

  has(name: string): boolean {
    return this.modules.has(name);
  }

  getAvailable(): string[] {
    return Array.from(this.modules.keys());
  }

  get(name: string): CalculatorModule {
    const module = this.modules.get(name);
    if (!module) {
      throw new Error(`Module ${name} not found (available: ${this.getAvailable().join(", ")})`);
    }
    return module;
  }

  run(name: string, bicycle: Bicycle, options: ReportOptions = defaultReportOptions()): ReportResult {
    return this.get(name).run(bicycle, options);
  }
}
