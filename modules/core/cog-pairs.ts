import { InvalidInputError, type RecordIssue } from "./errors";

export type CogPair = readonly [front: number, rear: number];
export type CogPairKey = `${number}:${number}`;

/** Per-pair results, keyed by `"front:rear"`. */
export type CogPairTable<T = number> = Record<CogPairKey, T>;

export type CogPairEntry<T = number> = {
  front: number;
  rear: number;
  value: T;
};

export const cogPairKey = (front: number, rear: number): CogPairKey => `${front}:${rear}`;

const KEY_PATTERN = /^(\d+):(\d+)$/;

export function parseCogPairKey(key: string): CogPair {
  const match = KEY_PATTERN.exec(key);
  if (!match) {
    throw new InvalidInputError([{ attribute: "cogPairKey", reason: "invalid", detail: `"${key}"` }]);
  }
  return [Number(match[1]), Number(match[2])];
}

const cogListIssues = (attribute: string, cogs: readonly number[]): RecordIssue[] => {
  if (cogs.length === 0) {
    return [{ attribute, reason: "empty" }];
  }
  const bad = cogs.find((teeth) => !Number.isInteger(teeth) || teeth <= 0);
  return bad === undefined
    ? []
    : [{ attribute, reason: "out_of_range", detail: `${bad} is not a positive tooth count` }];
};

/** Throws InvalidInputError naming every unusable cog list. */
export function requireCogs(frontCogs: readonly number[], rearCogs: readonly number[]): void {
  const issues = [...cogListIssues("frontCogs", frontCogs), ...cogListIssues("rearCogs", rearCogs)];
  if (issues.length > 0) {
    throw new InvalidInputError(issues);
  }
}

/**
 * Every (front, rear) combination, each exactly once. Repeated tooth counts
 * within a list collapse.
 */
export function enumerateCogPairs(frontCogs: readonly number[], rearCogs: readonly number[]): CogPair[] {
  requireCogs(frontCogs, rearCogs);
  const fronts = Array.from(new Set(frontCogs));
  const rears = Array.from(new Set(rearCogs));
  const pairs: CogPair[] = [];
  for (const front of fronts) {
    for (const rear of rears) {
      pairs.push([front, rear]);
    }
  }
  return pairs;
}

export function tabulateCogPairs<T>(
  frontCogs: readonly number[],
  rearCogs: readonly number[],
  compute: (front: number, rear: number) => T,
): CogPairTable<T> {
  const table: CogPairTable<T> = {};
  for (const [front, rear] of enumerateCogPairs(frontCogs, rearCogs)) {
    table[cogPairKey(front, rear)] = compute(front, rear);
  }
  return table;
}

export function mapCogPairTable<T, U>(table: CogPairTable<T>, fn: (value: T, front: number, rear: number) => U): CogPairTable<U> {
  const out: CogPairTable<U> = {};
  for (const { front, rear, value } of cogPairEntries(table)) {
    out[cogPairKey(front, rear)] = fn(value, front, rear);
  }
  return out;
}

/** Entries ordered by front cog, then rear cog. */
export function cogPairEntries<T>(table: CogPairTable<T>): CogPairEntry<T>[] {
  const entries: CogPairEntry<T>[] = [];
  for (const [key, value] of Object.entries<T>(table)) {
    const [front, rear] = parseCogPairKey(key);
    entries.push({ front, rear, value });
  }
  return entries.sort((a, b) => a.front - b.front || a.rear - b.rear);
}
