import type { Scenario } from "./types/types";

export const SCENARIO_BY_KEY: Readonly<Record<string, Scenario>> = {
  "1": "AtomicFrame",
  "2": "FragmentedFrame",
  "3": "IncompleteFrame",
  "4": "CoalescedFrames",
};

export const SCENARIOS: readonly Scenario[] = Object.values(SCENARIO_BY_KEY);

export const RESPONSE_CODE_CYCLE: readonly number[] = [0, 1, 2, 99];

// Bytes withheld by IncompleteFrame, drawn uniformly per delivery.
export const INCOMPLETE_WITHHOLD_MIN = 1;
export const INCOMPLETE_WITHHOLD_MAX = 12;

export const isScenario = (value: unknown): value is Scenario =>
  typeof value === "string" && SCENARIOS.some(s => s === value);

/**
 * Map a command line to a scenario: a key `1`-`4` or a scenario name
 * (case-insensitive).
 */
export const resolveScenario = (input: string): Scenario | undefined => {
  const key = input.trim();
  if (Object.prototype.hasOwnProperty.call(SCENARIO_BY_KEY, key)) {
    return SCENARIO_BY_KEY[key];
  }
  const lowered = key.toLowerCase();
  return SCENARIOS.find(s => s.toLowerCase() === lowered);
};

/** Response code for the n-th accepted command (1-based). */
export const responseCodeFor = (commandCount: number): number => {
  const len = RESPONSE_CODE_CYCLE.length;
  return RESPONSE_CODE_CYCLE[(((commandCount - 1) % len) + len) % len];
};
