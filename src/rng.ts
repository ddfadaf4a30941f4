import { InvalidArgumentError } from "./errors";
import type { RandomSource } from "./types/types";

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

/** Reproducible LCG source for `--seed` runs and tests. */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed = 123456789) {
    this.state = seed >>> 0;
  }

  nextU32(): number {
    this.state = (1664525 * this.state + 1013904223) >>> 0;
    return this.state;
  }

  next(): number {
    return this.nextU32() / 0x1_0000_0000;
  }
}

/** Uniform integer in [min, max], both inclusive. */
export const randomInt = (
  rng: RandomSource,
  min: number,
  max: number,
): number => {
  if (!Number.isInteger(min) || !Number.isInteger(max)) {
    throw new InvalidArgumentError("min/max must be integers");
  }
  if (max < min) {
    throw new InvalidArgumentError(`max (${max}) must be >= min (${min})`);
  }
  const span = max - min + 1;
  return min + Math.min(Math.floor(rng.next() * span), span - 1);
};

export const randomUniform = (
  rng: RandomSource,
  min: number,
  max: number,
): number => min + rng.next() * (max - min);

export const randomChoice = <T>(rng: RandomSource, items: readonly T[]): T => {
  if (items.length === 0) {
    throw new InvalidArgumentError("cannot choose from an empty list");
  }
  return items[randomInt(rng, 0, items.length - 1)];
};
