import { priorityTopologicalOrder } from "../model.js";
import type { Config, Submission } from "../types.js";
import {
  ConstructiveScheduler,
  firstLegalPlacement,
  type Placement,
  type SchedulingContext,
} from "./base.js";
import type { StochasticSchedulerOptions } from "./scheduler.types.js";

export const DEFAULT_SEED = 42;

/**
 * Seeded mulberry32 generator returning floats in `[0, 1)`.
 */
export function mulberry32(seed: number): () => number {
  let a = seed | 0;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  };
}

/**
 * Uniform integer in `[0, size)`.
 */
export function pickIndex(random: () => number, size: number): number {
  return Math.min(size - 1, Math.floor(random() * size));
}

/**
 * Baseline that processes ready submissions in a seeded random order and
 * puts each on its first legal day.
 *
 * Useful as a floor when comparing strategies; the same seed gives the same
 * schedule.
 *
 * @category Schedulers
 */
export class RandomScheduler extends ConstructiveScheduler {
  override readonly strategy = "random";
  readonly seed: number;

  constructor(options: StochasticSchedulerOptions = {}) {
    super(options);
    this.seed = options.seed ?? DEFAULT_SEED;
  }

  protected override order(config: Config): Submission[] {
    const random = mulberry32(this.seed);
    const keys = new Map(config.submissions.map((s) => [s.id, random()]));
    return priorityTopologicalOrder(config, (a, b) => (keys.get(a.id) ?? 0) - (keys.get(b.id) ?? 0));
  }

  protected override choosePlacement(
    context: SchedulingContext,
    submission: Submission,
  ): Placement | undefined {
    return firstLegalPlacement(context, submission);
  }
}
