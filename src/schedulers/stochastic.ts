import { addDays } from "../datetime.utils.js";
import { priorityScore } from "../model.js";
import type { Config, Submission } from "../types.js";
import {
  ConstructiveScheduler,
  firstLegalPlacement,
  legalDays,
  processingOrder,
  type Placement,
  type SchedulingContext,
} from "./base.js";
import { DEFAULT_SEED, mulberry32, pickIndex } from "./random.js";
import type { StochasticSchedulerOptions } from "./scheduler.types.js";

/**
 * Greedy with seeded noise.
 *
 * Priorities get uniform noise in `±randomnessFactor`, which reshuffles
 * near-equal submissions. Each submission then starts on a day picked
 * uniformly among the legal days from its first legal day up to
 * `jitterDays` after it. The same seed gives the same schedule.
 *
 * @category Schedulers
 */
export class StochasticScheduler extends ConstructiveScheduler {
  override readonly strategy = "stochastic";
  readonly seed: number;
  #random: () => number = Math.random;

  constructor(options: StochasticSchedulerOptions = {}) {
    super(options);
    this.seed = options.seed ?? DEFAULT_SEED;
  }

  override schedule(config: Config) {
    this.#random = mulberry32(this.seed);
    return super.schedule(config);
  }

  protected override order(config: Config): Submission[] {
    const spread = config.schedulingOptions.randomnessFactor;
    const noisy = new Map(
      config.submissions.map((s) => [
        s.id,
        priorityScore(s, config) + (this.#random() * 2 - 1) * spread,
      ]),
    );
    return processingOrder(config, (s) => noisy.get(s.id) ?? 0);
  }

  protected override choosePlacement(
    context: SchedulingContext,
    submission: Submission,
  ): Placement | undefined {
    const first = firstLegalPlacement(context, submission);
    if (!first) return undefined;

    const last = addDays(first.startDate, context.config.schedulingOptions.jitterDays);
    const options: Placement[] = [];
    for (const placement of legalDays(context, submission, first.venueIndex, first.startDate)) {
      if (placement.startDate > last) break;
      options.push(placement);
    }
    return options[pickIndex(this.#random, options.length)] ?? first;
  }
}
