import type { Submission } from "../types.js";
import {
  ConstructiveScheduler,
  firstLegalPlacement,
  type Placement,
  type SchedulingContext,
} from "./base.js";

/**
 * Places each submission, in priority order, on the first day the
 * placement oracle accepts. Decisions are never revisited.
 *
 * @example
 * ```typescript
 * const schedule = new GreedyScheduler().schedule(config);
 * const unplaced = config.submissions.filter((s) => !schedule.has(s.id));
 * ```
 *
 * @category Schedulers
 */
export class GreedyScheduler extends ConstructiveScheduler {
  override readonly strategy = "greedy";

  protected override choosePlacement(
    context: SchedulingContext,
    submission: Submission,
  ): Placement | undefined {
    return firstLegalPlacement(context, submission);
  }
}
