import { addDays, daysBetween } from "../datetime.utils.js";
import { dependentsOf, latestStartFor, priorityScore, venueCandidates } from "../model.js";
import type { Config, Submission } from "../types.js";
import {
  ConstructiveScheduler,
  firstLegalPlacement,
  legalDays,
  processingOrder,
  type Placement,
  type SchedulingContext,
} from "./base.js";

/**
 * Greedy that looks ahead at dependents.
 *
 * Submissions that block others move up in the order by
 * `lookaheadBonusIncrement` per dependent. Within
 * `[firstLegal, firstLegal + lookaheadWindowDays]` each legal day is scored
 * by the headroom it leaves dependents before their own latest start, minus
 * how far it lands outside the preferred start window. The best day wins;
 * ties go to the earliest.
 *
 * @category Schedulers
 */
export class LookaheadScheduler extends ConstructiveScheduler {
  override readonly strategy = "lookahead";

  protected override order(config: Config): Submission[] {
    const increment = config.schedulingOptions.lookaheadBonusIncrement;
    return processingOrder(
      config,
      (s) => priorityScore(s, config) + increment * dependentsOf(s.id, config).length,
    );
  }

  protected override choosePlacement(
    context: SchedulingContext,
    submission: Submission,
  ): Placement | undefined {
    const first = firstLegalPlacement(context, submission);
    if (!first) return undefined;

    const windowDays = context.config.schedulingOptions.lookaheadWindowDays;
    const last = addDays(first.startDate, windowDays);
    let best: Placement = first;
    let bestScore = this.#score(context, submission, first);

    for (const placement of legalDays(context, submission, first.venueIndex, first.startDate)) {
      if (placement.startDate > last) break;
      const score = this.#score(context, submission, placement);
      if (score > bestScore) {
        best = placement;
        bestScore = score;
      }
    }
    return best;
  }

  #score(context: SchedulingContext, submission: Submission, placement: Placement): number {
    const { config, builder } = context;
    const { lookaheadBonusIncrement, lookaheadWindowDays } = config.schedulingOptions;

    let headroom = 0;
    for (const dependent of dependentsOf(submission.id, config)) {
      if (builder.has(dependent.id)) continue;
      const venue = venueCandidates(dependent, config)[0];
      const latest = latestStartFor(dependent, venue, config);
      const room =
        latest === undefined
          ? lookaheadWindowDays
          : Math.max(0, daysBetween(placement.check.interval.endDate, latest));
      headroom += Math.min(lookaheadWindowDays, room);
    }

    const overshoot = placement.check.softViolations.reduce(
      (sum, violation) => sum + violation.daysBeyondWindow,
      0,
    );
    return lookaheadBonusIncrement * headroom - overshoot;
  }
}
