import { maxDay } from "../datetime.utils.js";
import {
  dependentsOf,
  durationDays,
  latestStartFor,
  priorityScore,
  priorityTopologicalOrder,
  venueCandidates,
} from "../model.js";
import type { Config, Submission } from "../types.js";
import {
  ConstructiveScheduler,
  earliestDeadline,
  firstLegalPlacement,
  type Placement,
  type SchedulingContext,
} from "./base.js";
import type { HeuristicRule, HeuristicSchedulerOptions } from "./scheduler.types.js";

type Compare = (a: Submission, b: Submission) => number;

/** Ascending by day; submissions without one go last. */
function byDay(day: (s: Submission) => string | undefined, descending = false): Compare {
  return (a, b) => {
    const da = day(a);
    const db = day(b);
    if (da === db) return 0;
    if (da === undefined) return 1;
    if (db === undefined) return -1;
    return (da < db ? -1 : 1) * (descending ? -1 : 1);
  };
}

/**
 * Days of work from the start of `submission` to the end of its longest
 * chain of dependents.
 */
export function criticalPathDays(config: Config): (submission: Submission) => number {
  const memo = new Map<string, number>();
  const chain = (submission: Submission): number => {
    const known = memo.get(submission.id);
    if (known !== undefined) return known;
    const own = durationDays(submission, config);
    memo.set(submission.id, own);
    const tail = dependentsOf(submission.id, config).reduce(
      (longest, dependent) => Math.max(longest, chain(dependent)),
      0,
    );
    memo.set(submission.id, own + tail);
    return own + tail;
  };
  return chain;
}

export function heuristicComparator(rule: HeuristicRule, config: Config): Compare {
  switch (rule) {
    case "earliest_deadline":
      return byDay((s) => earliestDeadline(s, config));
    case "latest_start":
      return byDay(
        (s) => maxDay(venueCandidates(s, config).flatMap((v) => latestStartFor(s, v, config) ?? [])),
        true,
      );
    case "shortest_processing_time":
      return (a, b) => durationDays(a, config) - durationDays(b, config);
    case "longest_processing_time":
      return (a, b) => durationDays(b, config) - durationDays(a, config);
    case "critical_path": {
      const chain = criticalPathDays(config);
      return (a, b) => chain(b) - chain(a);
    }
  }
}

/**
 * Greedy placement under a fixed ordering rule.
 *
 * Dependencies still come first; among ready submissions the rule decides,
 * then priority, then id. Each submission takes its first legal day.
 *
 * @example
 * ```typescript
 * const schedule = new HeuristicScheduler({ rule: "critical_path" }).schedule(config);
 * ```
 *
 * @category Schedulers
 */
export class HeuristicScheduler extends ConstructiveScheduler {
  override readonly strategy = "heuristic";
  readonly rule: HeuristicRule;

  constructor(options: HeuristicSchedulerOptions = {}) {
    super(options);
    this.rule = options.rule ?? "earliest_deadline";
  }

  protected override order(config: Config): Submission[] {
    const compare = heuristicComparator(this.rule, config);
    const priorities = new Map(config.submissions.map((s) => [s.id, priorityScore(s, config)]));
    return priorityTopologicalOrder(config, (a, b) => {
      const byRule = compare(a, b);
      if (byRule !== 0) return byRule;
      const byPriority = (priorities.get(b.id) ?? 0) - (priorities.get(a.id) ?? 0);
      if (byPriority !== 0) return byPriority;
      return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
    });
  }

  protected override choosePlacement(
    context: SchedulingContext,
    submission: Submission,
  ): Placement | undefined {
    return firstLegalPlacement(context, submission);
  }
}
