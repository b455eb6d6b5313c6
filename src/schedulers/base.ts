import { addDays, laterDay, minDay } from "../datetime.utils.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import {
  deadlineFor,
  earliestAllowedStart,
  latestStartFor,
  orderingDependencies,
  priorityScore,
  priorityTopologicalOrder,
  schedulingWindow,
  type SchedulingWindow,
  venueCandidates,
} from "../model.js";
import { ScheduleBuilder } from "../schedule.js";
import { createPlacementOracle, type PlacementCheck, type PlacementOracle } from "../validation/placement.js";
import type { Config, Schedule, Submission } from "../types.js";
import type { ConstructiveStrategy, Scheduler, SchedulerOptions } from "./scheduler.types.js";

/**
 * Everything a strategy consults while placing submissions.
 */
export interface SchedulingContext {
  readonly config: Config;
  readonly window: SchedulingWindow;
  readonly oracle: PlacementOracle;
  readonly builder: ScheduleBuilder;
}

/**
 * A legal start for a submission, at a venue when it has one.
 */
export interface Placement {
  readonly startDate: string;
  readonly conferenceId: string | undefined;
  /** Position of `conferenceId` in {@link venuesFor}. */
  readonly venueIndex: number;
  readonly check: PlacementCheck;
}

/**
 * Where a scan resumes: the venue index and the first day to try there.
 */
export interface ScanCursor {
  readonly venueIndex: number;
  readonly from: string;
}

export function createSchedulingContext(config: Config, today?: string): SchedulingContext {
  return {
    config,
    window: schedulingWindow(config, today),
    oracle: createPlacementOracle(config),
    builder: new ScheduleBuilder(config),
  };
}

/**
 * Earliest deadline a submission could target, across its venues.
 */
export function earliestDeadline(submission: Submission, config: Config): string | undefined {
  return minDay(
    venueCandidates(submission, config)
      .map((venue) => deadlineFor(submission, venue, config))
      .filter((d): d is string => d !== undefined),
  );
}

/**
 * Dependency-respecting order, highest priority first, then earliest
 * deadline, then id.
 */
export function processingOrder(
  config: Config,
  priority: (submission: Submission) => number,
): Submission[] {
  const priorities = new Map(config.submissions.map((s) => [s.id, priority(s)]));
  const deadlines = new Map(config.submissions.map((s) => [s.id, earliestDeadline(s, config)]));

  return priorityTopologicalOrder(config, (a, b) => {
    const byPriority = (priorities.get(b.id) ?? 0) - (priorities.get(a.id) ?? 0);
    if (byPriority !== 0) return byPriority;
    const da = deadlines.get(a.id);
    const db = deadlines.get(b.id);
    if (da !== db) {
      if (da === undefined) return 1;
      if (db === undefined) return -1;
      return da < db ? -1 : 1;
    }
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  });
}

/**
 * First day worth trying: the window start, the submission's own lower
 * bounds and the ends of its already-scheduled dependencies.
 */
export function scanOrigin(context: SchedulingContext, submission: Submission): string {
  let origin = earliestAllowedStart(submission, context.window.start);
  for (const depId of orderingDependencies(submission, context.config)) {
    const dependency = context.builder.get(depId);
    if (!dependency) continue;
    const lead = submission.dependsOn.includes(depId) ? submission.leadTimeFromParents : 0;
    origin = laterDay(origin, addDays(dependency.endDate, -lead));
  }
  return origin;
}

/**
 * Last day worth trying at `conferenceId`: the deadline minus duration and
 * lead time, capped at the window end.
 */
export function scanEnd(
  context: SchedulingContext,
  submission: Submission,
  conferenceId: string | undefined,
): string {
  const latest = latestStartFor(submission, conferenceId, context.config);
  const end = context.window.end;
  return latest !== undefined && latest < end ? latest : end;
}

/**
 * Venues to try, in order. A submission without any venue is tried once
 * with none.
 */
export function venuesFor(submission: Submission, config: Config): Array<string | undefined> {
  const venues = venueCandidates(submission, config);
  return venues.length > 0 ? venues : [undefined];
}

/**
 * Yields every legal placement at the venue at `venueIndex`, day by day
 * from `from`.
 */
export function* legalDays(
  context: SchedulingContext,
  submission: Submission,
  venueIndex: number,
  from: string,
): Generator<Placement> {
  const conferenceId = venuesFor(submission, context.config)[venueIndex];
  const last = scanEnd(context, submission, conferenceId);
  const schedule = context.builder.view();
  for (let day = from; day <= last; day = addDays(day, 1)) {
    const check = context.oracle.check(submission, day, schedule, conferenceId);
    if (check.legal) yield { startDate: day, conferenceId, venueIndex, check };
  }
}

/**
 * First legal placement, trying venues in order, resuming at `cursor` when
 * given.
 */
export function firstLegalPlacement(
  context: SchedulingContext,
  submission: Submission,
  cursor?: ScanCursor,
): Placement | undefined {
  const venueCount = venuesFor(submission, context.config).length;
  const origin = scanOrigin(context, submission);
  for (let venueIndex = cursor?.venueIndex ?? 0; venueIndex < venueCount; venueIndex++) {
    const from =
      cursor !== undefined && venueIndex === cursor.venueIndex
        ? laterDay(origin, cursor.from)
        : origin;
    for (const placement of legalDays(context, submission, venueIndex, from)) {
      return placement;
    }
  }
  return undefined;
}

/**
 * Places `placement` for `submission` in the context's builder.
 */
export function commitPlacement(
  context: SchedulingContext,
  submission: Submission,
  placement: Placement,
): void {
  const venue = submission.conferenceId === undefined ? placement.conferenceId : undefined;
  context.builder.place(submission.id, placement.startDate, venue);
}

/**
 * Shared skeleton of the single-pass strategies: order the submissions,
 * then place each one where {@link choosePlacement} says, skipping those
 * with no legal day.
 */
export abstract class ConstructiveScheduler implements Scheduler {
  abstract readonly strategy: ConstructiveStrategy;
  protected readonly logger: Logger;
  protected readonly today: string | undefined;

  constructor(options: SchedulerOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.today = options.today;
  }

  schedule(config: Config): Schedule {
    const context = createSchedulingContext(config, this.today);
    const order = this.order(config);
    const skipped: string[] = [];

    for (const submission of order) {
      const placement = this.choosePlacement(context, submission);
      if (!placement) {
        skipped.push(submission.id);
        this.logger.debug({ strategy: this.strategy, submissionId: submission.id }, "no legal start day");
        continue;
      }
      commitPlacement(context, submission, placement);
      this.logger.debug(
        {
          strategy: this.strategy,
          submissionId: submission.id,
          startDate: placement.startDate,
          conferenceId: placement.conferenceId,
        },
        "placed submission",
      );
    }

    const schedule = context.builder.build();
    this.logger.info(
      { strategy: this.strategy, scheduled: schedule.size, total: config.submissions.length, skipped },
      "schedule built",
    );
    return schedule;
  }

  /** Processing order; by default priority-aware topological order. */
  protected order(config: Config): Submission[] {
    return processingOrder(config, (s) => priorityScore(s, config));
  }

  /**
   * Where to put `submission`; `undefined` when it has no legal day.
   * `cursor` resumes a scan that was undone.
   */
  protected abstract choosePlacement(
    context: SchedulingContext,
    submission: Submission,
    cursor?: ScanCursor,
  ): Placement | undefined;
}
