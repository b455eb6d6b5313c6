/**
 * Time-indexed model of a config.
 *
 * One boolean per allowed (submission, start offset) pair, chosen exactly
 * once, with an integer start offset tied to the chosen boolean. Offsets
 * count days from the scheduling window start.
 */

import { SCHEDULING_CONSTANTS } from "../constants.js";
import { addDays, daysBetween } from "../datetime.utils.js";
import {
  durationDays,
  earliestAllowedStart,
  latestStartFor,
  orderingDependencies,
  requiredAbstractId,
  type SchedulingWindow,
  venueCandidates,
  workKey,
} from "../model.js";
import { blackoutEnforced, firstBlackoutDay } from "../validation/deadline.js";
import { checkVenue } from "../validation/venue.js";
import type { Config, Submission } from "../types.js";
import {
  MAKESPAN_VAR,
  SolverModelBuilder,
  startChoiceVar,
  startOffsetVar,
  type CompilationResult,
  type Term,
} from "./model-builder.js";

export interface ScheduleModel {
  readonly compilation: CompilationResult;
  readonly window: SchedulingWindow;
  /** Venue each submission was modeled at; absent when it has none. */
  readonly venues: ReadonlyMap<string, string>;
  /** Allowed start offsets per submission, ascending. */
  readonly allowedOffsets: ReadonlyMap<string, readonly number[]>;
}

/**
 * Builds the time-indexed model.
 *
 * Submissions choosing among candidate venues are pinned to their first
 * eligible one. Start days that break a deadline (with lead time), a lower
 * bound or an enforced blackout date are left out of the model, so a
 * submission with no day left makes it unsolvable. So does a fixed venue
 * that does not take the submission. Papers of one work at one venue are
 * kept a conference cycle apart.
 */
export function buildScheduleModel(config: Config, window: SchedulingWindow): ScheduleModel {
  const { schedulingOptions } = config;
  const builder = new SolverModelBuilder({ timeLimitSeconds: schedulingOptions.timeLimitSeconds });
  const horizon = daysBetween(window.start, window.end);

  const venues = new Map<string, string>();
  const allowedOffsets = new Map<string, number[]>();
  const durations = new Map<string, number>();

  for (const submission of config.submissions) {
    const venue = venueCandidates(submission, config)[0];
    if (venue !== undefined) venues.set(submission.id, venue);
    const duration = durationDays(submission, config);
    durations.set(submission.id, duration);

    const venueProblems = venue === undefined ? [] : venueIssues(submission, venue, window, config);
    if (venueProblems.length > 0) {
      allowedOffsets.set(submission.id, []);
      builder.reportUnsolvable(`${submission.id} cannot target ${venue}: ${venueProblems.join("; ")}`);
      continue;
    }

    const offsets = allowedStartOffsets(submission, venue, duration, window, horizon, config);
    allowedOffsets.set(submission.id, offsets);

    if (offsets.length === 0) {
      builder.reportUnsolvable(`${submission.id} has no allowed start day`);
      continue;
    }

    builder.addExactlyOne(
      offsets.map((offset) => builder.boolVar(startChoiceVar(submission.id, offset))),
    );

    const start = builder.intVar(
      startOffsetVar(submission.id),
      offsets[0] ?? 0,
      offsets[offsets.length - 1] ?? horizon,
    );
    builder.addLinear(
      [
        ...offsets
          .filter((offset) => offset !== 0)
          .map((offset) => ({ var: startChoiceVar(submission.id, offset), coeff: offset })),
        { var: start, coeff: -1 },
      ],
      "==",
      0,
    );
  }

  if (builder.hasIssues()) {
    return { compilation: builder.compile(), window, venues, allowedOffsets };
  }

  addDependencyConstraints(builder, config, venues, durations);
  addConcurrencyConstraints(builder, config, allowedOffsets, durations);
  addSingleConferenceConstraints(builder, config, venues, horizon);
  addSoftBlockBounds(builder, config, window);
  addMakespan(builder, config, horizon, durations);

  return { compilation: builder.compile(), window, venues, allowedOffsets };
}

function venueIssues(
  submission: Submission,
  venue: string,
  window: SchedulingWindow,
  config: Config,
): string[] {
  const placement = { startDate: window.start, endDate: window.start, conferenceId: venue };
  return checkVenue(submission, placement, new Map(), config).violations.map((v) => v.description);
}

function allowedStartOffsets(
  submission: Submission,
  venue: string | undefined,
  duration: number,
  window: SchedulingWindow,
  horizon: number,
  config: Config,
): number[] {
  const first = Math.max(0, daysBetween(window.start, earliestAllowedStart(submission, window.start)));
  const latestStart = latestStartFor(submission, venue, config);
  const last = Math.min(
    horizon,
    latestStart === undefined ? horizon : daysBetween(window.start, latestStart),
  );

  const offsets: number[] = [];
  const checkBlackout = blackoutEnforced(config);
  for (let offset = first; offset <= last; offset++) {
    if (checkBlackout) {
      const startDate = addDays(window.start, offset);
      const interval = { startDate, endDate: addDays(startDate, duration) };
      if (firstBlackoutDay(interval, config.blackoutDates) !== undefined) continue;
    }
    offsets.push(offset);
  }
  return offsets;
}

/**
 * `start_j − start_i ≥ dur_i − leadTimeFromParents_j` for each declared
 * dependency, and `start_j − start_i ≥ dur_i` for a required abstract.
 */
function addDependencyConstraints(
  builder: SolverModelBuilder,
  config: Config,
  venues: ReadonlyMap<string, string>,
  durations: ReadonlyMap<string, number>,
): void {
  for (const submission of config.submissions) {
    const abstractId = requiredAbstractId(submission, venues.get(submission.id), config);
    const deps = new Set(orderingDependencies(submission, config));
    if (abstractId !== undefined && abstractId !== submission.id) deps.add(abstractId);

    for (const depId of deps) {
      const depDuration = durations.get(depId) ?? 0;
      const gap =
        depId === abstractId ? depDuration : depDuration - submission.leadTimeFromParents;
      builder.addLinear(
        [
          { var: startOffsetVar(submission.id), coeff: 1 },
          { var: startOffsetVar(depId), coeff: -1 },
        ],
        ">=",
        gap,
      );
    }
  }
}

/**
 * At most `maxConcurrentSubmissions` active per day, emitted only on days
 * where more submissions than that could be active.
 */
function addConcurrencyConstraints(
  builder: SolverModelBuilder,
  config: Config,
  allowedOffsets: ReadonlyMap<string, readonly number[]>,
  durations: ReadonlyMap<string, number>,
): void {
  const limit = config.maxConcurrentSubmissions;
  const covering = new Map<number, Term[]>();
  const submissionsOnDay = new Map<number, number>();

  for (const [id, offsets] of allowedOffsets) {
    const duration = durations.get(id) ?? 0;
    const touched = new Set<number>();
    for (const offset of offsets) {
      for (let day = offset; day < offset + duration; day++) {
        let terms = covering.get(day);
        if (!terms) {
          terms = [];
          covering.set(day, terms);
        }
        terms.push({ var: startChoiceVar(id, offset), coeff: 1 });
        touched.add(day);
      }
    }
    for (const day of touched) {
      submissionsOnDay.set(day, (submissionsOnDay.get(day) ?? 0) + 1);
    }
  }

  const days = [...covering.keys()].toSorted((a, b) => a - b);
  for (const day of days) {
    if ((submissionsOnDay.get(day) ?? 0) <= limit) continue;
    builder.addLinear(covering.get(day) ?? [], "<=", limit);
  }
}

/**
 * Papers of the same work at the same venue start at least a conference
 * cycle apart, in either order. One boolean per pair picks the order;
 * `bigM` relaxes the other side.
 */
function addSingleConferenceConstraints(
  builder: SolverModelBuilder,
  config: Config,
  venues: ReadonlyMap<string, string>,
  horizon: number,
): void {
  const cycle = SCHEDULING_CONSTANTS.SINGLE_CONFERENCE_CYCLE_DAYS;
  const bigM = horizon + cycle;
  const groups = new Map<string, string[]>();

  for (const submission of config.submissions) {
    const venue = venues.get(submission.id);
    if (submission.kind !== "paper" || venue === undefined) continue;
    const key = JSON.stringify([workKey(submission), venue]);
    const group = groups.get(key);
    if (group) group.push(submission.id);
    else groups.set(key, [submission.id]);
  }

  for (const ids of groups.values()) {
    for (const [index, first] of ids.entries()) {
      for (const second of ids.slice(index + 1)) {
        const secondFirst = builder.boolVar(`apart:${first}:${second}`);
        builder.addLinear(
          [
            { var: startOffsetVar(second), coeff: 1 },
            { var: startOffsetVar(first), coeff: -1 },
            { var: secondFirst, coeff: bigM },
          ],
          ">=",
          cycle,
        );
        builder.addLinear(
          [
            { var: startOffsetVar(first), coeff: 1 },
            { var: startOffsetVar(second), coeff: -1 },
            { var: secondFirst, coeff: -bigM },
          ],
          ">=",
          cycle - bigM,
        );
      }
    }
  }
}

function addSoftBlockBounds(
  builder: SolverModelBuilder,
  config: Config,
  window: SchedulingWindow,
): void {
  const price = config.penaltyCosts.soft_block_violation_penalty;
  const width = SCHEDULING_CONSTANTS.SOFT_BLOCK_WINDOW_DAYS;

  for (const submission of config.submissions) {
    if (submission.earliestStartDate === undefined) continue;
    const start = startOffsetVar(submission.id);
    if (!builder.hasVar(start)) continue;
    const preferred = daysBetween(window.start, submission.earliestStartDate);
    const terms = [{ var: start, coeff: 1 }];
    builder.addSoftLinear(terms, ">=", preferred - width, price, `soft_block:${submission.id}:lower`);
    builder.addSoftLinear(terms, "<=", preferred + width, price, `soft_block:${submission.id}:upper`);
  }
}

function addMakespan(
  builder: SolverModelBuilder,
  config: Config,
  horizon: number,
  durations: ReadonlyMap<string, number>,
): void {
  if (config.submissions.length === 0) return;
  const longest = Math.max(0, ...durations.values());
  const makespan = builder.intVar(MAKESPAN_VAR, 0, horizon + longest);

  for (const submission of config.submissions) {
    builder.addLinear(
      [
        { var: makespan, coeff: 1 },
        { var: startOffsetVar(submission.id), coeff: -1 },
      ],
      ">=",
      durations.get(submission.id) ?? 0,
    );
  }
  builder.addPenalty(makespan, config.schedulingOptions.makespanWeight);
}
