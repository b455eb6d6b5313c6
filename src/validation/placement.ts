import { createInterval } from "../schedule.js";
import type { Config, Interval, Schedule, Submission } from "../types.js";
import { checkDeadline } from "./deadline.js";
import { checkDependencies } from "./dependency.js";
import { checkResources } from "./resources.js";
import { checkSoftBlock } from "./soft-block.js";
import { checkVenue } from "./venue.js";
import type { ScheduleViolation, SoftBlockViolation } from "./validation.types.js";

export interface PlacementCheck {
  /** False when any hard family reports a violation. */
  readonly legal: boolean;
  readonly interval: Interval;
  /** Hard-family violations of the candidate placement. */
  readonly violations: readonly ScheduleViolation[];
  readonly softViolations: readonly SoftBlockViolation[];
}

/**
 * "Can this submission start on this day, given what is already placed?"
 */
export interface PlacementOracle {
  check(
    submission: Submission,
    startDate: string,
    schedule: Schedule,
    conferenceId?: string,
  ): PlacementCheck;
}

/**
 * Composes the single-submission checks of every family into the
 * predicate all constructive strategies share.
 *
 * The full validators are built on the same checks, so a placement the
 * oracle accepts adds no hard violation of its own to the report.
 *
 * @category Validation
 */
export function createPlacementOracle(config: Config): PlacementOracle {
  return {
    check(submission, startDate, schedule, conferenceId) {
      const venue = submission.conferenceId === undefined ? conferenceId : undefined;
      const interval = createInterval(submission, startDate, config, venue);

      const violations: ScheduleViolation[] = [
        ...checkDeadline(submission, interval, config).violations,
        ...checkDependencies(submission, interval, schedule, config).violations,
        ...checkResources(submission, interval, schedule, config).violations,
        ...checkVenue(submission, interval, schedule, config).violations,
      ];
      const softViolations = checkSoftBlock(submission, interval).violations;

      return { legal: violations.length === 0, interval, violations, softViolations };
    },
  };
}
