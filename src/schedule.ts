/**
 * Interval construction and the mutable builder strategies grow their
 * schedules with.
 *
 * @example
 * ```typescript
 * const builder = new ScheduleBuilder(config);
 * builder.place("paper-1", "2025-01-06");
 * builder.place("poster-1", "2025-02-03", "ISMRM");
 * const schedule = builder.build();
 * ```
 *
 * @module
 */

import { addDays } from "./datetime.utils.js";
import { durationDays } from "./model.js";
import type { Config, Interval, Schedule, Submission } from "./types.js";

/**
 * Builds the interval a submission occupies when started on `startDate`.
 *
 * `conferenceId` is recorded only when given; it names a venue picked from
 * the submission's candidates.
 */
export function createInterval(
  submission: Submission,
  startDate: string,
  config: Config,
  conferenceId?: string,
): Interval {
  const endDate = addDays(startDate, durationDays(submission, config));
  return conferenceId === undefined
    ? { startDate, endDate }
    : { startDate, endDate, conferenceId };
}

/**
 * Builds a schedule from `[id, startDate]` pairs, deriving every end date.
 *
 * Ids unknown to the config are skipped.
 */
export function scheduleFromStarts(
  starts: Iterable<readonly [string, string]>,
  config: Config,
): Schedule {
  const builder = new ScheduleBuilder(config);
  for (const [id, startDate] of starts) {
    if (config.submissionsById.has(id)) builder.place(id, startDate);
  }
  return builder.build();
}

/**
 * Single-owner mutable schedule.
 *
 * Strategies place and restore intervals while they search, then hand out an
 * immutable snapshot with {@link build}. The live view returned by
 * {@link view} must not outlive the next mutation.
 */
export class ScheduleBuilder {
  readonly #config: Config;
  readonly #entries = new Map<string, Interval>();

  constructor(config: Config) {
    this.#config = config;
  }

  get size(): number {
    return this.#entries.size;
  }

  has(submissionId: string): boolean {
    return this.#entries.has(submissionId);
  }

  get(submissionId: string): Interval | undefined {
    return this.#entries.get(submissionId);
  }

  /**
   * Places a submission and returns its interval.
   *
   * @throws Error when the id is not a submission in the config
   */
  place(submissionId: string, startDate: string, conferenceId?: string): Interval {
    const submission = this.#config.submissionsById.get(submissionId);
    if (!submission) {
      throw new Error(`Unknown submission "${submissionId}"`);
    }
    const interval = createInterval(submission, startDate, this.#config, conferenceId);
    this.#entries.set(submissionId, interval);
    return interval;
  }

  /**
   * Restores an interval captured earlier, or clears the entry when
   * `interval` is undefined.
   */
  restore(submissionId: string, interval: Interval | undefined): void {
    if (interval === undefined) {
      this.#entries.delete(submissionId);
    } else {
      this.#entries.set(submissionId, interval);
    }
  }

  view(): Schedule {
    return this.#entries;
  }

  build(): Schedule {
    return new Map(this.#entries);
  }
}
