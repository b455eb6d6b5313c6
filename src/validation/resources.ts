import { addDays, daysBetween } from "../datetime.utils.js";
import type { Config, Interval, Schedule, Submission } from "../types.js";
import { ValidationReporterImpl } from "./validation-reporter.js";
import type {
  ResourceViolation,
  Severity,
  SubmissionCheck,
  ValidationResult,
} from "./validation.types.js";

/**
 * A run of days `[from, to)` with the same set of active submissions.
 */
export interface LoadSegment {
  readonly from: string;
  readonly to: string;
  /** Sorted. */
  readonly submissionIds: readonly string[];
}

export interface DailyLoad {
  readonly date: string;
  readonly load: number;
  readonly submissionIds: readonly string[];
}

/**
 * Sweeps interval boundaries into segments of constant load.
 *
 * Only segments with at least one active submission are returned, in date
 * order. Empty intervals are ignored.
 */
export function loadSegments(intervals: Iterable<readonly [string, Interval]>): LoadSegment[] {
  const events = new Map<string, { starts: string[]; ends: string[] }>();
  const eventAt = (date: string) => {
    let event = events.get(date);
    if (!event) {
      event = { starts: [], ends: [] };
      events.set(date, event);
    }
    return event;
  };

  for (const [id, interval] of intervals) {
    if (interval.endDate <= interval.startDate) continue;
    eventAt(interval.startDate).starts.push(id);
    eventAt(interval.endDate).ends.push(id);
  }

  const boundaries = [...events.keys()].toSorted();
  const active = new Set<string>();
  const segments: LoadSegment[] = [];

  for (const [index, date] of boundaries.entries()) {
    const event = events.get(date);
    if (!event) continue;
    for (const id of event.ends) active.delete(id);
    for (const id of event.starts) active.add(id);

    const next = boundaries[index + 1];
    if (next !== undefined && active.size > 0) {
      segments.push({ from: date, to: next, submissionIds: [...active].toSorted() });
    }
  }

  return segments;
}

/**
 * Per-day load of every loaded day, in date order.
 *
 * @category Validation
 */
export function dailyLoad(schedule: Schedule): DailyLoad[] {
  const days: DailyLoad[] = [];
  for (const segment of loadSegments(schedule)) {
    const length = daysBetween(segment.from, segment.to);
    for (let offset = 0; offset < length; offset++) {
      days.push({
        date: addDays(segment.from, offset),
        load: segment.submissionIds.length,
        submissionIds: segment.submissionIds,
      });
    }
  }
  return days;
}

function excessSeverity(excess: number): Severity {
  return excess > 1 ? "high" : "medium";
}

function resourceViolation(day: DailyLoad, limit: number): ResourceViolation {
  const excess = day.load - limit;
  return {
    type: "resource",
    date: day.date,
    load: day.load,
    limit,
    excess,
    submissionIds: day.submissionIds,
    severity: excessSeverity(excess),
    description: `${day.load} submissions active on ${day.date}; limit is ${limit}`,
  };
}

/**
 * Days inside `interval` where placing `submission` would exceed the
 * concurrency limit, given everything else already in `schedule`.
 */
export function checkResources(
  submission: Submission,
  interval: Interval,
  schedule: Schedule,
  config: Config,
): SubmissionCheck<ResourceViolation> {
  const limit = config.maxConcurrentSubmissions;
  const entries: Array<readonly [string, Interval]> = [[submission.id, interval]];
  for (const [id, other] of schedule) {
    if (id === submission.id) continue;
    if (other.endDate <= interval.startDate || other.startDate >= interval.endDate) continue;
    entries.push([id, other]);
  }

  const violations: ResourceViolation[] = [];
  if (entries.length > limit) {
    for (const segment of loadSegments(entries)) {
      if (segment.submissionIds.length <= limit) continue;
      if (!segment.submissionIds.includes(submission.id)) continue;
      const length = daysBetween(segment.from, segment.to);
      for (let offset = 0; offset < length; offset++) {
        violations.push(
          resourceViolation(
            {
              date: addDays(segment.from, offset),
              load: segment.submissionIds.length,
              submissionIds: segment.submissionIds,
            },
            limit,
          ),
        );
      }
    }
  }

  return { applies: true, violations };
}

/**
 * One violation per day whose load exceeds `maxConcurrentSubmissions`.
 *
 * `total` counts loaded days and `compliant` the days within the limit.
 *
 * @category Validation
 */
export function validateResources(
  schedule: Schedule,
  config: Config,
): ValidationResult<ResourceViolation> {
  const limit = config.maxConcurrentSubmissions;
  const reporter = new ValidationReporterImpl<ResourceViolation>("resource");
  for (const day of dailyLoad(schedule)) {
    reporter.reportChecked(day.load > limit ? [resourceViolation(day, limit)] : []);
  }
  return reporter.getResult();
}
