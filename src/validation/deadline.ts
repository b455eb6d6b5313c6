import { daysBetween } from "../datetime.utils.js";
import { deadlineFor, requiredLeadTimeDays, resolvedConferenceId } from "../model.js";
import type { Config, Interval, Schedule, Submission } from "../types.js";
import { ValidationReporterImpl } from "./validation-reporter.js";
import type {
  DeadlineFamilyViolation,
  Severity,
  SubmissionCheck,
  ValidationResult,
} from "./validation.types.js";

function lateSeverity(daysLate: number): Severity {
  if (daysLate > 7) return "high";
  if (daysLate > 1) return "medium";
  return "low";
}

/**
 * First blackout day inside `[startDate, endDate)`, if any.
 *
 * `blackoutDates` is sorted at the config boundary.
 */
export function firstBlackoutDay(
  interval: Interval,
  blackoutDates: readonly string[],
): string | undefined {
  return blackoutDates.find((day) => day >= interval.startDate && day < interval.endDate);
}

export function blackoutEnforced(config: Config): boolean {
  return config.schedulingOptions.enableBlackoutPeriods && config.blackoutDates.length > 0;
}

/**
 * Deadline rules for one placed submission: the deadline itself, the
 * minimum lead time before it, the earliest-start and engineering-ready
 * lower bounds, and blackout dates.
 *
 * Lead time is only checked when the deadline is met, so a late
 * submission is priced once.
 */
export function checkDeadline(
  submission: Submission,
  interval: Interval,
  config: Config,
): SubmissionCheck<DeadlineFamilyViolation> {
  const violations: DeadlineFamilyViolation[] = [];
  let applies = false;
  const submissionId = submission.id;

  const conferenceId = resolvedConferenceId(submission, interval);
  const deadline = deadlineFor(submission, conferenceId, config);
  if (conferenceId !== undefined && deadline !== undefined) {
    applies = true;
    const daysLate = daysBetween(deadline, interval.endDate);
    if (daysLate > 0) {
      violations.push({
        type: "deadline",
        submissionId,
        conferenceId,
        deadline,
        endDate: interval.endDate,
        daysLate,
        severity: lateSeverity(daysLate),
        description: `${submissionId} ends ${daysLate} day(s) after its ${conferenceId} deadline ${deadline}`,
      });
    } else {
      const requiredDays = requiredLeadTimeDays(submission, config);
      const actualDays = -daysLate;
      if (actualDays < requiredDays) {
        violations.push({
          type: "lead_time",
          submissionId,
          conferenceId,
          deadline,
          requiredDays,
          actualDays,
          daysShortage: requiredDays - actualDays,
          severity: "medium",
          description: `${submissionId} ends ${actualDays} day(s) before its deadline; ${requiredDays} required`,
        });
      }
    }
  }

  const bounds = [
    ["earliest_start", submission.earliestStartDate],
    ["engineering_ready", submission.engineeringReadyDate],
  ] as const;
  for (const [bound, boundDate] of bounds) {
    if (boundDate === undefined) continue;
    applies = true;
    if (interval.startDate < boundDate) {
      violations.push({
        type: "earliest_start",
        submissionId,
        bound,
        boundDate,
        startDate: interval.startDate,
        daysEarly: daysBetween(interval.startDate, boundDate),
        severity: "high",
        description: `${submissionId} starts ${interval.startDate}, before its ${bound.replace("_", " ")} date ${boundDate}`,
      });
    }
  }

  if (blackoutEnforced(config)) {
    applies = true;
    const date = firstBlackoutDay(interval, config.blackoutDates);
    if (date !== undefined) {
      violations.push({
        type: "blackout",
        submissionId,
        date,
        severity: "high",
        description: `${submissionId} is active on blackout date ${date}`,
      });
    }
  }

  return { applies, violations };
}

/**
 * Runs {@link checkDeadline} over every scheduled submission.
 *
 * @category Validation
 */
export function validateDeadlines(
  schedule: Schedule,
  config: Config,
): ValidationResult<DeadlineFamilyViolation> {
  const reporter = new ValidationReporterImpl<DeadlineFamilyViolation>("deadline");
  for (const [id, interval] of schedule) {
    const submission = config.submissionsById.get(id);
    if (!submission) continue;
    const check = checkDeadline(submission, interval, config);
    if (check.applies) reporter.reportChecked(check.violations);
  }
  return reporter.getResult();
}
