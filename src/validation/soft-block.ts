import { SCHEDULING_CONSTANTS } from "../constants.js";
import { daysBetween } from "../datetime.utils.js";
import type { Config, Interval, Schedule, Submission } from "../types.js";
import { ValidationReporterImpl } from "./validation-reporter.js";
import type { SoftBlockViolation, SubmissionCheck, ValidationResult } from "./validation.types.js";

/**
 * A submission with an earliest start date should start within ±60 days of
 * it. Only applies to submissions with that date.
 */
export function checkSoftBlock(
  submission: Submission,
  interval: Interval,
): SubmissionCheck<SoftBlockViolation> {
  const earliestStartDate = submission.earliestStartDate;
  if (earliestStartDate === undefined) return { applies: false, violations: [] };

  const daysOffset = daysBetween(earliestStartDate, interval.startDate);
  const daysBeyondWindow = Math.abs(daysOffset) - SCHEDULING_CONSTANTS.SOFT_BLOCK_WINDOW_DAYS;
  if (daysBeyondWindow <= 0) return { applies: true, violations: [] };

  return {
    applies: true,
    violations: [
      {
        type: "soft_block",
        submissionId: submission.id,
        earliestStartDate,
        startDate: interval.startDate,
        daysOffset,
        daysBeyondWindow,
        severity: "medium",
        description: `${submission.id} starts ${daysBeyondWindow} day(s) outside its preferred window`,
      },
    ],
  };
}

/**
 * @category Validation
 */
export function validateSoftBlocks(
  schedule: Schedule,
  config: Config,
): ValidationResult<SoftBlockViolation> {
  const reporter = new ValidationReporterImpl<SoftBlockViolation>("soft_block");
  for (const [id, interval] of schedule) {
    const submission = config.submissionsById.get(id);
    if (!submission) continue;
    const check = checkSoftBlock(submission, interval);
    if (check.applies) reporter.reportChecked(check.violations);
  }
  return reporter.getResult();
}
