import { SCHEDULING_CONSTANTS } from "../constants.js";
import { daysBetween } from "../datetime.utils.js";
import { acceptsKind, isTypeCompatible, resolvedConferenceId, workKey } from "../model.js";
import type { Config, Interval, Schedule, Submission } from "../types.js";
import { ValidationReporterImpl } from "./validation-reporter.js";
import type {
  SingleConferenceViolation,
  SubmissionCheck,
  ValidationResult,
  VenueFamilyViolation,
} from "./validation.types.js";

/**
 * Venue rules for one placed submission.
 *
 * Single-conference conflicts are reported against every other paper of
 * the same work at the same conference within a year, whichever starts
 * first.
 */
export function checkVenue(
  submission: Submission,
  interval: Interval,
  schedule: Schedule,
  config: Config,
): SubmissionCheck<VenueFamilyViolation> {
  const conferenceId = resolvedConferenceId(submission, interval);
  if (conferenceId === undefined) return { applies: false, violations: [] };

  const submissionId = submission.id;
  const conference = config.conferencesById.get(conferenceId);
  if (!conference) {
    return {
      applies: true,
      violations: [
        {
          type: "unknown_conference",
          submissionId,
          conferenceId,
          severity: "high",
          description: `${submissionId} targets unknown conference ${conferenceId}`,
        },
      ],
    };
  }

  const violations: VenueFamilyViolation[] = [];
  if (!acceptsKind(conference, submission.kind)) {
    violations.push({
      type: "kind_not_accepted",
      submissionId,
      conferenceId,
      severity: "high",
      description: `${conferenceId} does not accept ${submission.kind} submissions`,
    });
  }
  if (!isTypeCompatible(submission, conference)) {
    violations.push({
      type: "type_mismatch",
      submissionId,
      conferenceId,
      severity: "medium",
      description: `${submissionId} is not an engineering submission but targets engineering conference ${conferenceId}`,
    });
  }
  if (submission.kind === "paper") {
    violations.push(...singleConferenceConflicts(submission, interval, conferenceId, schedule, config));
  }

  return { applies: true, violations };
}

function singleConferenceConflicts(
  paper: Submission,
  interval: Interval,
  conferenceId: string,
  schedule: Schedule,
  config: Config,
): SingleConferenceViolation[] {
  const key = workKey(paper);
  const conflicts: SingleConferenceViolation[] = [];

  for (const [otherId, other] of schedule) {
    if (otherId === paper.id) continue;
    const otherPaper = config.submissionsById.get(otherId);
    if (!otherPaper || otherPaper.kind !== "paper" || workKey(otherPaper) !== key) continue;
    if (resolvedConferenceId(otherPaper, other) !== conferenceId) continue;

    const daysApart = Math.abs(daysBetween(other.startDate, interval.startDate));
    if (daysApart < SCHEDULING_CONSTANTS.SINGLE_CONFERENCE_CYCLE_DAYS) {
      conflicts.push({
        type: "single_conference",
        submissionId: paper.id,
        conferenceId,
        otherSubmissionId: otherId,
        daysApart,
        severity: "medium",
        description: `${paper.id} and ${otherId} target ${conferenceId} ${daysApart} day(s) apart`,
      });
    }
  }
  return conflicts;
}

/** True when `a` is placed after `b` (later start, then larger id). */
function isLater(aId: string, a: Interval, bId: string, b: Interval): boolean {
  if (a.startDate !== b.startDate) return a.startDate > b.startDate;
  return aId > bId;
}

/**
 * Runs {@link checkVenue} over every scheduled submission.
 *
 * Each single-conference pair is reported once, on the later paper.
 *
 * @category Validation
 */
export function validateVenues(
  schedule: Schedule,
  config: Config,
): ValidationResult<VenueFamilyViolation> {
  const reporter = new ValidationReporterImpl<VenueFamilyViolation>("venue");
  for (const [id, interval] of schedule) {
    const submission = config.submissionsById.get(id);
    if (!submission) continue;
    const check = checkVenue(submission, interval, schedule, config);
    if (!check.applies) continue;

    reporter.reportChecked(
      check.violations.filter((violation) => {
        if (violation.type !== "single_conference") return true;
        const other = schedule.get(violation.otherSubmissionId);
        return other === undefined || isLater(id, interval, violation.otherSubmissionId, other);
      }),
    );
  }
  return reporter.getResult();
}
