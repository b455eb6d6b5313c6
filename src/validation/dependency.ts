import { addDays, daysBetween } from "../datetime.utils.js";
import { requiredAbstractId, requiresAbstractBeforePaper, resolvedConferenceId } from "../model.js";
import type { Config, Interval, Schedule, Submission } from "../types.js";
import { ValidationReporterImpl } from "./validation-reporter.js";
import type {
  AbstractPaperIssue,
  AbstractPaperViolation,
  DependencyFamilyViolation,
  SubmissionCheck,
  ValidationResult,
} from "./validation.types.js";

/**
 * Dependency rules for one placed submission.
 *
 * Every declared dependency must exist, be scheduled, and end no later than
 * `startDate + leadTimeFromParents`. A paper at an abstract-then-paper
 * conference must also follow its abstract, which must be scheduled and
 * declared in `dependsOn`.
 */
export function checkDependencies(
  submission: Submission,
  interval: Interval,
  schedule: Schedule,
  config: Config,
): SubmissionCheck<DependencyFamilyViolation> {
  const violations: DependencyFamilyViolation[] = [];
  const submissionId = submission.id;
  const latestEnd = addDays(interval.startDate, submission.leadTimeFromParents);

  for (const dependencyId of submission.dependsOn) {
    if (!config.submissionsById.has(dependencyId)) {
      violations.push({
        type: "invalid_dependency",
        submissionId,
        dependencyId,
        severity: "high",
        description: `${submissionId} depends on unknown submission ${dependencyId}`,
      });
      continue;
    }
    const dependency = schedule.get(dependencyId);
    if (!dependency) {
      violations.push({
        type: "missing_dependency",
        submissionId,
        dependencyId,
        severity: "high",
        description: `${submissionId} depends on ${dependencyId}, which is not scheduled`,
      });
      continue;
    }
    if (dependency.endDate > latestEnd) {
      const daysViolation = daysBetween(latestEnd, dependency.endDate);
      violations.push({
        type: "timing",
        submissionId,
        dependencyId,
        daysViolation,
        severity: "medium",
        description: `${submissionId} starts ${daysViolation} day(s) before ${dependencyId} is done`,
      });
    }
  }

  const abstractPaper = checkAbstractBeforePaper(submission, interval, schedule, config);
  violations.push(...abstractPaper.violations);

  return {
    applies: submission.dependsOn.length > 0 || abstractPaper.applies,
    violations,
  };
}

function checkAbstractBeforePaper(
  paper: Submission,
  interval: Interval,
  schedule: Schedule,
  config: Config,
): SubmissionCheck<AbstractPaperViolation> {
  const conferenceId = resolvedConferenceId(paper, interval);
  const conference = conferenceId === undefined ? undefined : config.conferencesById.get(conferenceId);
  if (paper.kind !== "paper" || conferenceId === undefined || !conference) {
    return { applies: false, violations: [] };
  }
  if (!requiresAbstractBeforePaper(conference)) {
    return { applies: false, violations: [] };
  }

  const abstractId = requiredAbstractId(paper, conferenceId, config);
  const violation = (issue: AbstractPaperIssue, description: string): AbstractPaperViolation => ({
    type: "abstract_paper",
    submissionId: paper.id,
    issue,
    conferenceId,
    abstractId,
    severity: "high",
    description,
  });

  if (abstractId === undefined) {
    return {
      applies: true,
      violations: [violation("missing_abstract", `${paper.id} has no abstract at ${conferenceId}`)],
    };
  }

  const violations: AbstractPaperViolation[] = [];
  const abstract = schedule.get(abstractId);
  if (!abstract) {
    violations.push(violation("not_scheduled", `Abstract ${abstractId} for ${paper.id} is not scheduled`));
  } else if (abstract.endDate > interval.startDate) {
    violations.push(
      violation("timing", `Abstract ${abstractId} ends ${abstract.endDate}, after ${paper.id} starts`),
    );
  }
  if (!paper.dependsOn.includes(abstractId)) {
    violations.push(
      violation("not_declared", `${paper.id} does not list abstract ${abstractId} in dependsOn`),
    );
  }
  return { applies: true, violations };
}

/**
 * Runs {@link checkDependencies} over every scheduled submission.
 *
 * @category Validation
 */
export function validateDependencies(
  schedule: Schedule,
  config: Config,
): ValidationResult<DependencyFamilyViolation> {
  const reporter = new ValidationReporterImpl<DependencyFamilyViolation>("dependency");
  for (const [id, interval] of schedule) {
    const submission = config.submissionsById.get(id);
    if (!submission) continue;
    const check = checkDependencies(submission, interval, schedule, config);
    if (check.applies) reporter.reportChecked(check.violations);
  }
  return reporter.getResult();
}
