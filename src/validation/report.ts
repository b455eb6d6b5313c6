import type { Config, Schedule } from "../types.js";
import { validateDeadlines } from "./deadline.js";
import { validateDependencies } from "./dependency.js";
import { validateResources } from "./resources.js";
import { validateSoftBlocks } from "./soft-block.js";
import { validateVenues } from "./venue.js";
import type { ScheduleValidationReport, ScheduleViolation } from "./validation.types.js";

/**
 * Runs every constraint family over a schedule.
 *
 * This is the one place callers read legality from. The report is a pure
 * function of its inputs.
 *
 * @example
 * ```typescript
 * const report = validateScheduleConstraints(schedule, config);
 * if (!report.isValid) {
 *   for (const v of report.violations) console.log(v.type, v.description);
 * }
 * ```
 *
 * @category Validation
 */
export function validateScheduleConstraints(
  schedule: Schedule,
  config: Config,
): ScheduleValidationReport {
  const families = {
    deadline: validateDeadlines(schedule, config),
    dependency: validateDependencies(schedule, config),
    resource: validateResources(schedule, config),
    venue: validateVenues(schedule, config),
    soft_block: validateSoftBlocks(schedule, config),
  };

  const results = Object.values(families);
  const isValid =
    families.deadline.isValid &&
    families.dependency.isValid &&
    families.resource.isValid &&
    families.venue.isValid;
  const complianceRate =
    results.reduce((sum, result) => sum + result.complianceRate, 0) / results.length;
  const violations = results.flatMap<ScheduleViolation>((result) => result.violations);

  const summary = [
    `${isValid ? "Valid" : "Invalid"} schedule: ${schedule.size}/${config.submissions.length} scheduled, ` +
      `${violations.length} violation(s), ${complianceRate.toFixed(1)}% compliance`,
    ...results.map((result) => result.summary),
  ].join("\n");

  return { isValid, complianceRate, families, violations, summary };
}
