/**
 * Penalty scoring.
 *
 * Each category is priced independently from `config.penaltyCosts` and the
 * violations the validators report, so every category can be checked on its
 * own from a canned schedule.
 */

import { PENALTY_MULTIPLIERS } from "../constants.js";
import { monthsBetween } from "../datetime.utils.js";
import { requiresAbstractBeforePaper, resolvedConferenceId } from "../model.js";
import type { Config, Schedule, Submission } from "../types.js";
import { validateScheduleConstraints } from "../validation/report.js";
import type { ScheduleValidationReport } from "../validation/validation.types.js";

/** @category Scoring */
export const PENALTY_CATEGORY = {
  DEADLINE: "deadline",
  DEPENDENCY: "dependency",
  RESOURCE: "resource",
  CONFERENCE_COMPATIBILITY: "conference_compatibility",
  ABSTRACT_PAPER: "abstract_paper",
  BLACKOUT: "blackout",
  SOFT_BLOCK: "soft_block",
  SINGLE_CONFERENCE: "single_conference",
  LEAD_TIME: "lead_time",
  SLACK_COST: "slack_cost",
} as const;

export type PenaltyCategory = (typeof PENALTY_CATEGORY)[keyof typeof PENALTY_CATEGORY];

/** @category Scoring */
export interface PenaltyBreakdown {
  readonly totalPenalty: number;
  readonly categories: Readonly<Record<PenaltyCategory, number>>;
}

/**
 * Prices a schedule.
 *
 * Pass a report already computed for the same inputs to skip validating
 * twice.
 *
 * @category Scoring
 */
export function calculatePenaltyScore(
  schedule: Schedule,
  config: Config,
  report: ScheduleValidationReport = validateScheduleConstraints(schedule, config),
): PenaltyBreakdown {
  const categories: Record<PenaltyCategory, number> = {
    deadline: deadlinePenalty(report, config),
    dependency: dependencyPenalty(report, config),
    resource: resourcePenalty(report, config),
    conference_compatibility: compatibilityPenalty(report, config),
    abstract_paper: abstractPaperPenalty(report, config),
    blackout: blackoutPenalty(report, config),
    soft_block: softBlockPenalty(report, config),
    single_conference: singleConferencePenalty(report, config),
    lead_time: leadTimePenalty(report, config),
    slack_cost: slackCostPenalty(schedule, config),
  };
  const totalPenalty = Object.values(categories).reduce((sum, value) => sum + value, 0);
  return { totalPenalty, categories };
}

function perDayLatePrice(submission: Submission | undefined, config: Config): number {
  const costs = config.penaltyCosts;
  if (submission?.penaltyCostPerDay !== undefined) return submission.penaltyCostPerDay;
  return submission?.kind === "paper"
    ? costs.default_paper_penalty_per_day
    : costs.default_mod_penalty_per_day;
}

function deadlinePenalty(report: ScheduleValidationReport, config: Config): number {
  let total = 0;
  for (const v of report.families.deadline.violations) {
    if (v.type !== "deadline") continue;
    total += v.daysLate * perDayLatePrice(config.submissionsById.get(v.submissionId), config);
  }
  return total;
}

function dependencyPenalty(report: ScheduleValidationReport, config: Config): number {
  const costs = config.penaltyCosts;
  let total = 0;
  for (const v of report.families.dependency.violations) {
    switch (v.type) {
      case "missing_dependency":
      case "invalid_dependency":
        total += costs.default_monthly_slip_penalty;
        break;
      case "timing":
        total += costs.default_dependency_violation_penalty;
        break;
      case "abstract_paper":
        break;
    }
  }
  return total;
}

function resourcePenalty(report: ScheduleValidationReport, config: Config): number {
  const price = config.penaltyCosts.resource_violation_penalty;
  return report.families.resource.violations.reduce((sum, v) => sum + v.excess * price, 0);
}

function compatibilityPenalty(report: ScheduleValidationReport, config: Config): number {
  const price = config.penaltyCosts.conference_compatibility_penalty;
  let total = 0;
  for (const v of report.families.venue.violations) {
    if (v.type === "single_conference") continue;
    total += price;
    if (v.type === "kind_not_accepted") total += price * PENALTY_MULTIPLIERS.KIND_NOT_ACCEPTED;
  }
  return total;
}

function abstractPaperPenalty(report: ScheduleValidationReport, config: Config): number {
  const price = config.penaltyCosts.abstract_paper_dependency_penalty;
  let total = 0;
  for (const v of report.families.dependency.violations) {
    if (v.type !== "abstract_paper") continue;
    total += price;
    if (v.issue === "missing_abstract" || v.issue === "not_scheduled") {
      total += price * PENALTY_MULTIPLIERS.MISSING_ABSTRACT;
    } else if (v.issue === "timing") {
      total += price * PENALTY_MULTIPLIERS.ABSTRACT_TIMING;
    }
  }
  return total;
}

function blackoutPenalty(report: ScheduleValidationReport, config: Config): number {
  const price = config.penaltyCosts.blackout_violation_penalty;
  let total = 0;
  for (const v of report.families.deadline.violations) {
    if (v.type !== "blackout") continue;
    total += price;
    if (v.severity === "high") total += price * PENALTY_MULTIPLIERS.HIGH_SEVERITY_BLACKOUT;
  }
  return total;
}

function softBlockPenalty(report: ScheduleValidationReport, config: Config): number {
  const price = config.penaltyCosts.soft_block_violation_penalty;
  return report.families.soft_block.violations.reduce(
    (sum, v) => sum + v.daysBeyondWindow * price,
    0,
  );
}

function singleConferencePenalty(report: ScheduleValidationReport, config: Config): number {
  const price = config.penaltyCosts.single_conference_violation_penalty;
  let total = 0;
  for (const v of report.families.venue.violations) {
    if (v.type !== "single_conference") continue;
    total += price;
    if (config.topTierConferences.includes(v.conferenceId)) {
      total += price * PENALTY_MULTIPLIERS.TOP_TIER_CONFERENCE;
    }
  }
  return total;
}

function leadTimePenalty(report: ScheduleValidationReport, config: Config): number {
  const price = config.penaltyCosts.lead_time_violation_penalty;
  let total = 0;
  for (const v of report.families.deadline.violations) {
    if (v.type !== "lead_time") continue;
    total += price + v.daysShortage * price * PENALTY_MULTIPLIERS.LEAD_TIME_SHORTAGE_PER_DAY;
  }
  return total;
}

/**
 * Opportunity cost of starting later than `earliestStartDate`.
 *
 * Slip is counted in calendar months. Beyond the monthly price, a full-year
 * deferral is charged once at `monthsDelay`, and the opportunity a
 * submission gives up is charged once its own threshold is reached.
 */
function slackCostPenalty(schedule: Schedule, config: Config): number {
  const costs = config.penaltyCosts;
  const thresholds = config.penaltyThresholds;
  let total = 0;

  for (const [id, interval] of schedule) {
    const submission = config.submissionsById.get(id);
    if (!submission || submission.earliestStartDate === undefined) continue;

    const months = Math.max(0, monthsBetween(submission.earliestStartDate, interval.startDate));
    total += costs.default_monthly_slip_penalty * months;
    if (months >= thresholds.monthsDelay) total += costs.default_full_year_deferral_penalty;

    const conferenceId = resolvedConferenceId(submission, interval);
    const conference =
      conferenceId === undefined ? undefined : config.conferencesById.get(conferenceId);

    if (submission.kind === "paper" && conference && requiresAbstractBeforePaper(conference)) {
      if (months >= thresholds.abstractMissed) total += costs.missed_abstract_paper_penalty;
    } else if (submission.kind === "paper" && conference) {
      if (months >= thresholds.paperMissed) total += costs.missed_poster_penalty;
    } else if (submission.kind === "paper") {
      if (months >= thresholds.abstractMissed) total += costs.missed_abstract_penalty;
    } else if (submission.kind === "abstract") {
      if (months >= thresholds.posterMissed) total += costs.missed_poster_penalty;
    }
  }

  return total;
}
