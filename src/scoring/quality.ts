import { QUALITY_CONSTANTS } from "../constants.js";
import { daysBetween } from "../datetime.utils.js";
import { deadlineFor, resolvedConferenceId } from "../model.js";
import type { Config, Schedule } from "../types.js";
import { validateScheduleConstraints } from "../validation/report.js";
import { dailyLoad } from "../validation/resources.js";
import type { ScheduleValidationReport } from "../validation/validation.types.js";

/** @category Scoring */
export interface QualityScore {
  /** 0-100. */
  readonly score: number;
  readonly base: number;
  readonly secondary: number;
  readonly robustness: number;
  readonly balance: number;
}

export function clampScore(value: number): number {
  return Math.min(QUALITY_CONSTANTS.MAX_SCORE, Math.max(QUALITY_CONSTANTS.MIN_SCORE, value));
}

export function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

function sampleVariance(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  return values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / (values.length - 1);
}

/**
 * Mean buffer in days between each end date and its deadline, scaled by 10
 * and capped at 100. Late submissions count as zero buffer; a schedule with
 * no deadlines at stake scores the maximum.
 */
export function robustnessScore(schedule: Schedule, config: Config): number {
  if (schedule.size < 2) return QUALITY_CONSTANTS.SINGLE_SUBMISSION_ROBUSTNESS;

  const buffers: number[] = [];
  for (const [id, interval] of schedule) {
    const submission = config.submissionsById.get(id);
    if (!submission) continue;
    const deadline = deadlineFor(submission, resolvedConferenceId(submission, interval), config);
    if (deadline === undefined) continue;
    buffers.push(Math.max(0, daysBetween(interval.endDate, deadline)));
  }
  if (buffers.length === 0) return QUALITY_CONSTANTS.MAX_SCORE;
  return clampScore(mean(buffers) * QUALITY_CONSTANTS.ROBUSTNESS_SCALE);
}

/**
 * `100 − (sample variance / mean) × 10` of the load over loaded days.
 */
export function balanceScore(schedule: Schedule): number {
  if (schedule.size < 2) return QUALITY_CONSTANTS.SINGLE_SUBMISSION_BALANCE;

  const loads = dailyLoad(schedule).map((day) => day.load);
  const avg = mean(loads);
  if (avg === 0) return QUALITY_CONSTANTS.MAX_SCORE;
  return clampScore(
    QUALITY_CONSTANTS.MAX_SCORE -
      (sampleVariance(loads) / avg) * QUALITY_CONSTANTS.BALANCE_VARIANCE_FACTOR,
  );
}

/**
 * Quality on a 0-100 scale.
 *
 * The base blends deadline, dependency and resource compliance; the
 * secondary part averages venue and soft-block compliance with robustness
 * and balance. An empty schedule scores 0.
 *
 * @category Scoring
 */
export function calculateQualityScore(
  schedule: Schedule,
  config: Config,
  report: ScheduleValidationReport = validateScheduleConstraints(schedule, config),
): QualityScore {
  if (schedule.size === 0) {
    return { score: 0, base: 0, secondary: 0, robustness: 0, balance: 0 };
  }

  const weights = config.scoringWeights;
  const { families } = report;
  const resource = families.resource.isValid
    ? QUALITY_CONSTANTS.MAX_SCORE
    : QUALITY_CONSTANTS.RESOURCE_FALLBACK_SCORE;
  const base =
    weights.qualityDeadline * families.deadline.complianceRate +
    weights.qualityDependency * families.dependency.complianceRate +
    weights.qualityResource * resource;

  const robustness = robustnessScore(schedule, config);
  const balance = balanceScore(schedule);
  const secondary = mean([
    families.venue.complianceRate,
    families.soft_block.complianceRate,
    robustness,
    balance,
  ]);

  const score = clampScore(
    (1 - weights.qualitySecondary) * base + weights.qualitySecondary * secondary,
  );
  return { score, base, secondary, robustness, balance };
}
