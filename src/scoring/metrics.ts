import { daysBetween, maxDay, minDay, monthKey, quarterKey } from "../datetime.utils.js";
import type { Config, Schedule, SubmissionKind } from "../types.js";
import { validateScheduleConstraints } from "../validation/report.js";
import { dailyLoad } from "../validation/resources.js";
import type { ScheduleValidationReport } from "../validation/validation.types.js";
import { calculateEfficiencyScore } from "./efficiency.js";
import { calculatePenaltyScore, type PenaltyBreakdown } from "./penalty.js";
import { calculateQualityScore, mean } from "./quality.js";

/**
 * Everything the planner reports about one schedule.
 *
 * @category Scoring
 */
export interface ScheduleMetrics {
  /** Days from the first start to the last end; 0 for an empty schedule. */
  readonly makespanDays: number;
  readonly startDate: string | undefined;
  readonly endDate: string | undefined;
  readonly peakLoad: number;
  /** Mean load over loaded days. */
  readonly averageLoad: number;
  /** `averageLoad` as a percentage of the concurrency limit. */
  readonly utilizationRate: number;
  readonly penalty: PenaltyBreakdown;
  readonly qualityScore: number;
  readonly efficiencyScore: number;
  readonly isValid: boolean;
  readonly complianceRate: number;
  readonly scheduledCount: number;
  readonly totalCount: number;
  /** Percentage of submissions with an interval. */
  readonly completionRate: number;
  readonly scheduledByKind: Readonly<Record<SubmissionKind, number>>;
  /** Ids with no interval, in config order. */
  readonly missingSubmissionIds: readonly string[];
  /** Starts per `YYYY-MM` month. */
  readonly monthlyDistribution: Readonly<Record<string, number>>;
  /** Starts per `YYYY-Qn` quarter. */
  readonly quarterlyDistribution: Readonly<Record<string, number>>;
  /** Starts per `YYYY` year. */
  readonly yearlyDistribution: Readonly<Record<string, number>>;
  /** Share of scheduled submissions per kind, in percent; all 0 when nothing is scheduled. */
  readonly kindPercentages: Readonly<Record<SubmissionKind, number>>;
}

/**
 * Validates, prices and scores a schedule in one pass.
 *
 * @category Scoring
 */
export function calculateScheduleMetrics(schedule: Schedule, config: Config): ScheduleMetrics {
  const report: ScheduleValidationReport = validateScheduleConstraints(schedule, config);
  const intervals = [...schedule.values()];
  const startDate = minDay(intervals.map((i) => i.startDate));
  const endDate = maxDay(intervals.map((i) => i.endDate));
  const makespanDays =
    startDate === undefined || endDate === undefined ? 0 : daysBetween(startDate, endDate);

  const loads = dailyLoad(schedule).map((day) => day.load);
  const peakLoad = loads.reduce((peak, load) => Math.max(peak, load), 0);
  const averageLoad = mean(loads);

  const scheduledByKind: Record<SubmissionKind, number> = { abstract: 0, paper: 0, poster: 0 };
  const missingSubmissionIds: string[] = [];
  for (const submission of config.submissions) {
    if (schedule.has(submission.id)) scheduledByKind[submission.kind] += 1;
    else missingSubmissionIds.push(submission.id);
  }

  const monthlyDistribution: Record<string, number> = {};
  const quarterlyDistribution: Record<string, number> = {};
  const yearlyDistribution: Record<string, number> = {};
  const count = (into: Record<string, number>, key: string) => {
    into[key] = (into[key] ?? 0) + 1;
  };
  for (const interval of intervals.toSorted((a, b) => (a.startDate < b.startDate ? -1 : 1))) {
    count(monthlyDistribution, monthKey(interval.startDate));
    count(quarterlyDistribution, quarterKey(interval.startDate));
    count(yearlyDistribution, interval.startDate.slice(0, 4));
  }

  const totalCount = config.submissions.length;
  const scheduledCount = totalCount - missingSubmissionIds.length;
  const share = (n: number) => (scheduledCount === 0 ? 0 : (n / scheduledCount) * 100);
  const kindPercentages: Record<SubmissionKind, number> = {
    abstract: share(scheduledByKind.abstract),
    paper: share(scheduledByKind.paper),
    poster: share(scheduledByKind.poster),
  };

  return {
    makespanDays,
    startDate,
    endDate,
    peakLoad,
    averageLoad,
    utilizationRate: (averageLoad / config.maxConcurrentSubmissions) * 100,
    penalty: calculatePenaltyScore(schedule, config, report),
    qualityScore: calculateQualityScore(schedule, config, report).score,
    efficiencyScore: calculateEfficiencyScore(schedule, config).score,
    isValid: report.isValid,
    complianceRate: report.complianceRate,
    scheduledCount,
    totalCount,
    completionRate: totalCount === 0 ? 100 : (scheduledCount / totalCount) * 100,
    scheduledByKind,
    missingSubmissionIds,
    monthlyDistribution,
    quarterlyDistribution,
    yearlyDistribution,
    kindPercentages,
  };
}
