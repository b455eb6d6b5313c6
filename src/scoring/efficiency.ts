import { EFFICIENCY_CONSTANTS } from "../constants.js";
import { daysBetween, maxDay, minDay } from "../datetime.utils.js";
import type { Config, Schedule } from "../types.js";
import { dailyLoad } from "../validation/resources.js";
import { clampScore, mean } from "./quality.js";

/** @category Scoring */
export interface EfficiencyScore {
  /** 0-100. */
  readonly score: number;
  readonly utilization: number;
  readonly timeline: number;
  readonly averageLoad: number;
}

/**
 * Closeness of the average daily load to 80% of the concurrency limit.
 */
export function utilizationScore(averageLoad: number, config: Config): number {
  const target = EFFICIENCY_CONSTANTS.OPTIMAL_UTILIZATION_RATE * config.maxConcurrentSubmissions;
  const deviation = Math.abs(averageLoad - target) / target;
  return Math.max(0, 100 - deviation * EFFICIENCY_CONSTANTS.UTILIZATION_DEVIATION_PENALTY);
}

/**
 * Span of start days against an ideal of 30 days per submission.
 *
 * Shorter spans lose half as fast as the ratio falls; longer spans lose
 * 0.8 per unit of ratio above 1.
 */
export function timelineScore(schedule: Schedule, config: Config): number {
  const starts = [...schedule.values()].map((interval) => interval.startDate);
  const first = minDay(starts);
  const last = maxDay(starts);
  if (first === undefined || last === undefined) return 0;

  const span = daysBetween(first, last) + 1;
  const ideal = config.submissions.length * EFFICIENCY_CONSTANTS.IDEAL_DAYS_PER_SUBMISSION;
  const ratio = span / ideal;
  const value =
    ratio <= 1
      ? 100 * (1 - (1 - ratio) * EFFICIENCY_CONSTANTS.TIMELINE_SHORT_PENALTY)
      : 100 * (1 - (ratio - 1) * EFFICIENCY_CONSTANTS.TIMELINE_LONG_PENALTY);
  return clampScore(value);
}

/**
 * Efficiency on a 0-100 scale. An empty schedule scores 0.
 *
 * @category Scoring
 */
export function calculateEfficiencyScore(schedule: Schedule, config: Config): EfficiencyScore {
  if (schedule.size === 0) {
    return { score: 0, utilization: 0, timeline: 0, averageLoad: 0 };
  }

  const averageLoad = mean(dailyLoad(schedule).map((day) => day.load));
  const utilization = utilizationScore(averageLoad, config);
  const timeline = timelineScore(schedule, config);
  const weights = config.scoringWeights;
  const score = clampScore(
    weights.efficiencyResource * utilization + weights.efficiencyTimeline * timeline,
  );
  return { score, utilization, timeline, averageLoad };
}
