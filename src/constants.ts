/**
 * Default tables for prices, weights, thresholds and scheduling knobs.
 *
 * Every entry can be overridden per config. `ConfigInputSchema` fills each
 * key the caller leaves out (or sets to undefined) from these tables, so
 * downstream code always reads a complete table.
 */

/**
 * Default penalty prices.
 *
 * Per-day prices multiply days late, per-violation prices multiply
 * violation counts, and the slack prices implement the opportunity-cost
 * model for submissions that slip past their earliest start.
 *
 * @example Doubling the resource price for one run
 * ```typescript
 * const config = createConfig({
 *   ...input,
 *   penaltyCosts: { resource_violation_penalty: 2 * DEFAULT_PENALTY_COSTS.resource_violation_penalty },
 * });
 * ```
 */
export const DEFAULT_PENALTY_COSTS = {
  /** Per day late for non-paper submissions without their own price. */
  default_mod_penalty_per_day: 1000,
  /** Per day late for papers without their own price. */
  default_paper_penalty_per_day: 2000,
  /** Per dependency that starts too early. */
  default_dependency_violation_penalty: 200,
  /** Per month a submission slips past its earliest start; also per missing dependency. */
  default_monthly_slip_penalty: 1000,
  /** Once, when the slip reaches the full-year threshold. */
  default_full_year_deferral_penalty: 5000,
  missed_abstract_penalty: 3000,
  missed_poster_penalty: 2000,
  missed_abstract_paper_penalty: 4000,
  /** Per unit of excess load per day. */
  resource_violation_penalty: 200,
  /** Per day beyond the preferred start window. */
  soft_block_violation_penalty: 200,
  single_conference_violation_penalty: 500,
  lead_time_violation_penalty: 150,
  conference_compatibility_penalty: 300,
  abstract_paper_dependency_penalty: 400,
  blackout_violation_penalty: 100,
} as const;

export type PenaltyCostKey = keyof typeof DEFAULT_PENALTY_COSTS;

export type PenaltyCosts = Readonly<Record<PenaltyCostKey, number>>;

/**
 * Extra multipliers applied on top of the base per-violation prices.
 */
export const PENALTY_MULTIPLIERS = {
  KIND_NOT_ACCEPTED: 1.5,
  MISSING_ABSTRACT: 2,
  ABSTRACT_TIMING: 1.5,
  HIGH_SEVERITY_BLACKOUT: 2,
  TOP_TIER_CONFERENCE: 1.5,
  LEAD_TIME_SHORTAGE_PER_DAY: 0.2,
} as const;

/**
 * Month thresholds for the slack-cost opportunity penalties.
 */
export const DEFAULT_PENALTY_THRESHOLDS = {
  /** Slip (months) that triggers the full-year deferral penalty. */
  monthsDelay: 12,
  /** Slip after which an abstract(+paper) opportunity counts as missed. */
  abstractMissed: 6,
  /** Slip after which a paper's poster opportunity counts as missed. */
  paperMissed: 4,
  /** Slip after which an abstract's poster opportunity counts as missed. */
  posterMissed: 3,
} as const;

export type PenaltyThresholds = Readonly<Record<keyof typeof DEFAULT_PENALTY_THRESHOLDS, number>>;

/**
 * Default priority weights.
 *
 * Kind weights order submissions; `engineering_paper` multiplies the weight
 * of engineering submissions.
 */
export const DEFAULT_PRIORITY_WEIGHTS = {
  paper: 5,
  abstract: 3,
  poster: 1,
  engineering_paper: 2,
} as const;

export type PriorityWeights = Readonly<Record<keyof typeof DEFAULT_PRIORITY_WEIGHTS, number>>;

/**
 * Weights combining the quality and efficiency components.
 */
export const DEFAULT_SCORING_WEIGHTS = {
  qualityDeadline: 0.4,
  qualityDependency: 0.3,
  qualityResource: 0.3,
  /** Share of the quality score taken by the secondary factors. */
  qualitySecondary: 0.3,
  efficiencyResource: 0.6,
  efficiencyTimeline: 0.4,
} as const;

export type ScoringWeights = Readonly<Record<keyof typeof DEFAULT_SCORING_WEIGHTS, number>>;

/**
 * Strategy knobs carried by the config.
 */
export interface SchedulingOptions {
  /** Blackout dates are only enforced when this is on. */
  readonly enableBlackoutPeriods: boolean;
  /** Hard bound on undo operations in the backtracking strategy. */
  readonly maxBacktracks: number;
  readonly lookaheadWindowDays: number;
  readonly lookaheadBonusIncrement: number;
  /** Half-width of the uniform noise added to stochastic priorities. */
  readonly randomnessFactor: number;
  /** Days after the first legal day the stochastic strategy may pick from. */
  readonly jitterDays: number;
  /** Solver budget for the optimal strategy. */
  readonly timeLimitSeconds: number;
  /** Objective weight of the makespan term in the optimal strategy. */
  readonly makespanWeight: number;
}

export const DEFAULT_SCHEDULING_OPTIONS = {
  enableBlackoutPeriods: false,
  maxBacktracks: 5,
  lookaheadWindowDays: 30,
  lookaheadBonusIncrement: 0.5,
  randomnessFactor: 0.1,
  jitterDays: 7,
  timeLimitSeconds: 60,
  makespanWeight: 1,
} as const satisfies SchedulingOptions;

/**
 * Fixed domain constants that are not per-config knobs.
 */
export const SCHEDULING_CONSTANTS = {
  /** Duration of a poster without a draft window. */
  POSTER_DURATION_DAYS: 30,
  /** Days after the latest deadline the scheduling window stays open. */
  CONFERENCE_RESPONSE_TIME_DAYS: 90,
  /** Look-back before the earliest deadline when no start date is given. */
  REFERENCE_PERIOD_DAYS: 365,
  /** Papers of the same work must be this far apart at one conference. */
  SINGLE_CONFERENCE_CYCLE_DAYS: 365,
  /** Half-width of the preferred start window around an earliest start date. */
  SOFT_BLOCK_WINDOW_DAYS: 60,
} as const;

export const QUALITY_CONSTANTS = {
  MAX_SCORE: 100,
  MIN_SCORE: 0,
  ROBUSTNESS_SCALE: 10,
  BALANCE_VARIANCE_FACTOR: 10,
  SINGLE_SUBMISSION_ROBUSTNESS: 100,
  SINGLE_SUBMISSION_BALANCE: 100,
  RESOURCE_FALLBACK_SCORE: 50,
} as const;

export const EFFICIENCY_CONSTANTS = {
  OPTIMAL_UTILIZATION_RATE: 0.8,
  UTILIZATION_DEVIATION_PENALTY: 100,
  TIMELINE_SHORT_PENALTY: 0.5,
  TIMELINE_LONG_PENALTY: 0.8,
  IDEAL_DAYS_PER_SUBMISSION: 30,
} as const;
