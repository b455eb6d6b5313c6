/**
 * Planner for academic submissions.
 *
 * Places abstracts, papers and posters on a calendar so that conference
 * deadlines, dependencies, concurrency limits and venue rules hold, then
 * scores the result.
 *
 * @remarks
 * ## Core Concepts
 *
 * **Config**: {@link createConfig} parses raw input with zod, fills the
 * default price and weight tables, and rejects inconsistent input with a
 * {@link ConfigValidationError}. Every other component reads the frozen
 * {@link Config}.
 *
 * **Strategies**: the constructive strategies (`greedy`, `stochastic`,
 * `lookahead`, `backtracking`, `heuristic`, `random`) build a schedule
 * synchronously, one placement at a time. `optimal` compiles a time-indexed model and sends it
 * to an external solver through a {@link SolverClient}.
 *
 * **Validation**: {@link validateScheduleConstraints} checks a schedule
 * against five constraint families and returns a structured report. The
 * same checks decide placement legality inside the strategies.
 *
 * **Scoring**: {@link calculateScheduleMetrics} combines the penalty
 * breakdown, quality and efficiency scores with load statistics.
 *
 * @example Build and score a schedule
 * ```typescript
 * import { createConfig, createScheduler, calculateScheduleMetrics } from "submission-planner";
 *
 * const config = createConfig({
 *   submissions: [
 *     { id: "a1", title: "Abstract", kind: "abstract", conferenceId: "ICML" },
 *     { id: "p1", title: "Paper", kind: "paper", conferenceId: "ICML", dependsOn: ["a1"] },
 *   ],
 *   conferences: [
 *     {
 *       id: "ICML",
 *       name: "ICML",
 *       confType: "ENGINEERING",
 *       deadlines: { abstract: "2025-05-01", paper: "2025-06-01" },
 *     },
 *   ],
 *   minAbstractLeadTimeDays: 0,
 *   minPaperLeadTimeDays: 30,
 *   maxConcurrentSubmissions: 2,
 * });
 *
 * const schedule = createScheduler("greedy").schedule(config);
 * const metrics = calculateScheduleMetrics(schedule, config);
 * ```
 *
 * @example Solve exactly
 * ```typescript
 * import { HttpSolverClient, OptimalScheduler } from "submission-planner";
 *
 * const optimal = new OptimalScheduler({
 *   client: new HttpSolverClient({ baseUrl: "http://localhost:8080" }),
 * });
 * const { status, schedule } = await optimal.solve(config);
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Data model
// ============================================================================

export type {
  Submission,
  SubmissionKind,
  Conference,
  ConferenceType,
  ConferenceRecurrence,
  SubmissionWorkflow,
  SchedulerStrategy,
  Interval,
  Schedule,
  Config,
} from "./types.js";

export {
  SUBMISSION_KIND,
  SUBMISSION_KINDS,
  CONFERENCE_TYPE,
  CONFERENCE_RECURRENCE,
  SUBMISSION_WORKFLOW,
  SCHEDULER_STRATEGY,
} from "./types.js";

export {
  durationDays,
  effectiveWorkflow,
  acceptsKind,
  requiresAbstractBeforePaper,
  deadlineFor,
  priorityScore,
  schedulingWindow,
} from "./model.js";

export type { SchedulingWindow } from "./model.js";

export { createInterval, scheduleFromStarts, ScheduleBuilder } from "./schedule.js";

// ============================================================================
// Config
// ============================================================================

export { createConfig, validateConfig } from "./config.js";

export { ConfigInputSchema } from "./config.schemas.js";

export type { ConfigInput, SubmissionInput, ConferenceInput } from "./config.schemas.js";

export {
  DEFAULT_PENALTY_COSTS,
  DEFAULT_PENALTY_THRESHOLDS,
  DEFAULT_PRIORITY_WEIGHTS,
  DEFAULT_SCORING_WEIGHTS,
  DEFAULT_SCHEDULING_OPTIONS,
} from "./constants.js";

export type {
  PenaltyCosts,
  PenaltyThresholds,
  PriorityWeights,
  ScoringWeights,
  SchedulingOptions,
} from "./constants.js";

// ============================================================================
// Errors and logging
// ============================================================================

export { ConfigValidationError, SolverRequestError } from "./errors.js";

export { createLogger } from "./logger.js";

export type { Logger } from "./logger.js";

// ============================================================================
// Validation
// ============================================================================

export { validateScheduleConstraints } from "./validation/report.js";
export { checkDeadline, validateDeadlines } from "./validation/deadline.js";
export { checkDependencies, validateDependencies } from "./validation/dependency.js";
export { checkResources, dailyLoad, validateResources } from "./validation/resources.js";
export { checkVenue, validateVenues } from "./validation/venue.js";
export { checkSoftBlock, validateSoftBlocks } from "./validation/soft-block.js";
export { createPlacementOracle } from "./validation/placement.js";

export type { PlacementCheck, PlacementOracle } from "./validation/placement.js";
export type { DailyLoad } from "./validation/resources.js";

export { CONSTRAINT_FAMILY, CONSTRAINT_FAMILIES } from "./validation/validation.types.js";

export type {
  Severity,
  ConstraintFamily,
  ScheduleViolation,
  ViolationType,
  ValidationResult,
  ScheduleValidationReport,
  DeadlineViolation,
  LeadTimeViolation,
  EarliestStartViolation,
  BlackoutViolation,
  InvalidDependencyViolation,
  MissingDependencyViolation,
  DependencyTimingViolation,
  AbstractPaperViolation,
  ResourceViolation,
  UnknownConferenceViolation,
  KindNotAcceptedViolation,
  TypeMismatchViolation,
  SingleConferenceViolation,
  SoftBlockViolation,
} from "./validation/validation.types.js";

// ============================================================================
// Schedulers
// ============================================================================

export { GreedyScheduler } from "./schedulers/greedy.js";
export { StochasticScheduler } from "./schedulers/stochastic.js";
export { LookaheadScheduler } from "./schedulers/lookahead.js";
export { BacktrackingScheduler } from "./schedulers/backtracking.js";
export { HeuristicScheduler, criticalPathDays, heuristicComparator } from "./schedulers/heuristic.js";
export { RandomScheduler } from "./schedulers/random.js";
export { OptimalScheduler } from "./schedulers/optimal.js";
export {
  createScheduler,
  runStrategy,
  compareStrategies,
  CONSTRUCTIVE_STRATEGIES,
} from "./schedulers/registry.js";

export type { OptimalResult, OptimalSchedulerOptions } from "./schedulers/optimal.js";
export type {
  Scheduler,
  SchedulerOptions,
  StochasticSchedulerOptions,
  HeuristicSchedulerOptions,
  HeuristicRule,
  ConstructiveSchedulerOptions,
  ConstructiveStrategy,
} from "./schedulers/scheduler.types.js";
export { HEURISTIC_RULES } from "./schedulers/scheduler.types.js";
export type {
  StrategyOptions,
  StrategyComparison,
  CompareStrategiesOptions,
} from "./schedulers/registry.js";

// ============================================================================
// Solver
// ============================================================================

export { HttpSolverClient, parseSolveResponse } from "./client.js";
export type { HttpSolverClientOptions } from "./client.js";

export { SOLVER_STATUS } from "./client.types.js";

export type {
  SolverClient,
  SolverRequest,
  SolverResponse,
  SolverStatus,
  SoftConstraintViolation,
  FetcherLike,
} from "./client.types.js";

export { SolverRequestSchema, SolverResponseSchema, SolverStatusSchema } from "./client.schemas.js";

export { SolverModelBuilder } from "./solver/model-builder.js";
export { buildScheduleModel } from "./solver/schedule-model.js";
export { decodeStartDays } from "./solver/response.js";

export type { CompilationResult } from "./solver/model-builder.js";
export type { ScheduleModel } from "./solver/schedule-model.js";
export type { StartAssignment } from "./solver/response.js";

// ============================================================================
// Scoring
// ============================================================================

export { PENALTY_CATEGORY, calculatePenaltyScore } from "./scoring/penalty.js";
export { calculateQualityScore } from "./scoring/quality.js";
export { calculateEfficiencyScore } from "./scoring/efficiency.js";
export { calculateScheduleMetrics } from "./scoring/metrics.js";

export type { PenaltyBreakdown, PenaltyCategory } from "./scoring/penalty.js";
export type { QualityScore } from "./scoring/quality.js";
export type { EfficiencyScore } from "./scoring/efficiency.js";
export type { ScheduleMetrics } from "./scoring/metrics.js";
