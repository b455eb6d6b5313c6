/**
 * Core planner types: submissions, conferences, schedules and the
 * validated config every component reads.
 *
 * @packageDocumentation
 */

import type {
  PenaltyCosts,
  PenaltyThresholds,
  PriorityWeights,
  SchedulingOptions,
  ScoringWeights,
} from "./constants.js";

// ============================================================================
// Closed sets
// ============================================================================

/** Convenience constants for {@link SubmissionKind} values. */
export const SUBMISSION_KIND = {
  ABSTRACT: "abstract",
  PAPER: "paper",
  POSTER: "poster",
} as const;

/**
 * What a submission is: an abstract, a full paper, or a poster.
 */
export type SubmissionKind = (typeof SUBMISSION_KIND)[keyof typeof SUBMISSION_KIND];

export const SUBMISSION_KINDS: readonly SubmissionKind[] = ["abstract", "paper", "poster"];

export const CONFERENCE_TYPE = {
  MEDICAL: "MEDICAL",
  ENGINEERING: "ENGINEERING",
} as const;

export type ConferenceType = (typeof CONFERENCE_TYPE)[keyof typeof CONFERENCE_TYPE];

export const CONFERENCE_RECURRENCE = {
  ANNUAL: "annual",
  BIENNIAL: "biennial",
  QUARTERLY: "quarterly",
} as const;

export type ConferenceRecurrence =
  (typeof CONFERENCE_RECURRENCE)[keyof typeof CONFERENCE_RECURRENCE];

/**
 * Which submission kinds a conference takes, and in what sequence.
 *
 * - `abstract_then_paper`: an abstract must be accepted before the paper
 * - `abstract_or_paper`: either kind on its own
 */
export const SUBMISSION_WORKFLOW = {
  ABSTRACT_ONLY: "abstract_only",
  PAPER_ONLY: "paper_only",
  POSTER_ONLY: "poster_only",
  ABSTRACT_THEN_PAPER: "abstract_then_paper",
  ABSTRACT_OR_PAPER: "abstract_or_paper",
  ALL_TYPES: "all_types",
} as const;

export type SubmissionWorkflow = (typeof SUBMISSION_WORKFLOW)[keyof typeof SUBMISSION_WORKFLOW];

export const SCHEDULER_STRATEGY = {
  GREEDY: "greedy",
  STOCHASTIC: "stochastic",
  LOOKAHEAD: "lookahead",
  BACKTRACKING: "backtracking",
  HEURISTIC: "heuristic",
  RANDOM: "random",
  OPTIMAL: "optimal",
} as const;

export type SchedulerStrategy = (typeof SCHEDULER_STRATEGY)[keyof typeof SCHEDULER_STRATEGY];

// ============================================================================
// Data model
// ============================================================================

/**
 * A unit of work to place on the calendar.
 *
 * Dates are `YYYY-MM-DD` strings. Optional fields stay `undefined` when not
 * provided; list fields default to empty.
 */
export interface Submission {
  readonly id: string;
  readonly title: string;
  readonly kind: SubmissionKind;
  /** Fixed venue. When absent, a strategy may pick one of `candidateConferences`. */
  readonly conferenceId: string | undefined;
  readonly dependsOn: readonly string[];
  /** Drives the duration of papers and posters (30 days per month). */
  readonly draftWindowMonths: number;
  /** Days a dependent may overlap the end of its dependencies. */
  readonly leadTimeFromParents: number;
  readonly earliestStartDate: string | undefined;
  /** Day the underlying engineering work is ready; a hard lower bound. */
  readonly engineeringReadyDate: string | undefined;
  readonly penaltyCostPerDay: number | undefined;
  readonly engineering: boolean;
  readonly candidateConferences: readonly string[];
  /** Preferred deadline kinds when picking a candidate venue, in order. */
  readonly candidateKinds: readonly SubmissionKind[];
  /** Groups papers that denote the same underlying work. */
  readonly workId: string | undefined;
}

export interface Conference {
  readonly id: string;
  readonly name: string;
  readonly confType: ConferenceType;
  readonly recurrence: ConferenceRecurrence;
  /** At most one deadline per kind. */
  readonly deadlines: Readonly<Partial<Record<SubmissionKind, string>>>;
  /** Explicit workflow; inferred from `deadlines` when absent. */
  readonly submissionTypes: SubmissionWorkflow | undefined;
}

/**
 * The span a submission is active: `[startDate, endDate)`.
 */
export interface Interval {
  readonly startDate: string;
  /** Exclusive; always `startDate + duration`. */
  readonly endDate: string;
  /** Venue chosen by a strategy for submissions without a fixed `conferenceId`. */
  readonly conferenceId?: string;
}

/**
 * Assignment of intervals to submission ids.
 */
export type Schedule = ReadonlyMap<string, Interval>;

/**
 * The validated, immutable input to every scheduler, validator and scorer.
 *
 * Built by `createConfig`, which merges defaults and rejects invalid input.
 */
export interface Config {
  readonly submissions: readonly Submission[];
  readonly conferences: readonly Conference[];
  readonly submissionsById: ReadonlyMap<string, Submission>;
  readonly conferencesById: ReadonlyMap<string, Conference>;
  readonly minAbstractLeadTimeDays: number;
  readonly minPaperLeadTimeDays: number;
  readonly maxConcurrentSubmissions: number;
  readonly defaultPaperLeadTimeMonths: number;
  /** Duration of an abstract. */
  readonly workItemDurationDays: number;
  readonly blackoutDates: readonly string[];
  readonly penaltyCosts: PenaltyCosts;
  readonly penaltyThresholds: PenaltyThresholds;
  readonly priorityWeights: PriorityWeights;
  readonly scoringWeights: ScoringWeights;
  readonly schedulingOptions: SchedulingOptions;
  /** Conferences whose single-conference violations cost extra. */
  readonly topTierConferences: readonly string[];
  readonly schedulingStartDate: string | undefined;
}
