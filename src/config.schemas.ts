/**
 * Zod schemas for raw planner input.
 *
 * These define what `createConfig` accepts. Shapes are checked here;
 * cross-references (duplicate ids, dangling references, cycles) are checked
 * afterwards in `config.ts`.
 *
 * @see config.ts for the semantic checks and the frozen `Config` it builds
 */

import * as z from "zod";
import {
  DEFAULT_PENALTY_COSTS,
  DEFAULT_PENALTY_THRESHOLDS,
  DEFAULT_PRIORITY_WEIGHTS,
  DEFAULT_SCHEDULING_OPTIONS,
  DEFAULT_SCORING_WEIGHTS,
} from "./constants.js";
import { isDayString } from "./datetime.utils.js";

// --------------------------------------------------------------------------
// Primitives
// --------------------------------------------------------------------------

export const DayStringSchema = z
  .string()
  .refine(isDayString, { message: "Expected a calendar day in YYYY-MM-DD format" });

export const SubmissionKindSchema = z.enum(["abstract", "paper", "poster"]);

export const ConferenceTypeSchema = z.enum(["MEDICAL", "ENGINEERING"]);

export const ConferenceRecurrenceSchema = z.enum(["annual", "biennial", "quarterly"]);

export const SubmissionWorkflowSchema = z.enum([
  "abstract_only",
  "paper_only",
  "poster_only",
  "abstract_then_paper",
  "abstract_or_paper",
  "all_types",
]);

const NonNegative = z.number().finite().min(0);
const NonNegativeInt = z.number().int().min(0);

// --------------------------------------------------------------------------
// Entities
// --------------------------------------------------------------------------

export const SubmissionInputSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  kind: SubmissionKindSchema,
  conferenceId: z.string().min(1).optional(),
  dependsOn: z.array(z.string()).default([]),
  draftWindowMonths: NonNegativeInt.default(3),
  leadTimeFromParents: NonNegativeInt.default(0),
  earliestStartDate: DayStringSchema.optional(),
  engineeringReadyDate: DayStringSchema.optional(),
  penaltyCostPerDay: NonNegative.optional(),
  engineering: z.boolean().default(false),
  candidateConferences: z.array(z.string()).default([]),
  candidateKinds: z.array(SubmissionKindSchema).default([]),
  workId: z.string().min(1).optional(),
});

export const DeadlinesSchema = z.object({
  abstract: DayStringSchema.optional(),
  paper: DayStringSchema.optional(),
  poster: DayStringSchema.optional(),
});

export const ConferenceInputSchema = z.object({
  id: z.string(),
  name: z.string(),
  confType: ConferenceTypeSchema,
  recurrence: ConferenceRecurrenceSchema.default("annual"),
  deadlines: DeadlinesSchema,
  submissionTypes: SubmissionWorkflowSchema.optional(),
});

// --------------------------------------------------------------------------
// Knob tables
// --------------------------------------------------------------------------

// Every knob defaults field by field, so an omitted key and a key set to
// undefined both parse to the value in constants.ts.

const costs = DEFAULT_PENALTY_COSTS;

export const PenaltyCostsInputSchema = z.object({
  default_mod_penalty_per_day: NonNegative.default(costs.default_mod_penalty_per_day),
  default_paper_penalty_per_day: NonNegative.default(costs.default_paper_penalty_per_day),
  default_dependency_violation_penalty: NonNegative.default(
    costs.default_dependency_violation_penalty,
  ),
  default_monthly_slip_penalty: NonNegative.default(costs.default_monthly_slip_penalty),
  default_full_year_deferral_penalty: NonNegative.default(costs.default_full_year_deferral_penalty),
  missed_abstract_penalty: NonNegative.default(costs.missed_abstract_penalty),
  missed_poster_penalty: NonNegative.default(costs.missed_poster_penalty),
  missed_abstract_paper_penalty: NonNegative.default(costs.missed_abstract_paper_penalty),
  resource_violation_penalty: NonNegative.default(costs.resource_violation_penalty),
  soft_block_violation_penalty: NonNegative.default(costs.soft_block_violation_penalty),
  single_conference_violation_penalty: NonNegative.default(
    costs.single_conference_violation_penalty,
  ),
  lead_time_violation_penalty: NonNegative.default(costs.lead_time_violation_penalty),
  conference_compatibility_penalty: NonNegative.default(costs.conference_compatibility_penalty),
  abstract_paper_dependency_penalty: NonNegative.default(costs.abstract_paper_dependency_penalty),
  blackout_violation_penalty: NonNegative.default(costs.blackout_violation_penalty),
});

export const PenaltyThresholdsInputSchema = z.object({
  monthsDelay: NonNegativeInt.default(DEFAULT_PENALTY_THRESHOLDS.monthsDelay),
  abstractMissed: NonNegativeInt.default(DEFAULT_PENALTY_THRESHOLDS.abstractMissed),
  paperMissed: NonNegativeInt.default(DEFAULT_PENALTY_THRESHOLDS.paperMissed),
  posterMissed: NonNegativeInt.default(DEFAULT_PENALTY_THRESHOLDS.posterMissed),
});

export const PriorityWeightsInputSchema = z.object({
  paper: NonNegative.default(DEFAULT_PRIORITY_WEIGHTS.paper),
  abstract: NonNegative.default(DEFAULT_PRIORITY_WEIGHTS.abstract),
  poster: NonNegative.default(DEFAULT_PRIORITY_WEIGHTS.poster),
  engineering_paper: NonNegative.default(DEFAULT_PRIORITY_WEIGHTS.engineering_paper),
});

export const ScoringWeightsInputSchema = z.object({
  qualityDeadline: NonNegative.default(DEFAULT_SCORING_WEIGHTS.qualityDeadline),
  qualityDependency: NonNegative.default(DEFAULT_SCORING_WEIGHTS.qualityDependency),
  qualityResource: NonNegative.default(DEFAULT_SCORING_WEIGHTS.qualityResource),
  qualitySecondary: z.number().min(0).max(1).default(DEFAULT_SCORING_WEIGHTS.qualitySecondary),
  efficiencyResource: NonNegative.default(DEFAULT_SCORING_WEIGHTS.efficiencyResource),
  efficiencyTimeline: NonNegative.default(DEFAULT_SCORING_WEIGHTS.efficiencyTimeline),
});

const options = DEFAULT_SCHEDULING_OPTIONS;

export const SchedulingOptionsInputSchema = z.object({
  enableBlackoutPeriods: z.boolean().default(options.enableBlackoutPeriods),
  maxBacktracks: NonNegativeInt.default(options.maxBacktracks),
  lookaheadWindowDays: NonNegativeInt.default(options.lookaheadWindowDays),
  lookaheadBonusIncrement: NonNegative.default(options.lookaheadBonusIncrement),
  randomnessFactor: NonNegative.default(options.randomnessFactor),
  jitterDays: NonNegativeInt.default(options.jitterDays),
  timeLimitSeconds: z.number().positive().default(options.timeLimitSeconds),
  makespanWeight: NonNegative.default(options.makespanWeight),
});

// --------------------------------------------------------------------------
// Config
// --------------------------------------------------------------------------

export const ConfigInputSchema = z.object({
  submissions: z.array(SubmissionInputSchema),
  conferences: z.array(ConferenceInputSchema),
  minAbstractLeadTimeDays: NonNegativeInt,
  minPaperLeadTimeDays: NonNegativeInt,
  // Range is checked semantically so the message names the rule.
  maxConcurrentSubmissions: z.number().int(),
  defaultPaperLeadTimeMonths: NonNegativeInt.default(3),
  workItemDurationDays: NonNegativeInt.default(14),
  blackoutDates: z.array(DayStringSchema).default([]),
  penaltyCosts: PenaltyCostsInputSchema.default({}),
  penaltyThresholds: PenaltyThresholdsInputSchema.default({}),
  priorityWeights: PriorityWeightsInputSchema.default({}),
  scoringWeights: ScoringWeightsInputSchema.default({}),
  schedulingOptions: SchedulingOptionsInputSchema.default({}),
  topTierConferences: z.array(z.string()).default([]),
  schedulingStartDate: DayStringSchema.optional(),
});

/**
 * Raw config as callers write it (defaults optional).
 *
 * - `submissions`, `conferences` (required)
 * - `minAbstractLeadTimeDays`, `minPaperLeadTimeDays`, `maxConcurrentSubmissions` (required)
 * - every other knob (optional): defaults from `constants.ts`
 */
export type ConfigInput = z.input<typeof ConfigInputSchema>;

export type SubmissionInput = z.input<typeof SubmissionInputSchema>;

export type ConferenceInput = z.input<typeof ConferenceInputSchema>;

export type ParsedConfigInput = z.output<typeof ConfigInputSchema>;
