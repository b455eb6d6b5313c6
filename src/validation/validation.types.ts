/**
 * Violation and result shapes shared by every constraint family.
 *
 * Violations are plain values discriminated by `type`. A schedule with
 * violations is still a schedule; scorers price them and strategies use the
 * same checks to decide where a submission may go.
 */

export type Severity = "low" | "medium" | "high";

/** @category Validation */
export const CONSTRAINT_FAMILY = {
  DEADLINE: "deadline",
  DEPENDENCY: "dependency",
  RESOURCE: "resource",
  VENUE: "venue",
  SOFT_BLOCK: "soft_block",
} as const;

export type ConstraintFamily = (typeof CONSTRAINT_FAMILY)[keyof typeof CONSTRAINT_FAMILY];

export const CONSTRAINT_FAMILIES: readonly ConstraintFamily[] = [
  "deadline",
  "dependency",
  "resource",
  "venue",
  "soft_block",
];

/** Families whose violations make a placement illegal. */
export const HARD_CONSTRAINT_FAMILIES: readonly ConstraintFamily[] = [
  "deadline",
  "dependency",
  "resource",
  "venue",
];

interface ViolationBase {
  readonly description: string;
  readonly severity: Severity;
}

interface SubmissionViolationBase extends ViolationBase {
  readonly submissionId: string;
}

// =============================================================================
// Deadline family
// =============================================================================

export interface DeadlineViolation extends SubmissionViolationBase {
  readonly type: "deadline";
  readonly conferenceId: string;
  readonly deadline: string;
  readonly endDate: string;
  readonly daysLate: number;
}

export interface LeadTimeViolation extends SubmissionViolationBase {
  readonly type: "lead_time";
  readonly conferenceId: string;
  readonly deadline: string;
  readonly requiredDays: number;
  readonly actualDays: number;
  readonly daysShortage: number;
}

export interface EarliestStartViolation extends SubmissionViolationBase {
  readonly type: "earliest_start";
  readonly bound: "earliest_start" | "engineering_ready";
  readonly boundDate: string;
  readonly startDate: string;
  readonly daysEarly: number;
}

export interface BlackoutViolation extends SubmissionViolationBase {
  readonly type: "blackout";
  /** First blackout day inside the active days. */
  readonly date: string;
}

export type DeadlineFamilyViolation =
  | DeadlineViolation
  | LeadTimeViolation
  | EarliestStartViolation
  | BlackoutViolation;

// =============================================================================
// Dependency family
// =============================================================================

export interface InvalidDependencyViolation extends SubmissionViolationBase {
  readonly type: "invalid_dependency";
  readonly dependencyId: string;
}

export interface MissingDependencyViolation extends SubmissionViolationBase {
  readonly type: "missing_dependency";
  readonly dependencyId: string;
}

export interface DependencyTimingViolation extends SubmissionViolationBase {
  readonly type: "timing";
  readonly dependencyId: string;
  /** Days the dependency runs past the allowed overlap. */
  readonly daysViolation: number;
}

export type AbstractPaperIssue = "missing_abstract" | "not_scheduled" | "timing" | "not_declared";

export interface AbstractPaperViolation extends SubmissionViolationBase {
  readonly type: "abstract_paper";
  readonly issue: AbstractPaperIssue;
  readonly conferenceId: string;
  readonly abstractId: string | undefined;
}

export type DependencyFamilyViolation =
  | InvalidDependencyViolation
  | MissingDependencyViolation
  | DependencyTimingViolation
  | AbstractPaperViolation;

// =============================================================================
// Resource family
// =============================================================================

export interface ResourceViolation extends ViolationBase {
  readonly type: "resource";
  readonly date: string;
  readonly load: number;
  readonly limit: number;
  readonly excess: number;
  /** Submissions active on `date`, sorted. */
  readonly submissionIds: readonly string[];
}

// =============================================================================
// Venue family
// =============================================================================

export interface UnknownConferenceViolation extends SubmissionViolationBase {
  readonly type: "unknown_conference";
  readonly conferenceId: string;
}

export interface KindNotAcceptedViolation extends SubmissionViolationBase {
  readonly type: "kind_not_accepted";
  readonly conferenceId: string;
}

export interface TypeMismatchViolation extends SubmissionViolationBase {
  readonly type: "type_mismatch";
  readonly conferenceId: string;
}

export interface SingleConferenceViolation extends SubmissionViolationBase {
  readonly type: "single_conference";
  readonly conferenceId: string;
  readonly otherSubmissionId: string;
  readonly daysApart: number;
}

export type VenueFamilyViolation =
  | UnknownConferenceViolation
  | KindNotAcceptedViolation
  | TypeMismatchViolation
  | SingleConferenceViolation;

// =============================================================================
// Soft-block family
// =============================================================================

export interface SoftBlockViolation extends SubmissionViolationBase {
  readonly type: "soft_block";
  readonly earliestStartDate: string;
  readonly startDate: string;
  /** Signed days from the earliest start date to the actual start. */
  readonly daysOffset: number;
  readonly daysBeyondWindow: number;
}

// =============================================================================
// Results
// =============================================================================

/**
 * One family's verdict on a single submission.
 *
 * `applies` is false when none of the family's rules concern the
 * submission, in which case `violations` is empty.
 */
export interface SubmissionCheck<V extends ScheduleViolation> {
  readonly applies: boolean;
  readonly violations: readonly V[];
}

export type ScheduleViolation =
  | DeadlineFamilyViolation
  | DependencyFamilyViolation
  | ResourceViolation
  | VenueFamilyViolation
  | SoftBlockViolation;

export type ViolationType = ScheduleViolation["type"];

/**
 * Outcome of one constraint family.
 *
 * Subjects the family does not apply to (no conference, no deadline, no
 * earliest start) count toward neither `total` nor `compliant`.
 *
 * @category Validation
 */
export interface ValidationResult<V extends ScheduleViolation = ScheduleViolation> {
  readonly family: ConstraintFamily;
  readonly isValid: boolean;
  readonly violations: readonly V[];
  /** `compliant / total × 100`; 100 when nothing applies. */
  readonly complianceRate: number;
  readonly total: number;
  readonly compliant: number;
  readonly summary: string;
}

/**
 * Every family's result plus aggregates.
 *
 * @category Validation
 */
export interface ScheduleValidationReport {
  /** True when every hard family is valid; soft-block violations do not count. */
  readonly isValid: boolean;
  /** Mean of the family compliance rates. */
  readonly complianceRate: number;
  readonly families: {
    readonly deadline: ValidationResult<DeadlineFamilyViolation>;
    readonly dependency: ValidationResult<DependencyFamilyViolation>;
    readonly resource: ValidationResult<ResourceViolation>;
    readonly venue: ValidationResult<VenueFamilyViolation>;
    readonly soft_block: ValidationResult<SoftBlockViolation>;
  };
  /** All violations, in family order. */
  readonly violations: readonly ScheduleViolation[];
  readonly summary: string;
}
