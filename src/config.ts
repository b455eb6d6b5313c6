import type { z } from "zod";
import { ConfigInputSchema, type ParsedConfigInput } from "./config.schemas.js";
import { ConfigValidationError } from "./errors.js";
import type { Conference, Config, Submission } from "./types.js";

/**
 * Builds the validated, frozen {@link Config} from raw input.
 *
 * Parses with {@link ConfigInputSchema}, which fills every knob left out
 * with its default, then checks cross-references. All problems are
 * collected and thrown together.
 *
 * @throws ConfigValidationError when the input is malformed or inconsistent
 *
 * @example
 * ```typescript
 * const config = createConfig({
 *   submissions: [{ id: "p1", title: "Paper", kind: "paper", conferenceId: "ICML" }],
 *   conferences: [
 *     { id: "ICML", name: "ICML", confType: "ENGINEERING", deadlines: { paper: "2025-06-01" } },
 *   ],
 *   minAbstractLeadTimeDays: 0,
 *   minPaperLeadTimeDays: 0,
 *   maxConcurrentSubmissions: 2,
 * });
 * ```
 *
 * @category Config
 */
export function createConfig(input: unknown): Config {
  const result = ConfigInputSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(formatZodIssues(result.error));
  }

  const issues = findConfigIssues(result.data);
  if (issues.length > 0) {
    throw new ConfigValidationError(issues);
  }

  return freezeConfig(result.data);
}

/**
 * Returns every problem {@link createConfig} would report, without throwing.
 *
 * @category Config
 */
export function validateConfig(input: unknown): string[] {
  const result = ConfigInputSchema.safeParse(input);
  if (!result.success) return formatZodIssues(result.error);
  return findConfigIssues(result.data);
}

function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function findConfigIssues(input: ParsedConfigInput): string[] {
  const issues: string[] = [];

  if (input.maxConcurrentSubmissions < 1) {
    issues.push("maxConcurrentSubmissions must be at least 1");
  }

  const conferenceIds = new Set<string>();
  for (const conference of input.conferences) {
    if (conference.id.trim() === "") issues.push("Conference missing id");
    if (conference.name.trim() === "") issues.push(`Conference ${conference.id}: missing name`);
    if (Object.values(conference.deadlines).every((d) => d === undefined)) {
      issues.push(`Conference ${conference.id}: no deadlines defined`);
    }
    if (conferenceIds.has(conference.id)) {
      issues.push(`Duplicate conference id: ${conference.id}`);
    }
    conferenceIds.add(conference.id);
  }

  const submissionIds = new Set<string>();
  for (const submission of input.submissions) {
    if (submissionIds.has(submission.id)) {
      issues.push(`Duplicate submission id: ${submission.id}`);
    }
    submissionIds.add(submission.id);
  }

  for (const submission of input.submissions) {
    const { id } = submission;
    if (submission.conferenceId !== undefined && !conferenceIds.has(submission.conferenceId)) {
      issues.push(`Submission ${id} references unknown conference ${submission.conferenceId}`);
    }
    for (const candidate of submission.candidateConferences) {
      if (!conferenceIds.has(candidate)) {
        issues.push(`Submission ${id} lists unknown candidate conference ${candidate}`);
      }
    }
    for (const dep of submission.dependsOn) {
      if (!submissionIds.has(dep)) {
        issues.push(`Submission ${id} depends on nonexistent submission ${dep}`);
      }
    }
    if (
      submission.kind === "paper" &&
      submission.conferenceId === undefined &&
      submission.candidateConferences.length === 0
    ) {
      issues.push(`Paper ${id} needs a conferenceId or candidateConferences`);
    }
  }

  for (const cycle of findDependencyCycles(input.submissions)) {
    issues.push(`Circular dependency: ${cycle.join(" -> ")}`);
  }

  return issues;
}

/**
 * Finds dependency cycles with a depth-first traversal.
 *
 * Each cycle is returned once as a closed path (first id repeated at the
 * end). Dangling dependency ids are ignored here.
 */
export function findDependencyCycles(
  submissions: ReadonlyArray<{ id: string; dependsOn: readonly string[] }>,
): string[][] {
  const edges = new Map(submissions.map((s) => [s.id, s.dependsOn]));
  const state = new Map<string, "visiting" | "done">();
  const stack: string[] = [];
  const cycles: string[][] = [];

  const visit = (id: string): void => {
    state.set(id, "visiting");
    stack.push(id);
    for (const dep of edges.get(id) ?? []) {
      if (!edges.has(dep)) continue;
      const depState = state.get(dep);
      if (depState === "visiting") {
        cycles.push([...stack.slice(stack.indexOf(dep)), dep]);
      } else if (depState === undefined) {
        visit(dep);
      }
    }
    stack.pop();
    state.set(id, "done");
  };

  for (const { id } of submissions) {
    if (!state.has(id)) visit(id);
  }
  return cycles;
}

function freezeConfig(input: ParsedConfigInput): Config {
  const submissions: Submission[] = input.submissions.map((s) =>
    Object.freeze({
      id: s.id,
      title: s.title,
      kind: s.kind,
      conferenceId: s.conferenceId,
      dependsOn: Object.freeze([...s.dependsOn]),
      draftWindowMonths: s.draftWindowMonths,
      leadTimeFromParents: s.leadTimeFromParents,
      earliestStartDate: s.earliestStartDate,
      engineeringReadyDate: s.engineeringReadyDate,
      penaltyCostPerDay: s.penaltyCostPerDay,
      engineering: s.engineering,
      candidateConferences: Object.freeze([...s.candidateConferences]),
      candidateKinds: Object.freeze([...s.candidateKinds]),
      workId: s.workId,
    }),
  );

  const conferences: Conference[] = input.conferences.map((c) =>
    Object.freeze({
      id: c.id,
      name: c.name,
      confType: c.confType,
      recurrence: c.recurrence,
      deadlines: Object.freeze({ ...c.deadlines }),
      submissionTypes: c.submissionTypes,
    }),
  );

  return Object.freeze({
    submissions: Object.freeze(submissions),
    conferences: Object.freeze(conferences),
    submissionsById: new Map(submissions.map((s) => [s.id, s])),
    conferencesById: new Map(conferences.map((c) => [c.id, c])),
    minAbstractLeadTimeDays: input.minAbstractLeadTimeDays,
    minPaperLeadTimeDays: input.minPaperLeadTimeDays,
    maxConcurrentSubmissions: input.maxConcurrentSubmissions,
    defaultPaperLeadTimeMonths: input.defaultPaperLeadTimeMonths,
    workItemDurationDays: input.workItemDurationDays,
    blackoutDates: Object.freeze([...new Set(input.blackoutDates)].sort()),
    penaltyCosts: Object.freeze({ ...input.penaltyCosts }),
    penaltyThresholds: Object.freeze({ ...input.penaltyThresholds }),
    priorityWeights: Object.freeze({ ...input.priorityWeights }),
    scoringWeights: Object.freeze({ ...input.scoringWeights }),
    schedulingOptions: Object.freeze({ ...input.schedulingOptions }),
    topTierConferences: Object.freeze([...input.topTierConferences]),
    schedulingStartDate: input.schedulingStartDate,
  });
}
