import {
  addDays,
  DAYS_PER_MONTH,
  laterDay,
  maxDay,
  minDay,
  todayDayString,
} from "./datetime.utils.js";
import { SCHEDULING_CONSTANTS } from "./constants.js";
import type {
  Conference,
  Config,
  Interval,
  Submission,
  SubmissionKind,
  SubmissionWorkflow,
} from "./types.js";

/**
 * Days a submission is active once started.
 *
 * Abstracts take `workItemDurationDays`. Papers and posters take their
 * draft window; without one, posters take a fixed 30 days and papers the
 * config's default paper lead time.
 */
export function durationDays(submission: Submission, config: Config): number {
  switch (submission.kind) {
    case "abstract":
      return config.workItemDurationDays;
    case "poster":
      return submission.draftWindowMonths > 0
        ? submission.draftWindowMonths * DAYS_PER_MONTH
        : SCHEDULING_CONSTANTS.POSTER_DURATION_DAYS;
    case "paper":
      return submission.draftWindowMonths > 0
        ? submission.draftWindowMonths * DAYS_PER_MONTH
        : config.defaultPaperLeadTimeMonths * DAYS_PER_MONTH;
  }
}

/**
 * The workflow a conference follows: explicit, or inferred from which
 * kinds have deadlines.
 */
export function effectiveWorkflow(conference: Conference): SubmissionWorkflow {
  if (conference.submissionTypes !== undefined) return conference.submissionTypes;

  const { abstract, paper, poster } = conference.deadlines;
  if (abstract && paper && poster) return "all_types";
  if (abstract && paper) return "abstract_or_paper";
  if (abstract) return "abstract_only";
  if (paper) return "paper_only";
  if (poster) return "poster_only";
  return "abstract_or_paper";
}

export function acceptsKind(conference: Conference, kind: SubmissionKind): boolean {
  const workflow = effectiveWorkflow(conference);
  switch (workflow) {
    case "all_types":
      return true;
    case "abstract_only":
      return kind === "abstract";
    case "paper_only":
      return kind === "paper";
    case "poster_only":
      return kind === "poster";
    case "abstract_then_paper":
    case "abstract_or_paper":
      return kind === "abstract" || kind === "paper";
  }
}

export function requiresAbstractBeforePaper(conference: Conference): boolean {
  return effectiveWorkflow(conference) === "abstract_then_paper";
}

/**
 * Engineering submissions may target any conference; others must stay away
 * from engineering venues.
 */
export function isTypeCompatible(submission: Submission, conference: Conference): boolean {
  return submission.engineering || conference.confType !== "ENGINEERING";
}

/**
 * The conference a scheduled submission targets: its fixed one, else the
 * venue a strategy recorded on the interval.
 */
export function resolvedConferenceId(
  submission: Submission,
  interval: Interval | undefined,
): string | undefined {
  return submission.conferenceId ?? interval?.conferenceId;
}

export function deadlineFor(
  submission: Submission,
  conferenceId: string | undefined,
  config: Config,
): string | undefined {
  if (conferenceId === undefined) return undefined;
  return config.conferencesById.get(conferenceId)?.deadlines[submission.kind];
}

/**
 * Days a submission must finish before its deadline.
 */
export function requiredLeadTimeDays(submission: Submission, config: Config): number {
  switch (submission.kind) {
    case "abstract":
      return config.minAbstractLeadTimeDays;
    case "paper":
      return config.minPaperLeadTimeDays;
    case "poster":
      return 0;
  }
}

/**
 * Identity shared by papers that denote the same work.
 *
 * `workId` when set, else the part before `-pap-` in the id, else the id.
 */
export function workKey(submission: Submission): string {
  if (submission.workId !== undefined) return submission.workId;
  const marker = submission.id.indexOf("-pap-");
  return marker > 0 ? submission.id.slice(0, marker) : submission.id;
}

/**
 * The abstract a paper at an abstract-then-paper conference relies on.
 *
 * Tried in order: the `<base>-abs-<conf>` sibling of a `<base>-pap-<conf>`
 * id, then the first abstract in `dependsOn` at the same conference. A
 * paper linked neither way has no abstract.
 */
export function expectedAbstractId(
  paper: Submission,
  conferenceId: string,
  config: Config,
): string | undefined {
  const marker = paper.id.indexOf("-pap-");
  if (marker > 0) {
    const sibling = `${paper.id.slice(0, marker)}-abs-${paper.id.slice(marker + 5)}`;
    if (config.submissionsById.has(sibling)) return sibling;
  }

  const isAbstractAt = (s: Submission | undefined): s is Submission =>
    s !== undefined &&
    s.kind === "abstract" &&
    (s.conferenceId === conferenceId || s.candidateConferences.includes(conferenceId));

  return paper.dependsOn.map((id) => config.submissionsById.get(id)).find(isAbstractAt)?.id;
}

/**
 * True when an abstract is listed as a dependency of some paper, in which
 * case it is ordered like a paper.
 */
export function isRequiredAbstract(submission: Submission, config: Config): boolean {
  if (submission.kind !== "abstract") return false;
  return config.submissions.some(
    (s) => s.kind === "paper" && s.dependsOn.includes(submission.id),
  );
}

/**
 * Ordering weight of a submission; higher goes first.
 */
export function priorityScore(submission: Submission, config: Config): number {
  const weights = config.priorityWeights;
  const kind = isRequiredAbstract(submission, config) ? "paper" : submission.kind;
  const base = weights[kind];
  return submission.engineering ? base * weights.engineering_paper : base;
}

/**
 * The abstract a paper must follow at its conference, when that conference
 * runs the explicit abstract-then-paper workflow.
 */
export function requiredAbstractId(
  submission: Submission,
  conferenceId: string | undefined,
  config: Config,
): string | undefined {
  if (submission.kind !== "paper" || conferenceId === undefined) return undefined;
  const conference = config.conferencesById.get(conferenceId);
  if (!conference || !requiresAbstractBeforePaper(conference)) return undefined;
  return expectedAbstractId(submission, conferenceId, config);
}

/**
 * Everything a submission must be ordered after: its declared dependencies
 * that exist, plus the abstract its fixed conference requires.
 */
export function orderingDependencies(submission: Submission, config: Config): string[] {
  const deps = submission.dependsOn.filter((id) => config.submissionsById.has(id));
  const abstractId = requiredAbstractId(submission, submission.conferenceId, config);
  if (abstractId !== undefined && abstractId !== submission.id && !deps.includes(abstractId)) {
    deps.push(abstractId);
  }
  return deps;
}

/**
 * Submissions that must be ordered after `id`.
 */
export function dependentsOf(id: string, config: Config): Submission[] {
  return config.submissions.filter((s) => orderingDependencies(s, config).includes(id));
}

/**
 * A topological order over {@link orderingDependencies} that picks the
 * best-ranked ready submission at every step.
 *
 * `rank` is a comparator (negative when `a` should go first). Declared
 * cycles are rejected at the config boundary; anything left over by an
 * implicit abstract edge is appended in rank order.
 */
export function priorityTopologicalOrder(
  config: Config,
  rank: (a: Submission, b: Submission) => number,
): Submission[] {
  const remaining = new Map<string, number>();
  const dependents = new Map<string, Submission[]>();
  for (const s of config.submissions) {
    const deps = orderingDependencies(s, config);
    remaining.set(s.id, deps.length);
    for (const dep of deps) {
      dependents.set(dep, [...(dependents.get(dep) ?? []), s]);
    }
  }

  const order: Submission[] = [];
  let ready = config.submissions.filter((s) => remaining.get(s.id) === 0);

  while (ready.length > 0) {
    const [next, ...rest] = ready.toSorted(rank);
    if (next === undefined) break;
    order.push(next);
    ready = rest;

    for (const dependent of dependents.get(next.id) ?? []) {
      const left = (remaining.get(dependent.id) ?? 0) - 1;
      remaining.set(dependent.id, left);
      if (left === 0) ready.push(dependent);
    }
  }

  if (order.length < config.submissions.length) {
    const placed = new Set(order.map((s) => s.id));
    order.push(...config.submissions.filter((s) => !placed.has(s.id)).toSorted(rank));
  }

  return order;
}

/**
 * Venues a strategy may place a submission at, in preference order.
 *
 * A fixed `conferenceId` is the only candidate. Otherwise the candidate
 * conferences that accept the kind and pass the type rule, with those
 * holding a deadline for one of `candidateKinds` first. An empty list means
 * the submission is placed without a venue.
 */
export function venueCandidates(submission: Submission, config: Config): string[] {
  if (submission.conferenceId !== undefined) return [submission.conferenceId];

  const eligible = submission.candidateConferences.filter((id) => {
    const conference = config.conferencesById.get(id);
    return (
      conference !== undefined &&
      acceptsKind(conference, submission.kind) &&
      isTypeCompatible(submission, conference)
    );
  });
  if (submission.candidateKinds.length === 0) return eligible;

  const preferred = (id: string) =>
    submission.candidateKinds.some((kind) => config.conferencesById.get(id)?.deadlines[kind]);
  return [...eligible.filter(preferred), ...eligible.filter((id) => !preferred(id))];
}

export interface SchedulingWindow {
  readonly start: string;
  /** Last day a submission may start. */
  readonly end: string;
}

/**
 * The span of start days every strategy searches.
 *
 * Starts at `schedulingStartDate`, else the earliest of every earliest-start
 * and engineering-ready date and every deadline minus a year, else `today`.
 * Ends 90 days after the latest deadline, and never less than a year after
 * the start.
 */
export function schedulingWindow(config: Config, today: string = todayDayString()): SchedulingWindow {
  const deadlines = config.conferences.flatMap((c) =>
    Object.values(c.deadlines).filter((d): d is string => d !== undefined),
  );
  const latestDeadline = maxDay(deadlines);

  const start =
    config.schedulingStartDate ??
    minDay([
      ...config.submissions.flatMap((s) =>
        [s.earliestStartDate, s.engineeringReadyDate].filter((d): d is string => d !== undefined),
      ),
      ...deadlines.map((d) => addDays(d, -SCHEDULING_CONSTANTS.REFERENCE_PERIOD_DAYS)),
    ]) ??
    today;

  const minimumEnd = addDays(start, SCHEDULING_CONSTANTS.REFERENCE_PERIOD_DAYS);
  const end =
    latestDeadline === undefined
      ? minimumEnd
      : laterDay(
          addDays(latestDeadline, SCHEDULING_CONSTANTS.CONFERENCE_RESPONSE_TIME_DAYS),
          minimumEnd,
        );
  return { start, end };
}

/**
 * Last start day that still meets the deadline and its lead time at
 * `conferenceId`; `undefined` when no deadline applies.
 */
export function latestStartFor(
  submission: Submission,
  conferenceId: string | undefined,
  config: Config,
): string | undefined {
  const deadline = deadlineFor(submission, conferenceId, config);
  if (deadline === undefined) return undefined;
  return addDays(
    deadline,
    -(durationDays(submission, config) + requiredLeadTimeDays(submission, config)),
  );
}

/**
 * Start no earlier than the submission's own lower bounds and `from`.
 */
export function earliestAllowedStart(submission: Submission, from: string): string {
  let start = from;
  if (submission.earliestStartDate !== undefined) start = laterDay(start, submission.earliestStartDate);
  if (submission.engineeringReadyDate !== undefined) {
    start = laterDay(start, submission.engineeringReadyDate);
  }
  return start;
}
