import type { SolverResponse } from "../client.types.js";
import { addDays } from "../datetime.utils.js";

/**
 * A start day chosen by the solver.
 *
 * @category Solver
 */
export interface StartAssignment {
  submissionId: string;
  /** Days after the window start. */
  offset: number;
  /** YYYY-MM-DD. */
  startDate: string;
}

/**
 * Extracts chosen start days from a solver response.
 *
 * Reads the boolean variables named `x:${submissionId}:${offset}` that are
 * set to 1. The offset follows the last colon, so submission ids may
 * themselves contain colons. Responses without a solution decode to
 * nothing.
 *
 * @category Solver
 *
 * @example
 * ```typescript
 * const response = await client.solve(model.compilation.request);
 * for (const { submissionId, startDate } of decodeStartDays(response, model.window.start)) {
 *   console.log(`${submissionId} starts ${startDate}`);
 * }
 * ```
 */
export function decodeStartDays(response: SolverResponse, windowStart: string): StartAssignment[] {
  if (response.status !== "OPTIMAL" && response.status !== "FEASIBLE") return [];

  const assignments: StartAssignment[] = [];
  for (const [varName, value] of Object.entries(response.values ?? {})) {
    if (value !== 1) continue;
    if (!varName.startsWith("x:")) continue;

    const separator = varName.lastIndexOf(":");
    const submissionId = varName.slice(2, separator);
    const offsetText = varName.slice(separator + 1);
    if (!submissionId || !/^\d+$/.test(offsetText)) continue;

    const offset = Number(offsetText);
    assignments.push({ submissionId, offset, startDate: addDays(windowStart, offset) });
  }

  return assignments.toSorted(
    (a, b) => a.offset - b.offset || (a.submissionId < b.submissionId ? -1 : 1),
  );
}
