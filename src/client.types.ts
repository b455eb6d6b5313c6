/**
 * Solver transport types and status constants.
 *
 * Types are derived from the Zod schemas so validation and types stay in sync.
 *
 * @see client.schemas.ts for the source Zod schemas
 */

import type { z } from "zod";
import type {
  SolverTermSchema,
  SolverVariableSchema,
  SolverConstraintSchema,
  SolverObjectiveSchema,
  SolverRequestSchema,
  SolverResponseSchema,
  SolverStatusSchema,
  SoftConstraintViolationSchema,
} from "./client.schemas.js";

// --------------------------------------------------------------------------
// Types derived from Zod schemas
// --------------------------------------------------------------------------

/**
 * A single linear term: `coeff × var`.
 */
export type SolverTerm = z.infer<typeof SolverTermSchema>;

/**
 * A decision variable: a boolean, or an integer with inclusive bounds.
 */
export type SolverVariable = z.infer<typeof SolverVariableSchema>;

/**
 * A `linear`, `soft_linear` or `exactly_one` constraint.
 */
export type SolverConstraint = z.infer<typeof SolverConstraintSchema>;

export type SolverObjective = z.infer<typeof SolverObjectiveSchema>;

/**
 * The full request payload sent to the solver service.
 *
 * - `variables`, `constraints` (required)
 * - `objective` (optional)
 * - `options.timeLimitSeconds` (optional): the solver's own budget
 */
export type SolverRequest = z.infer<typeof SolverRequestSchema>;

/**
 * The response payload returned by the solver service.
 *
 * - `status` (required): see {@link SolverStatus}
 * - `values` (optional): variable assignments when a solution is found
 * - `softViolations` (optional): which soft constraints were broken
 * - `error`, `solutionInfo` (optional): diagnostics
 */
export type SolverResponse = z.infer<typeof SolverResponseSchema>;

/**
 * Solver outcome status.
 *
 * @category Solver
 */
export type SolverStatus = z.infer<typeof SolverStatusSchema>;

export type SoftConstraintViolation = z.infer<typeof SoftConstraintViolationSchema>;

// --------------------------------------------------------------------------
// Status constants
// --------------------------------------------------------------------------

/** Convenience constants for {@link SolverStatus} values. */
export const SOLVER_STATUS = {
  OPTIMAL: "OPTIMAL",
  FEASIBLE: "FEASIBLE",
  INFEASIBLE: "INFEASIBLE",
  TIMEOUT: "TIMEOUT",
  ERROR: "ERROR",
} as const;

// --------------------------------------------------------------------------
// Client interface
// --------------------------------------------------------------------------

/** A `fetch` function or an object with a `fetch` method. */
export type FetcherLike =
  | typeof fetch
  | {
      fetch: typeof fetch;
    };

/**
 * Sends solver requests and returns parsed responses.
 *
 * Implementations should honor `signal` so callers can enforce a wall-clock
 * budget.
 *
 * @category Solver
 */
export interface SolverClient {
  solve(request: SolverRequest, options?: { signal?: AbortSignal }): Promise<SolverResponse>;
}
