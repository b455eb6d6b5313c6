/**
 * Zod schemas for the solver transport.
 *
 * The optimal strategy builds requests in this shape and the solver service
 * answers with a {@link SolverResponseSchema} payload. Types are derived with
 * `z.infer` in `client.types.ts`.
 *
 * @see client.types.ts for the derived TypeScript types
 */

import { z } from "zod";

// --------------------------------------------------------------------------
// Variables
// --------------------------------------------------------------------------

export const SolverTermSchema = z.object({
  var: z.string(),
  coeff: z.number(),
});

export const BoolVariableSchema = z.object({
  type: z.literal("bool"),
  name: z.string(),
});

export const IntVariableSchema = z.object({
  type: z.literal("int"),
  name: z.string(),
  min: z.number(),
  max: z.number(),
});

export const SolverVariableSchema = z.discriminatedUnion("type", [
  BoolVariableSchema,
  IntVariableSchema,
]);

// --------------------------------------------------------------------------
// Constraints
// --------------------------------------------------------------------------

export const LinearConstraintSchema = z.object({
  type: z.literal("linear"),
  terms: z.array(SolverTermSchema),
  op: z.enum(["<=", ">=", "=="]),
  rhs: z.number(),
});

/** Linear bound the solver may break at `penalty` per unit of violation. */
export const SoftLinearConstraintSchema = z.object({
  type: z.literal("soft_linear"),
  terms: z.array(SolverTermSchema),
  op: z.enum(["<=", ">="]),
  rhs: z.number(),
  penalty: z.number(),
  id: z.string().optional(),
});

export const ExactlyOneConstraintSchema = z.object({
  type: z.literal("exactly_one"),
  vars: z.array(z.string()),
});

export const SolverConstraintSchema = z.discriminatedUnion("type", [
  LinearConstraintSchema,
  SoftLinearConstraintSchema,
  ExactlyOneConstraintSchema,
]);

// --------------------------------------------------------------------------
// Objective and options
// --------------------------------------------------------------------------

export const SolverObjectiveSchema = z.object({
  sense: z.enum(["minimize", "maximize"]),
  terms: z.array(SolverTermSchema),
});

export const SolverOptionsSchema = z.object({
  timeLimitSeconds: z.number().optional(),
  solutionLimit: z.number().optional(),
});

// --------------------------------------------------------------------------
// Request/Response
// --------------------------------------------------------------------------

export const SolverRequestSchema = z.object({
  variables: z.array(SolverVariableSchema),
  constraints: z.array(SolverConstraintSchema),
  objective: SolverObjectiveSchema.optional(),
  options: SolverOptionsSchema.optional(),
});

export const SolverStatusSchema = z.enum(["OPTIMAL", "FEASIBLE", "INFEASIBLE", "TIMEOUT", "ERROR"]);

export const SolverStatisticsSchema = z.object({
  solveTimeMs: z.number().optional(),
  conflicts: z.number().optional(),
  branches: z.number().optional(),
});

export const SoftConstraintViolationSchema = z.object({
  constraintId: z.string(),
  violationAmount: z.number(),
  targetValue: z.number(),
  actualValue: z.number(),
});

export const SolverResponseSchema = z.object({
  status: SolverStatusSchema,
  values: z.record(z.string(), z.number()).optional(),
  statistics: SolverStatisticsSchema.optional(),
  error: z.string().optional(),
  solutionInfo: z.string().optional(),
  softViolations: z.array(SoftConstraintViolationSchema).optional(),
});
