import type {
  SolverConstraint,
  SolverRequest,
  SolverTerm,
  SolverVariable,
} from "../client.types.js";

export type Term = SolverTerm;

export interface CompilationResult {
  request: SolverRequest;
  /** Reasons the model cannot be solved, found while building it. */
  issues: readonly string[];
  canSolve: boolean;
}

/**
 * Variable name of the boolean "submission `id` starts at day `offset`".
 */
export function startChoiceVar(submissionId: string, offset: number): string {
  return `x:${submissionId}:${offset}`;
}

/**
 * Variable name of a submission's integer start offset.
 */
export function startOffsetVar(submissionId: string): string {
  return `start:${submissionId}`;
}

export const MAKESPAN_VAR = "makespan";

/**
 * Accumulates variables, constraints and objective terms and emits a
 * {@link SolverRequest}.
 *
 * Variables are declared idempotently: asking for the same name twice
 * returns it, asking with a different type or bounds throws.
 */
export class SolverModelBuilder {
  readonly options: SolverRequest["options"] | undefined;

  #variables = new Map<string, SolverVariable>();
  #constraints: SolverConstraint[] = [];
  #objective: Term[] = [];
  #issues: string[] = [];
  #built: CompilationResult | undefined;

  constructor(options?: SolverRequest["options"]) {
    this.options = options;
  }

  boolVar(name: string): string {
    const existing = this.#variables.get(name);
    if (existing) {
      if (existing.type !== "bool") {
        throw new Error(`Variable ${name} already exists with different type`);
      }
      return name;
    }

    this.#variables.set(name, { type: "bool", name });
    return name;
  }

  intVar(name: string, min: number, max: number): string {
    const existing = this.#variables.get(name);
    if (existing) {
      if (existing.type !== "int" || existing.min !== min || existing.max !== max) {
        throw new Error(`Variable ${name} already exists with different bounds`);
      }
      return name;
    }

    this.#variables.set(name, { type: "int", name, min, max });
    return name;
  }

  hasVar(name: string): boolean {
    return this.#variables.has(name);
  }

  addLinear(terms: Term[], op: "<=" | ">=" | "==", rhs: number): void {
    this.#constraints.push({ type: "linear", terms, op, rhs });
  }

  addSoftLinear(terms: Term[], op: "<=" | ">=", rhs: number, penalty: number, id?: string): void {
    this.#constraints.push({ type: "soft_linear", terms, op, rhs, penalty, id });
  }

  addExactlyOne(vars: string[]): void {
    if (vars.length === 0) return;
    this.#constraints.push({ type: "exactly_one", vars });
  }

  addPenalty(varName: string, weight: number): void {
    // Integer coefficients only.
    const rounded = Math.round(weight);
    if (rounded === 0) return;
    this.#objective.push({ var: varName, coeff: rounded });
  }

  /**
   * Records that the model has no solution, so the caller can skip the
   * solver round trip.
   */
  reportUnsolvable(reason: string): void {
    this.#issues.push(reason);
  }

  hasIssues(): boolean {
    return this.#issues.length > 0;
  }

  compile(): CompilationResult {
    if (this.#built) return this.#built;
    this.#built = {
      request: {
        variables: Array.from(this.#variables.values()),
        constraints: this.#constraints,
        objective:
          this.#objective.length > 0 ? { sense: "minimize", terms: this.#objective } : undefined,
        options: this.options,
      },
      issues: [...this.#issues],
      canSolve: this.#issues.length === 0,
    };
    return this.#built;
  }
}
