import type { SolverClient, SolverResponse, SolverStatus } from "../client.types.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import { schedulingWindow } from "../model.js";
import { ScheduleBuilder } from "../schedule.js";
import { decodeStartDays } from "../solver/response.js";
import { buildScheduleModel } from "../solver/schedule-model.js";
import type { Config, Schedule } from "../types.js";
import type { SchedulerOptions } from "./scheduler.types.js";

export interface OptimalSchedulerOptions extends SchedulerOptions {
  client: SolverClient;
}

/**
 * Outcome of an optimal run.
 *
 * `schedule` is empty unless `status` is `OPTIMAL` or `FEASIBLE`.
 *
 * @category Schedulers
 */
export interface OptimalResult {
  readonly status: SolverStatus;
  readonly schedule: Schedule;
  readonly error?: string;
}

function isAbort(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

/**
 * Settles with `promise`, or rejects with a `TimeoutError` once `signal`
 * aborts, whichever comes first. Clients that ignore the signal are still
 * cut off.
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal, budgetMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      const error = new Error(`Solver gave no answer within ${budgetMs} ms`);
      error.name = "TimeoutError";
      reject(error);
    };
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Exact strategy backed by an external solver.
 *
 * Builds the time-indexed model, sends it through the {@link SolverClient}
 * with a wall-clock budget of `timeLimitSeconds`, and decodes the chosen
 * start days. Unsolvable models, solver failures, thrown errors and
 * timeouts all come back as an empty schedule with a status.
 *
 * @example
 * ```typescript
 * const optimal = new OptimalScheduler({ client: new HttpSolverClient() });
 * const { status, schedule } = await optimal.solve(config);
 * if (schedule.size === 0) {
 *   // fall back to another strategy
 * }
 * ```
 *
 * @category Schedulers
 */
export class OptimalScheduler {
  readonly strategy = "optimal";
  readonly #client: SolverClient;
  readonly #logger: Logger;
  readonly #today: string | undefined;

  constructor(options: OptimalSchedulerOptions) {
    this.#client = options.client;
    this.#logger = options.logger ?? defaultLogger;
    this.#today = options.today;
  }

  async schedule(config: Config): Promise<Schedule> {
    const result = await this.solve(config);
    return result.schedule;
  }

  async solve(config: Config): Promise<OptimalResult> {
    const empty: Schedule = new Map();
    if (config.submissions.length === 0) {
      return { status: "OPTIMAL", schedule: empty };
    }

    const window = schedulingWindow(config, this.#today);
    const model = buildScheduleModel(config, window);
    const { compilation } = model;

    if (!compilation.canSolve) {
      const error = compilation.issues.join("; ");
      this.#logger.warn({ strategy: this.strategy, issues: compilation.issues }, "model is infeasible");
      return { status: "INFEASIBLE", schedule: empty, error };
    }

    const budgetMs = config.schedulingOptions.timeLimitSeconds * 1000;
    let response: SolverResponse;
    try {
      const signal = AbortSignal.timeout(budgetMs);
      response = await untilAborted(
        this.#client.solve(compilation.request, { signal }),
        signal,
        budgetMs,
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const status: SolverStatus = isAbort(error) ? "TIMEOUT" : "ERROR";
      this.#logger.warn({ strategy: this.strategy, status, err: error }, "solver call failed");
      return { status, schedule: empty, error: message };
    }

    if (response.status !== "OPTIMAL" && response.status !== "FEASIBLE") {
      this.#logger.warn(
        { strategy: this.strategy, status: response.status, error: response.error },
        "solver returned no solution",
      );
      return {
        status: response.status,
        schedule: empty,
        error: response.error ?? response.solutionInfo,
      };
    }

    const builder = new ScheduleBuilder(config);
    for (const { submissionId, startDate } of decodeStartDays(response, window.start)) {
      const submission = config.submissionsById.get(submissionId);
      if (!submission) continue;
      const venue = submission.conferenceId === undefined ? model.venues.get(submissionId) : undefined;
      builder.place(submissionId, startDate, venue);
    }

    const schedule = builder.build();
    this.#logger.info(
      {
        strategy: this.strategy,
        status: response.status,
        scheduled: schedule.size,
        total: config.submissions.length,
        solveTimeMs: response.statistics?.solveTimeMs,
      },
      "schedule built",
    );
    return { status: response.status, schedule };
  }
}
