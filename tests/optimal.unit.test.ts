import { describe, expect, it } from "vitest";
import type { SolverClient } from "../src/client.types.js";
import { SolverRequestError } from "../src/errors.js";
import { OptimalScheduler } from "../src/schedulers/optimal.js";
import { HeuristicScheduler } from "../src/schedulers/heuristic.js";
import {
  compareStrategies,
  CONSTRUCTIVE_STRATEGIES,
  createScheduler,
  runStrategy,
} from "../src/schedulers/registry.js";
import { abstract, conference, makeConfig, paper, starts, StubSolverClient } from "./helpers.js";

const config = makeConfig({ submissions: [abstract("a1"), abstract("a2")] });

describe("OptimalScheduler", () => {
  it("decodes the chosen start days into a schedule", async () => {
    const client = new StubSolverClient({
      status: "OPTIMAL",
      values: { "x:a1:0": 1, "x:a1:1": 0, "x:a2:14": 1, "start:a2": 14, makespan: 28 },
    });

    const result = await new OptimalScheduler({ client }).solve(config);

    expect(result.status).toBe("OPTIMAL");
    expect(starts(result.schedule)).toEqual({ a1: "2025-01-01", a2: "2025-01-15" });
    expect(client.requests).toHaveLength(1);
    const exactlyOne = client.requests[0]?.constraints.filter((c) => c.type === "exactly_one");
    expect(exactlyOne).toHaveLength(2);
  });

  it("records the venue the model pinned a candidate submission to", async () => {
    const withVenue = makeConfig({
      submissions: [paper("p1", { candidateConferences: ["C1"] })],
      conferences: [conference("C1", { paper: "2025-06-01" })],
    });
    const client = new StubSolverClient({ status: "FEASIBLE", values: { "x:p1:3": 1 } });

    const schedule = await new OptimalScheduler({ client }).schedule(withVenue);

    expect(schedule.get("p1")).toEqual({
      startDate: "2025-01-04",
      endDate: "2025-04-04",
      conferenceId: "C1",
    });
  });

  it("returns an empty schedule with the solver's status when there is no solution", async () => {
    const client = new StubSolverClient({ status: "INFEASIBLE", error: "no solution" });
    const result = await new OptimalScheduler({ client }).solve(config);
    expect(result).toEqual({ status: "INFEASIBLE", schedule: new Map(), error: "no solution" });
  });

  it("maps a failing solver call to ERROR", async () => {
    const client: SolverClient = {
      solve: async () => {
        throw new SolverRequestError("Solver returned 500: boom", 500, "boom");
      },
    };
    const result = await new OptimalScheduler({ client }).solve(config);
    expect(result).toEqual({
      status: "ERROR",
      schedule: new Map(),
      error: "Solver returned 500: boom",
    });
  });

  it("gives up with TIMEOUT when the solver outlives the time limit", async () => {
    const slow: SolverClient = {
      solve: (_request, options) =>
        new Promise((_resolve, reject) => {
          options?.signal?.addEventListener("abort", () => {
            const error = new Error("aborted");
            error.name = "AbortError";
            reject(error);
          });
        }),
    };
    const quick = makeConfig({
      submissions: [abstract("a1")],
      schedulingOptions: { timeLimitSeconds: 0.01 },
    });

    const result = await new OptimalScheduler({ client: slow }).solve(quick);

    expect(result.status).toBe("TIMEOUT");
    expect(result.schedule.size).toBe(0);
  });

  it("gives up with TIMEOUT even when the client ignores the abort signal", async () => {
    const silent: SolverClient = { solve: () => new Promise(() => {}) };
    const quick = makeConfig({
      submissions: [abstract("a1")],
      schedulingOptions: { timeLimitSeconds: 0.05 },
    });

    const result = await new OptimalScheduler({ client: silent }).solve(quick);

    expect(result.status).toBe("TIMEOUT");
    expect(result.schedule.size).toBe(0);
    expect(result.error).toMatch(/^Solver gave no answer within/);
  });

  it("reports INFEASIBLE without calling the solver when a submission has no allowed day", async () => {
    const impossible = makeConfig({
      submissions: [paper("late", { conferenceId: "C1" })],
      conferences: [conference("C1", { paper: "2025-02-01" })],
    });
    const client = new StubSolverClient({ status: "OPTIMAL", values: {} });

    const result = await new OptimalScheduler({ client }).solve(impossible);

    expect(result.status).toBe("INFEASIBLE");
    expect(result.error).toBe("late has no allowed start day");
    expect(client.requests).toHaveLength(0);
  });

  it("solves an empty config without calling the solver", async () => {
    const client = new StubSolverClient({ status: "ERROR" });
    const result = await new OptimalScheduler({ client }).solve(makeConfig({ submissions: [] }));
    expect(result.status).toBe("OPTIMAL");
    expect(client.requests).toHaveLength(0);
  });
});

describe("strategy registry", () => {
  it("builds every constructive strategy by name", () => {
    for (const strategy of CONSTRUCTIVE_STRATEGIES) {
      expect(createScheduler(strategy).strategy).toBe(strategy);
    }
  });

  it("hands the heuristic rule to the heuristic strategy", () => {
    const scheduler = createScheduler("heuristic", { heuristicRule: "critical_path" });
    expect(scheduler).toBeInstanceOf(HeuristicScheduler);
    expect(scheduler instanceof HeuristicScheduler && scheduler.rule).toBe("critical_path");
  });

  it("refuses to run optimal without a client", async () => {
    await expect(runStrategy("optimal", config)).rejects.toThrow(
      'Strategy "optimal" needs a solver client',
    );
  });

  it("runs optimal through a given client", async () => {
    const client = new StubSolverClient({ status: "OPTIMAL", values: { "x:a1:0": 1, "x:a2:0": 1 } });
    const schedule = await runStrategy("optimal", config, { client });
    expect(starts(schedule)).toEqual({ a1: "2025-01-01", a2: "2025-01-01" });
  });

  it("compares the constructive strategies by default and adds optimal with a client", async () => {
    const constructive = await compareStrategies(config);
    expect(constructive.map((r) => r.strategy)).toEqual([
      "greedy",
      "stochastic",
      "lookahead",
      "backtracking",
      "heuristic",
      "random",
    ]);
    expect(constructive.every((r) => r.metrics.scheduledCount === 2)).toBe(true);

    const client = new StubSolverClient({ status: "TIMEOUT" });
    const all = await compareStrategies(config, { client });
    const optimal = all.find((r) => r.strategy === "optimal");
    expect(all).toHaveLength(7);
    expect(optimal?.status).toBe("TIMEOUT");
    expect(optimal?.metrics.missingSubmissionIds).toEqual(["a1", "a2"]);
  });
});
