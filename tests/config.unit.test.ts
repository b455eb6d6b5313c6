import { describe, expect, it } from "vitest";
import { createConfig, findDependencyCycles, validateConfig } from "../src/config.js";
import { DEFAULT_PENALTY_COSTS, DEFAULT_SCHEDULING_OPTIONS } from "../src/constants.js";
import { ConfigValidationError } from "../src/errors.js";
import { scheduleFromStarts } from "../src/schedule.js";
import { calculatePenaltyScore } from "../src/scoring/penalty.js";
import { abstract, conference, makeConfig, paper } from "./helpers.js";

const base = {
  minAbstractLeadTimeDays: 0,
  minPaperLeadTimeDays: 0,
  maxConcurrentSubmissions: 1,
};

describe("createConfig", () => {
  it("fills submission defaults and merges knob tables over defaults", () => {
    const config = makeConfig({
      submissions: [paper("p1", { conferenceId: "C1" })],
      conferences: [conference("C1", { paper: "2025-06-01" })],
      penaltyCosts: { resource_violation_penalty: 999 },
      schedulingOptions: { maxBacktracks: 9 },
    });

    const p1 = config.submissionsById.get("p1");
    expect(p1?.dependsOn).toEqual([]);
    expect(p1?.draftWindowMonths).toBe(3);
    expect(p1?.engineering).toBe(false);
    expect(config.penaltyCosts.resource_violation_penalty).toBe(999);
    expect(config.penaltyCosts.blackout_violation_penalty).toBe(
      DEFAULT_PENALTY_COSTS.blackout_violation_penalty,
    );
    expect(config.schedulingOptions.maxBacktracks).toBe(9);
    expect(config.schedulingOptions.jitterDays).toBe(DEFAULT_SCHEDULING_OPTIONS.jitterDays);
    expect(config.conferencesById.get("C1")?.recurrence).toBe("annual");
  });

  it("falls back to defaults for knobs set to undefined", () => {
    const config = makeConfig({
      submissions: [paper("p1", { conferenceId: "C1" })],
      conferences: [conference("C1", { paper: "2025-06-01" })],
      penaltyCosts: { default_paper_penalty_per_day: undefined },
      schedulingOptions: { jitterDays: undefined, maxBacktracks: undefined },
    });

    expect(config.penaltyCosts.default_paper_penalty_per_day).toBe(2000);
    expect(config.schedulingOptions.jitterDays).toBe(7);
    expect(config.schedulingOptions.maxBacktracks).toBe(5);

    // Ends 2025-06-13, 12 days late.
    const late = scheduleFromStarts([["p1", "2025-03-15"]], config);
    expect(calculatePenaltyScore(late, config).categories.deadline).toBe(24000);
  });

  it("returns frozen values", () => {
    const config = makeConfig({ submissions: [abstract("a1")] });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.submissions[0])).toBe(true);
    expect(Object.isFrozen(config.submissions[0]?.dependsOn)).toBe(true);
  });

  it("sorts and deduplicates blackout dates", () => {
    const config = makeConfig({
      submissions: [],
      blackoutDates: ["2025-03-02", "2025-03-01", "2025-03-02"],
    });
    expect(config.blackoutDates).toEqual(["2025-03-01", "2025-03-02"]);
  });

  it("reports every problem together", () => {
    const input = {
      ...base,
      maxConcurrentSubmissions: 0,
      submissions: [
        paper("p1", { conferenceId: "NOPE" }),
        paper("p1", { conferenceId: "C1" }),
        abstract("a1", { dependsOn: ["ghost"] }),
        paper("p2"),
      ],
      conferences: [conference("C1", { paper: "2025-06-01" }), conference("C2", {})],
    };

    expect(validateConfig(input)).toEqual([
      "maxConcurrentSubmissions must be at least 1",
      "Conference C2: no deadlines defined",
      "Duplicate submission id: p1",
      "Submission p1 references unknown conference NOPE",
      "Submission a1 depends on nonexistent submission ghost",
      "Paper p2 needs a conferenceId or candidateConferences",
    ]);
    expect(() => createConfig(input)).toThrow(ConfigValidationError);
  });

  it("rejects malformed dates with the field path", () => {
    const issues = validateConfig({
      ...base,
      submissions: [abstract("a1", { earliestStartDate: "2025-02-30" })],
      conferences: [],
    });
    expect(issues).toEqual([
      "submissions.0.earliestStartDate: Expected a calendar day in YYYY-MM-DD format",
    ]);
  });

  it("rejects dependency cycles", () => {
    const issues = validateConfig({
      ...base,
      submissions: [
        abstract("a", { dependsOn: ["b"] }),
        abstract("b", { dependsOn: ["a"] }),
      ],
      conferences: [],
    });
    expect(issues).toEqual(["Circular dependency: a -> b -> a"]);
  });

  it("exposes the issues on the thrown error", () => {
    try {
      createConfig({ ...base, maxConcurrentSubmissions: 0, submissions: [], conferences: [] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.issues).toEqual(["maxConcurrentSubmissions must be at least 1"]);
      }
    }
  });
});

describe("findDependencyCycles", () => {
  it("ignores dangling ids and acyclic graphs", () => {
    expect(
      findDependencyCycles([
        { id: "a", dependsOn: ["b", "missing"] },
        { id: "b", dependsOn: [] },
      ]),
    ).toEqual([]);
  });

  it("finds a self loop", () => {
    expect(findDependencyCycles([{ id: "a", dependsOn: ["a"] }])).toEqual([["a", "a"]]);
  });
});
