import { describe, expect, it } from "vitest";
import { GreedyScheduler } from "../src/schedulers/greedy.js";
import { scheduleFromStarts } from "../src/schedule.js";
import { calculateEfficiencyScore } from "../src/scoring/efficiency.js";
import { calculateScheduleMetrics } from "../src/scoring/metrics.js";
import { calculatePenaltyScore } from "../src/scoring/penalty.js";
import { balanceScore, calculateQualityScore, robustnessScore } from "../src/scoring/quality.js";
import { abstract, conference, makeConfig, paper, poster } from "./helpers.js";

describe("calculatePenaltyScore", () => {
  const lateInput = {
    submissions: [paper("p1", { conferenceId: "C1" })],
    conferences: [conference("C1", { paper: "2025-06-01" })],
  };

  it("charges each late day at the paper rate", () => {
    const config = makeConfig(lateInput);
    // 90 days from 2025-03-15 ends 2025-06-13, 12 days late.
    const penalty = calculatePenaltyScore(scheduleFromStarts([["p1", "2025-03-15"]], config), config);
    expect(penalty.categories.deadline).toBe(24000);
    expect(penalty.totalPenalty).toBe(24000);
  });

  it("uses a submission's own per-day price when it has one", () => {
    const config = makeConfig({
      ...lateInput,
      submissions: [paper("p1", { conferenceId: "C1", penaltyCostPerDay: 10 })],
    });
    const penalty = calculatePenaltyScore(scheduleFromStarts([["p1", "2025-03-15"]], config), config);
    expect(penalty.categories.deadline).toBe(120);
  });

  it("grows as a late submission starts later", () => {
    const config = makeConfig(lateInput);
    const at = (start: string) =>
      calculatePenaltyScore(scheduleFromStarts([["p1", start]], config), config).totalPenalty;
    expect(at("2025-03-20")).toBeGreaterThan(at("2025-03-15"));
  });

  it("prices a lead-time shortage by the day", () => {
    const config = makeConfig({ ...lateInput, minPaperLeadTimeDays: 10 });
    // Ends 2025-05-30, two days before the deadline: 8 days short.
    const penalty = calculatePenaltyScore(scheduleFromStarts([["p1", "2025-03-01"]], config), config);
    expect(penalty.categories.lead_time).toBe(390);
    expect(penalty.categories.deadline).toBe(0);
  });

  it("charges every overloaded day", () => {
    const config = makeConfig({
      submissions: [abstract("a1"), abstract("a2")],
      maxConcurrentSubmissions: 1,
    });
    const schedule = scheduleFromStarts(
      [
        ["a1", "2025-01-01"],
        ["a2", "2025-01-10"],
      ],
      config,
    );
    expect(calculatePenaltyScore(schedule, config).categories.resource).toBe(1000);
  });

  it("charges slack by the month and the soft window by the day", () => {
    const config = makeConfig({ submissions: [abstract("a1", { earliestStartDate: "2025-01-01" })] });
    const penalty = calculatePenaltyScore(scheduleFromStarts([["a1", "2025-05-10"]], config), config);
    // Four months of slip plus the missed poster opportunity.
    expect(penalty.categories.slack_cost).toBe(6000);
    // 129 days after the earliest start is 69 days beyond the window.
    expect(penalty.categories.soft_block).toBe(13800);
    expect(penalty.totalPenalty).toBe(19800);
  });

  it("adds the full-year deferral once a year has slipped", () => {
    const config = makeConfig({ submissions: [poster("s1", { earliestStartDate: "2025-01-01" })] });
    const penalty = calculatePenaltyScore(scheduleFromStarts([["s1", "2026-01-01"]], config), config);
    expect(penalty.categories.slack_cost).toBe(17000);
  });

  it("charges more for a repeated work at a top-tier conference", () => {
    const input = {
      submissions: [
        paper("first", { conferenceId: "C1", workId: "W" }),
        paper("second", { conferenceId: "C1", workId: "W" }),
      ],
      conferences: [conference("C1", { paper: "2027-06-01" })],
    };
    const starts = [
      ["first", "2025-01-01"],
      ["second", "2025-03-01"],
    ] as const;

    const plain = makeConfig(input);
    expect(calculatePenaltyScore(scheduleFromStarts(starts, plain), plain).categories.single_conference).toBe(
      500,
    );

    const topTier = makeConfig({ ...input, topTierConferences: ["C1"] });
    expect(
      calculatePenaltyScore(scheduleFromStarts(starts, topTier), topTier).categories.single_conference,
    ).toBe(1250);
  });

  it("charges extra for a kind the conference does not accept", () => {
    const config = makeConfig({
      submissions: [poster("s1", { conferenceId: "C1" })],
      conferences: [conference("C1", { paper: "2025-06-01" })],
    });
    const penalty = calculatePenaltyScore(scheduleFromStarts([["s1", "2025-01-01"]], config), config);
    expect(penalty.categories.conference_compatibility).toBe(750);
  });

  describe("abstract before paper", () => {
    const conferences = [
      conference(
        "C1",
        { abstract: "2025-03-01", paper: "2025-06-01" },
        { submissionTypes: "abstract_then_paper" },
      ),
    ];

    it("charges an undeclared abstract at the base price", () => {
      const config = makeConfig({
        submissions: [
          abstract("w-abs-C1", { conferenceId: "C1" }),
          paper("w-pap-C1", { conferenceId: "C1" }),
        ],
        conferences,
      });
      const schedule = scheduleFromStarts(
        [
          ["w-abs-C1", "2025-01-01"],
          ["w-pap-C1", "2025-01-15"],
        ],
        config,
      );
      const penalty = calculatePenaltyScore(schedule, config);
      expect(penalty.categories.abstract_paper).toBe(400);
      expect(penalty.categories.dependency).toBe(0);
    });

    it("charges a missing abstract both as a dependency and as an abstract", () => {
      const config = makeConfig({
        submissions: [
          abstract("A", { conferenceId: "C1" }),
          paper("P", { conferenceId: "C1", dependsOn: ["A"] }),
        ],
        conferences,
      });
      const penalty = calculatePenaltyScore(scheduleFromStarts([["P", "2025-01-15"]], config), config);
      expect(penalty.categories.dependency).toBe(1000);
      expect(penalty.categories.abstract_paper).toBe(1200);
    });
  });

  it("charges high-severity blackout hits at triple price", () => {
    const config = makeConfig({
      submissions: [abstract("a1")],
      blackoutDates: ["2025-01-05"],
      schedulingOptions: { enableBlackoutPeriods: true },
    });
    const penalty = calculatePenaltyScore(scheduleFromStarts([["a1", "2025-01-01"]], config), config);
    expect(penalty.categories.blackout).toBe(300);
  });

  it("charges nothing for an empty schedule", () => {
    const config = makeConfig({ submissions: [paper("p1")] });
    const penalty = calculatePenaltyScore(new Map(), config);
    expect(penalty.totalPenalty).toBe(0);
    expect(Object.values(penalty.categories).every((value) => value === 0)).toBe(true);
  });
});

describe("calculateQualityScore", () => {
  it("gives a fully compliant single submission the top score", () => {
    const config = makeConfig({ submissions: [abstract("a1")] });
    const quality = calculateQualityScore(scheduleFromStarts([["a1", "2025-01-01"]], config), config);
    expect(quality.score).toBeCloseTo(100);
    expect(quality.robustness).toBe(100);
    expect(quality.balance).toBe(100);
  });

  it("scores an empty schedule 0", () => {
    const config = makeConfig({ submissions: [abstract("a1")] });
    expect(calculateQualityScore(new Map(), config).score).toBe(0);
  });

  it("drops when a deadline is missed", () => {
    const config = makeConfig({
      submissions: [paper("p1", { conferenceId: "C1" })],
      conferences: [conference("C1", { paper: "2025-06-01" })],
    });
    const onTime = calculateQualityScore(scheduleFromStarts([["p1", "2025-01-01"]], config), config);
    const late = calculateQualityScore(scheduleFromStarts([["p1", "2025-04-01"]], config), config);
    expect(late.score).toBeLessThan(onTime.score);
  });
});

describe("robustnessScore", () => {
  const config = makeConfig({
    submissions: [
      abstract("a1", { conferenceId: "C1" }),
      abstract("a2", { conferenceId: "C2" }),
      abstract("a3", { conferenceId: "C3" }),
      abstract("free"),
    ],
    conferences: [
      conference("C1", { abstract: "2025-01-18" }),
      conference("C2", { abstract: "2025-01-22" }),
      conference("C3", { abstract: "2025-01-10" }),
    ],
    maxConcurrentSubmissions: 4,
  });
  const allAt = (ids: readonly string[]) =>
    scheduleFromStarts(
      ids.map((id) => [id, "2025-01-01"] as const),
      config,
    );

  it("scales the mean buffer before each deadline", () => {
    // Both end 2025-01-15: 3 and 7 days of buffer, mean 5.
    expect(robustnessScore(allAt(["a1", "a2"]), config)).toBe(50);
  });

  it("counts a late submission as zero buffer", () => {
    // a3 ends five days after its deadline: (3 + 7 + 0) / 3.
    expect(robustnessScore(allAt(["a1", "a2", "a3"]), config)).toBeCloseTo(33.333, 2);
  });

  it("ignores submissions without a deadline", () => {
    expect(robustnessScore(allAt(["a1", "a2", "free"]), config)).toBe(50);
    expect(robustnessScore(allAt(["free", "a3"]), config)).toBe(0);
  });
});

describe("balanceScore", () => {
  const config = makeConfig({ submissions: [abstract("a1"), abstract("a2"), abstract("a3")] });

  it("is perfect when every loaded day carries the same load", () => {
    const schedule = scheduleFromStarts(
      [
        ["a1", "2025-01-01"],
        ["a2", "2025-01-01"],
      ],
      config,
    );
    expect(balanceScore(schedule)).toBe(100);
  });

  it("drops with the variance of the daily load", () => {
    // Seven days at 1, seven at 2, seven at 1: mean 4/3, sample variance 7/30.
    const schedule = scheduleFromStarts(
      [
        ["a1", "2025-01-01"],
        ["a2", "2025-01-08"],
      ],
      config,
    );
    expect(balanceScore(schedule)).toBeCloseTo(98.25, 6);
  });

  it("looks only at loaded days", () => {
    const schedule = scheduleFromStarts(
      [
        ["a1", "2025-01-01"],
        ["a2", "2025-03-01"],
      ],
      config,
    );
    expect(balanceScore(schedule)).toBe(100);
  });
});

describe("calculateEfficiencyScore", () => {
  it("blends utilization and timeline", () => {
    const config = makeConfig({ submissions: [abstract("a1"), abstract("a2")] });
    const schedule = scheduleFromStarts(
      [
        ["a1", "2025-01-01"],
        ["a2", "2025-01-01"],
      ],
      config,
    );
    const efficiency = calculateEfficiencyScore(schedule, config);
    expect(efficiency.averageLoad).toBe(2);
    expect(efficiency.utilization).toBeCloseTo(75);
    expect(efficiency.timeline).toBeCloseTo(50.833, 2);
    expect(efficiency.score).toBeCloseTo(65.333, 2);
  });

  it("scores an empty schedule 0", () => {
    const config = makeConfig({ submissions: [abstract("a1")] });
    expect(calculateEfficiencyScore(new Map(), config)).toEqual({
      score: 0,
      utilization: 0,
      timeline: 0,
      averageLoad: 0,
    });
  });
});

describe("calculateScheduleMetrics", () => {
  const config = makeConfig({
    submissions: [paper("p1", { conferenceId: "C1" }), paper("p2", { conferenceId: "C2" })],
    conferences: [conference("C1", { paper: "2025-06-01" }), conference("C2", { paper: "2025-08-01" })],
    maxConcurrentSubmissions: 1,
  });

  it("summarizes a complete schedule", () => {
    const metrics = calculateScheduleMetrics(new GreedyScheduler().schedule(config), config);
    expect(metrics).toMatchObject({
      makespanDays: 180,
      startDate: "2025-01-01",
      endDate: "2025-06-30",
      peakLoad: 1,
      averageLoad: 1,
      utilizationRate: 100,
      isValid: true,
      scheduledCount: 2,
      totalCount: 2,
      completionRate: 100,
      scheduledByKind: { abstract: 0, paper: 2, poster: 0 },
      missingSubmissionIds: [],
      monthlyDistribution: { "2025-01": 1, "2025-04": 1 },
      quarterlyDistribution: { "2025-Q1": 1, "2025-Q2": 1 },
      yearlyDistribution: { "2025": 2 },
      kindPercentages: { abstract: 0, paper: 100, poster: 0 },
    });
    expect(metrics.penalty.totalPenalty).toBe(0);
  });

  it("splits starts by quarter and year and kinds by share", () => {
    const mixed = makeConfig({ submissions: [abstract("a1"), abstract("a2"), poster("s1"), paper("p1")] });
    const schedule = scheduleFromStarts(
      [
        ["a1", "2025-03-31"],
        ["a2", "2025-04-01"],
        ["s1", "2025-12-30"],
        ["p1", "2026-01-02"],
      ],
      mixed,
    );
    const metrics = calculateScheduleMetrics(schedule, mixed);
    expect(metrics.quarterlyDistribution).toEqual({ "2025-Q1": 1, "2025-Q2": 1, "2025-Q4": 1, "2026-Q1": 1 });
    expect(metrics.yearlyDistribution).toEqual({ "2025": 3, "2026": 1 });
    expect(metrics.kindPercentages).toEqual({ abstract: 50, paper: 25, poster: 25 });
  });

  it("lists what was left out", () => {
    const metrics = calculateScheduleMetrics(scheduleFromStarts([["p1", "2025-01-01"]], config), config);
    expect(metrics.missingSubmissionIds).toEqual(["p2"]);
    expect(metrics.completionRate).toBe(50);
  });

  it("reports an empty schedule without a span", () => {
    const metrics = calculateScheduleMetrics(new Map(), config);
    expect(metrics).toMatchObject({
      makespanDays: 0,
      startDate: undefined,
      endDate: undefined,
      peakLoad: 0,
      scheduledCount: 0,
      completionRate: 0,
      quarterlyDistribution: {},
      yearlyDistribution: {},
      kindPercentages: { abstract: 0, paper: 0, poster: 0 },
    });
  });
});
