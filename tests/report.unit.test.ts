import { describe, expect, it } from "vitest";
import { scheduleFromStarts } from "../src/schedule.js";
import { createPlacementOracle } from "../src/validation/placement.js";
import { validateScheduleConstraints } from "../src/validation/report.js";
import { checkSoftBlock } from "../src/validation/soft-block.js";
import { abstract, conference, makeConfig, paper } from "./helpers.js";

describe("checkSoftBlock", () => {
  const config = makeConfig({ submissions: [abstract("a1", { earliestStartDate: "2025-01-01" })] });
  const a1 = config.submissionsById.get("a1");
  if (!a1) throw new Error("missing a1");

  it("accepts starts within 60 days of the earliest start date", () => {
    expect(checkSoftBlock(a1, { startDate: "2025-03-02", endDate: "2025-03-16" })).toEqual({
      applies: true,
      violations: [],
    });
  });

  it("reports how far a start lands outside the window", () => {
    const [violation] = checkSoftBlock(a1, {
      startDate: "2025-03-15",
      endDate: "2025-03-29",
    }).violations;
    expect(violation).toMatchObject({ daysOffset: 73, daysBeyondWindow: 13 });
  });
});

describe("validateScheduleConstraints", () => {
  it("keeps soft-block violations out of validity and averages all families", () => {
    const config = makeConfig({ submissions: [abstract("a1", { earliestStartDate: "2025-01-01" })] });
    const report = validateScheduleConstraints(scheduleFromStarts([["a1", "2025-03-15"]], config), config);

    expect(report.isValid).toBe(true);
    expect(report.violations.map((v) => v.type)).toEqual(["soft_block"]);
    expect(report.complianceRate).toBe(80);
    expect(report.summary.split("\n")).toEqual([
      "Valid schedule: 1/1 scheduled, 1 violation(s), 80.0% compliance",
      "deadline: 1/1 compliant (100.0%), 0 violation(s)",
      "dependency: not applicable",
      "resource: 14/14 compliant (100.0%), 0 violation(s)",
      "venue: not applicable",
      "soft_block: 0/1 compliant (0.0%), 1 violation(s)",
    ]);
  });

  it("is invalid when any hard family has a violation", () => {
    const config = makeConfig({
      submissions: [paper("p1", { conferenceId: "C1" })],
      conferences: [conference("C1", { paper: "2025-03-01" })],
    });
    const report = validateScheduleConstraints(scheduleFromStarts([["p1", "2025-01-01"]], config), config);
    expect(report.isValid).toBe(false);
    expect(report.families.deadline.isValid).toBe(false);
    expect(report.families.venue.isValid).toBe(true);
  });

  it("returns equal reports for equal inputs", () => {
    const config = makeConfig({
      submissions: [abstract("a"), abstract("b"), abstract("c", { dependsOn: ["a"] })],
      maxConcurrentSubmissions: 1,
    });
    const schedule = scheduleFromStarts(
      [
        ["a", "2025-01-01"],
        ["b", "2025-01-05"],
        ["c", "2025-01-10"],
      ],
      config,
    );
    expect(validateScheduleConstraints(schedule, config)).toEqual(
      validateScheduleConstraints(schedule, config),
    );
  });

  it("treats an empty schedule as vacuously valid", () => {
    const config = makeConfig({ submissions: [abstract("a1")] });
    const report = validateScheduleConstraints(new Map(), config);
    expect(report.isValid).toBe(true);
    expect(report.complianceRate).toBe(100);
    expect(report.violations).toEqual([]);
  });
});

describe("createPlacementOracle", () => {
  const config = makeConfig({
    submissions: [
      abstract("a"),
      abstract("b", { earliestStartDate: "2025-01-01" }),
      paper("p", { candidateConferences: ["C1"] }),
    ],
    conferences: [conference("C1", { paper: "2025-06-01" })],
    maxConcurrentSubmissions: 1,
  });
  const oracle = createPlacementOracle(config);
  const placed = scheduleFromStarts([["a", "2025-01-01"]], config);
  const get = (id: string) => {
    const found = config.submissionsById.get(id);
    if (!found) throw new Error(`missing ${id}`);
    return found;
  };

  it("rejects a day that would break a hard constraint", () => {
    const check = oracle.check(get("b"), "2025-01-10", placed);
    expect(check.legal).toBe(false);
    expect(check.violations.map((v) => v.type)).toEqual([
      "resource",
      "resource",
      "resource",
      "resource",
      "resource",
    ]);
  });

  it("accepts a soft-block overshoot and reports it separately", () => {
    const check = oracle.check(get("b"), "2025-04-01", placed);
    expect(check.legal).toBe(true);
    expect(check.softViolations).toHaveLength(1);
  });

  it("records the venue for submissions without a fixed conference", () => {
    const check = oracle.check(get("p"), "2025-01-15", placed, "C1");
    expect(check.legal).toBe(true);
    expect(check.interval).toEqual({
      startDate: "2025-01-15",
      endDate: "2025-04-15",
      conferenceId: "C1",
    });
  });
});
