import { describe, expect, it } from "vitest";
import { addDays } from "../src/datetime.utils.js";
import { scheduleFromStarts } from "../src/schedule.js";
import type { Interval, Schedule } from "../src/types.js";
import {
  checkResources,
  dailyLoad,
  loadSegments,
  validateResources,
} from "../src/validation/resources.js";
import { abstract, makeConfig } from "./helpers.js";

describe("loadSegments", () => {
  it("splits at every boundary and drops empty runs", () => {
    const segments = loadSegments([
      ["a", { startDate: "2025-01-01", endDate: "2025-01-05" }],
      ["b", { startDate: "2025-01-03", endDate: "2025-01-07" }],
      ["c", { startDate: "2025-01-10", endDate: "2025-01-11" }],
    ]);
    expect(segments).toEqual([
      { from: "2025-01-01", to: "2025-01-03", submissionIds: ["a"] },
      { from: "2025-01-03", to: "2025-01-05", submissionIds: ["a", "b"] },
      { from: "2025-01-05", to: "2025-01-07", submissionIds: ["b"] },
      { from: "2025-01-10", to: "2025-01-11", submissionIds: ["c"] },
    ]);
  });

  it("treats intervals as half-open, so back-to-back work never overlaps", () => {
    const segments = loadSegments([
      ["a", { startDate: "2025-01-01", endDate: "2025-01-05" }],
      ["b", { startDate: "2025-01-05", endDate: "2025-01-08" }],
    ]);
    expect(segments.map((s) => s.submissionIds.length)).toEqual([1, 1]);
  });
});

describe("dailyLoad", () => {
  it("agrees with counting active intervals day by day", () => {
    const schedule: Schedule = new Map<string, Interval>([
      ["a", { startDate: "2025-01-01", endDate: "2025-01-20" }],
      ["b", { startDate: "2025-01-05", endDate: "2025-01-09" }],
      ["c", { startDate: "2025-01-07", endDate: "2025-02-02" }],
      ["d", { startDate: "2025-01-19", endDate: "2025-01-20" }],
      ["e", { startDate: "2025-01-25", endDate: "2025-01-25" }],
    ]);

    const expected: Array<{ date: string; load: number }> = [];
    for (let day = "2025-01-01"; day < "2025-02-02"; day = addDays(day, 1)) {
      let load = 0;
      for (const interval of schedule.values()) {
        if (interval.startDate <= day && day < interval.endDate) load++;
      }
      if (load > 0) expected.push({ date: day, load });
    }

    expect(dailyLoad(schedule).map(({ date, load }) => ({ date, load }))).toEqual(expected);
  });
});

describe("resource validation", () => {
  const config = makeConfig({
    submissions: [abstract("a"), abstract("b"), abstract("c")],
    maxConcurrentSubmissions: 1,
  });
  // a: [01-01, 01-15), b: [01-10, 01-24)
  const schedule = scheduleFromStarts(
    [
      ["a", "2025-01-01"],
      ["b", "2025-01-10"],
    ],
    config,
  );

  it("reports one violation per over-limit day with its excess", () => {
    const result = validateResources(schedule, config);
    expect(result.violations.map((v) => v.date)).toEqual([
      "2025-01-10",
      "2025-01-11",
      "2025-01-12",
      "2025-01-13",
      "2025-01-14",
    ]);
    expect(result.violations[0]).toEqual({
      type: "resource",
      date: "2025-01-10",
      load: 2,
      limit: 1,
      excess: 1,
      submissionIds: ["a", "b"],
      severity: "medium",
      description: "2 submissions active on 2025-01-10; limit is 1",
    });
    expect(result.total).toBe(23);
    expect(result.compliant).toBe(18);
  });

  it("marks excess above one as high severity", () => {
    const crowded = scheduleFromStarts(
      [
        ["a", "2025-01-01"],
        ["b", "2025-01-01"],
        ["c", "2025-01-01"],
      ],
      config,
    );
    const [first] = validateResources(crowded, config).violations;
    expect(first).toMatchObject({ excess: 2, severity: "high" });
  });

  it("checks a candidate only against the days it occupies", () => {
    const c = config.submissionsById.get("c");
    if (!c) throw new Error("missing c");
    const clash = checkResources(c, { startDate: "2025-01-20", endDate: "2025-02-03" }, schedule, config);
    expect(clash.violations.map((v) => v.date)).toEqual([
      "2025-01-20",
      "2025-01-21",
      "2025-01-22",
      "2025-01-23",
    ]);

    const clear = checkResources(c, { startDate: "2025-01-24", endDate: "2025-02-07" }, schedule, config);
    expect(clear).toEqual({ applies: true, violations: [] });
  });
});
