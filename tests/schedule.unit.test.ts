import { describe, expect, it } from "vitest";
import { createInterval, ScheduleBuilder, scheduleFromStarts } from "../src/schedule.js";
import { abstract, makeConfig, paper, poster } from "./helpers.js";

const config = makeConfig({
  submissions: [paper("p1"), abstract("a1"), poster("s1", { draftWindowMonths: 1 })],
});

// ============================================================================
// createInterval
// ============================================================================

describe("createInterval", () => {
  it("derives the end date from the submission's duration", () => {
    const p1 = config.submissionsById.get("p1");
    const s1 = config.submissionsById.get("s1");
    if (!p1 || !s1) throw new Error("missing fixtures");

    expect(createInterval(p1, "2025-01-01", config)).toEqual({
      startDate: "2025-01-01",
      endDate: "2025-04-01",
    });
    expect(createInterval(s1, "2025-01-01", config, "C9")).toEqual({
      startDate: "2025-01-01",
      endDate: "2025-01-31",
      conferenceId: "C9",
    });
  });
});

// ============================================================================
// scheduleFromStarts
// ============================================================================

describe("scheduleFromStarts", () => {
  it("skips ids the config does not know", () => {
    const schedule = scheduleFromStarts(
      [
        ["a1", "2025-02-01"],
        ["ghost", "2025-02-01"],
      ],
      config,
    );
    expect([...schedule]).toEqual([["a1", { startDate: "2025-02-01", endDate: "2025-02-15" }]]);
  });
});

// ============================================================================
// ScheduleBuilder
// ============================================================================

describe("ScheduleBuilder", () => {
  it("places submissions and reports what it holds", () => {
    const builder = new ScheduleBuilder(config);
    const interval = builder.place("a1", "2025-03-01");

    expect(interval).toEqual({ startDate: "2025-03-01", endDate: "2025-03-15" });
    expect(builder.size).toBe(1);
    expect(builder.has("a1")).toBe(true);
    expect(builder.get("a1")).toEqual(interval);
    expect(builder.has("p1")).toBe(false);
  });

  it("throws for an unknown submission", () => {
    expect(() => new ScheduleBuilder(config).place("ghost", "2025-01-01")).toThrow(
      'Unknown submission "ghost"',
    );
  });

  it("restores a captured placement or clears it", () => {
    const builder = new ScheduleBuilder(config);
    const before = builder.place("a1", "2025-01-01");
    builder.place("a1", "2025-02-01");

    builder.restore("a1", before);
    expect(builder.get("a1")).toEqual(before);

    builder.restore("a1", undefined);
    expect(builder.has("a1")).toBe(false);
  });

  it("hands out snapshots that later changes do not touch", () => {
    const builder = new ScheduleBuilder(config);
    builder.place("a1", "2025-01-01");
    const snapshot = builder.build();
    const live = builder.view();

    builder.place("p1", "2025-01-01");

    expect(snapshot.size).toBe(1);
    expect(live.size).toBe(2);
  });
});
