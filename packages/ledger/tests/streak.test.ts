import { describe, expect, it } from "vitest";
import type { DbStreak } from "@streakmarket/shared";
import { advanceStreak, backfillStreak, emptyStreak, longestRun, rebuildStreak, rewindStreak, trailingRun } from "../src/streak.js";

function play(dates: string[]): DbStreak[] {
  const out: DbStreak[] = [];
  let s = emptyStreak(1, 1);
  for (const d of dates) {
    s = advanceStreak(s, d).streak;
    out.push(s);
  }
  return out;
}

describe("advanceStreak", () => {
  it("extends on consecutive days and restarts after a gap", () => {
    const states = play(["2024-03-01", "2024-03-02", "2024-03-03", "2024-03-05", "2024-03-06"]);
    expect(states.map((s) => s.current_streak)).toEqual([1, 2, 3, 1, 2]);
    expect(states[4]?.best_streak).toBe(3);
    expect(states[4]?.last_completion_date).toBe("2024-03-06");
  });

  it("crosses month and year boundaries", () => {
    const states = play(["2023-12-31", "2024-01-01", "2024-02-28", "2024-02-29", "2024-03-01"]);
    expect(states.map((s) => s.current_streak)).toEqual([1, 2, 1, 2, 3]);
  });

  it("leaves the record untouched for a second completion on the same day", () => {
    const prev: DbStreak = { ...emptyStreak(1, 1), current_streak: 4, best_streak: 4, last_completion_date: "2024-03-04" };
    const res = advanceStreak(prev, "2024-03-04");
    expect(res.streak).toEqual(prev);
    expect(res.milestone).toBeNull();
  });

  it("leaves the record untouched for a day before the last one", () => {
    const prev: DbStreak = {
      ...emptyStreak(1, 1),
      current_streak: 6,
      best_streak: 6,
      last_completion_date: "2024-03-06",
      milestone_7_announced: true
    };
    const res = advanceStreak(prev, "2024-02-10");
    expect(res.streak).toEqual(prev);
    expect(res.milestone).toBeNull();
  });

  it("reports exactly the 7-day milestone when going from 6 to 7", () => {
    const prev: DbStreak = { ...emptyStreak(1, 1), current_streak: 6, best_streak: 6, last_completion_date: "2024-03-06" };
    const res = advanceStreak(prev, "2024-03-07");
    expect(res.milestone).toBe(7);
    expect(res.streak.milestone_7_announced).toBe(true);
    expect(res.streak.milestone_15_announced).toBe(false);
    expect(res.streak.milestone_30_announced).toBe(false);
  });

  it("reports only the highest unannounced threshold and marks lower ones silently", () => {
    const prev: DbStreak = { ...emptyStreak(1, 1), current_streak: 14, best_streak: 14, last_completion_date: "2024-03-14" };
    const res = advanceStreak(prev, "2024-03-15");
    expect(res.milestone).toBe(15);
    expect(res.streak.milestone_7_announced).toBe(true);
    expect(res.streak.milestone_15_announced).toBe(true);
    expect(res.streak.milestone_30_announced).toBe(false);
  });

  it("does not repeat an announced milestone", () => {
    const prev: DbStreak = {
      ...emptyStreak(1, 1),
      current_streak: 7,
      best_streak: 7,
      last_completion_date: "2024-03-07",
      milestone_7_announced: true
    };
    expect(advanceStreak(prev, "2024-03-08").milestone).toBeNull();
  });

  it("forgets announced milestones on a break but keeps the best streak", () => {
    const prev: DbStreak = {
      ...emptyStreak(1, 1),
      current_streak: 8,
      best_streak: 8,
      last_completion_date: "2024-03-10",
      milestone_7_announced: true
    };
    const res = advanceStreak(prev, "2024-03-15");
    expect(res.streak.current_streak).toBe(1);
    expect(res.streak.best_streak).toBe(8);
    expect(res.streak.milestone_7_announced).toBe(false);
    expect(res.milestone).toBeNull();
  });
});

describe("history helpers", () => {
  const dates = ["2024-03-01", "2024-03-02", "2024-03-03", "2024-03-04", "2024-03-06", "2024-03-07"];

  it("measures the trailing and the longest run", () => {
    expect(trailingRun(dates)).toBe(2);
    expect(longestRun(dates)).toBe(4);
    expect(trailingRun([])).toBe(0);
    expect(longestRun([])).toBe(0);
  });

  it("rewinds current streak and last date, keeping best and flags", () => {
    const prev: DbStreak = {
      ...emptyStreak(1, 1),
      current_streak: 8,
      best_streak: 8,
      last_completion_date: "2024-03-08",
      milestone_7_announced: true
    };
    const next = rewindStreak(prev, dates);
    expect(next.current_streak).toBe(2);
    expect(next.last_completion_date).toBe("2024-03-07");
    expect(next.best_streak).toBe(8);
    expect(next.milestone_7_announced).toBe(true);
  });

  it("restores the flags a gap cleared when the rewound run still covers them", () => {
    const prev: DbStreak = { ...emptyStreak(1, 1), current_streak: 1, best_streak: 8, last_completion_date: "2024-03-10" };
    const run = ["2024-03-01", "2024-03-02", "2024-03-03", "2024-03-04", "2024-03-05", "2024-03-06", "2024-03-07", "2024-03-08"];
    const next = rewindStreak(prev, run);
    expect(next.current_streak).toBe(8);
    expect(next.milestone_7_announced).toBe(true);
    expect(next.milestone_15_announced).toBe(false);
  });

  it("backfills from history and announces a milestone the filled gap completes", () => {
    const prev: DbStreak = { ...emptyStreak(1, 1), current_streak: 2, best_streak: 4, last_completion_date: "2024-03-07" };
    const res = backfillStreak(prev, [...dates.slice(0, 4), "2024-03-05", ...dates.slice(4)]);
    expect(res.streak.current_streak).toBe(7);
    expect(res.streak.best_streak).toBe(7);
    expect(res.streak.last_completion_date).toBe("2024-03-07");
    expect(res.milestone).toBe(7);
  });

  it("backfills a day outside the current run without touching it", () => {
    const prev: DbStreak = { ...emptyStreak(1, 1), current_streak: 2, best_streak: 4, last_completion_date: "2024-03-07" };
    const res = backfillStreak(prev, ["2024-02-10", ...dates]);
    expect(res.streak).toEqual(prev);
    expect(res.milestone).toBeNull();
  });

  it("rewinds to an empty record when no completions remain", () => {
    const prev: DbStreak = { ...emptyStreak(1, 1), current_streak: 1, best_streak: 1, last_completion_date: "2024-03-01" };
    const next = rewindStreak(prev, []);
    expect(next.current_streak).toBe(0);
    expect(next.last_completion_date).toBeNull();
    expect(next.best_streak).toBe(1);
  });

  it("rebuilds flags from the current streak", () => {
    const long = Array.from({ length: 16 }, (_, i) => `2024-04-${String(i + 1).padStart(2, "0")}`);
    const next = rebuildStreak(emptyStreak(1, 1), long);
    expect(next.current_streak).toBe(16);
    expect(next.best_streak).toBe(16);
    expect(next.milestone_7_announced).toBe(true);
    expect(next.milestone_15_announced).toBe(true);
    expect(next.milestone_30_announced).toBe(false);
  });
});
