import { MILESTONES, type DbStreak, type Milestone, previousDay } from "@streakmarket/shared";

export const MEDAL_STREAK = 30;

export type StreakAdvance = {
  streak: DbStreak;
  // Highest threshold newly crossed by this completion, if any.
  milestone: Milestone | null;
};

function flagOf(s: DbStreak, m: Milestone): boolean {
  if (m === 30) return s.milestone_30_announced;
  if (m === 15) return s.milestone_15_announced;
  return s.milestone_7_announced;
}

function withFlag(s: DbStreak, m: Milestone): DbStreak {
  if (m === 30) return { ...s, milestone_30_announced: true };
  if (m === 15) return { ...s, milestone_15_announced: true };
  return { ...s, milestone_7_announced: true };
}

export function emptyStreak(userId: number, habitId: number): DbStreak {
  return {
    user_id: userId,
    habit_id: habitId,
    current_streak: 0,
    best_streak: 0,
    last_completion_date: null,
    milestone_7_announced: false,
    milestone_15_announced: false,
    milestone_30_announced: false
  };
}

// Highest first: one announcement per completion, lower thresholds are marked silently.
function crossMilestones(next: DbStreak): StreakAdvance {
  let streak = next;
  let milestone: Milestone | null = null;
  for (const m of MILESTONES) {
    if (streak.current_streak >= m && !flagOf(streak, m)) {
      streak = withFlag(streak, m);
      if (milestone === null) milestone = m;
    }
  }
  return { streak, milestone };
}

/**
 * Applies one completion on `date` to the stored record.
 * Consecutive day extends the streak; same day is a no-op; a later day after a gap starts
 * over at 1 and forgets the announced milestones (best_streak is kept).
 * A date before the stored last date leaves the record alone: see backfillStreak.
 */
export function advanceStreak(prev: DbStreak, date: string): StreakAdvance {
  const last = prev.last_completion_date;
  if (last !== null && date <= last) {
    return { streak: prev, milestone: null };
  }

  let next: DbStreak;
  if (last !== null && last === previousDay(date)) {
    next = { ...prev, current_streak: prev.current_streak + 1, last_completion_date: date };
  } else {
    next = {
      ...prev,
      current_streak: 1,
      last_completion_date: date,
      milestone_7_announced: false,
      milestone_15_announced: false,
      milestone_30_announced: false
    };
  }
  next.best_streak = Math.max(next.best_streak, next.current_streak);
  return crossMilestones(next);
}

/**
 * Applies a completion dated before the stored last date. The history (which already holds
 * the new day) decides the current run; a filled gap can lengthen it and cross a milestone.
 */
export function backfillStreak(prev: DbStreak, dates: string[]): StreakAdvance {
  return crossMilestones({
    ...prev,
    current_streak: trailingRun(dates),
    best_streak: Math.max(prev.best_streak, longestRun(dates)),
    last_completion_date: dates[dates.length - 1] ?? null
  });
}

/** Length of the run of consecutive days ending at the latest date. Input ascending. */
export function trailingRun(dates: string[]): number {
  if (dates.length === 0) return 0;
  let run = 1;
  for (let i = dates.length - 1; i > 0; i--) {
    const cur = dates[i];
    const prev = dates[i - 1];
    if (cur === undefined || prev === undefined || prev !== previousDay(cur)) break;
    run += 1;
  }
  return run;
}

export function longestRun(dates: string[]): number {
  let best = 0;
  let run = 0;
  let last: string | null = null;
  for (const d of dates) {
    run = last !== null && last === previousDay(d) ? run + 1 : 1;
    best = Math.max(best, run);
    last = d;
  }
  return best;
}

/**
 * Re-derives current streak and last date from the remaining history after an unmark.
 * best_streak stays at its high-water mark. Announced flags are kept, and a threshold the
 * rewound run still covers counts as announced again (undoing a mark that broke the run).
 */
export function rewindStreak(prev: DbStreak, remainingDates: string[]): DbStreak {
  const current = trailingRun(remainingDates);
  return {
    ...prev,
    current_streak: current,
    last_completion_date: remainingDates[remainingDates.length - 1] ?? null,
    milestone_7_announced: prev.milestone_7_announced || current >= 7,
    milestone_15_announced: prev.milestone_15_announced || current >= 15,
    milestone_30_announced: prev.milestone_30_announced || current >= 30
  };
}

/** Full rebuild from history. Thresholds at or below the rebuilt streak count as already announced. */
export function rebuildStreak(prev: DbStreak, dates: string[]): DbStreak {
  const current = trailingRun(dates);
  return {
    ...prev,
    current_streak: current,
    best_streak: Math.max(prev.best_streak, longestRun(dates)),
    last_completion_date: dates[dates.length - 1] ?? null,
    milestone_7_announced: current >= 7,
    milestone_15_announced: current >= 15,
    milestone_30_announced: current >= 30
  };
}
