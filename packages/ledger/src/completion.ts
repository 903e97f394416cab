import { type DbHabit, type DbStreak, type DbUser, type Milestone, monthOf } from "@streakmarket/shared";
import type { LedgerEvent } from "./events.js";
import { GROUP_PERFECT_MONTH_BONUS, checkGroupAchievement } from "./groupAchievement.js";
import { IMPROVED_RATE_MEDALS, type Payout, completionPayout, conversionRate, paidIn, payoutOf } from "./payout.js";
import type { LedgerTx } from "./store.js";
import { MEDAL_STREAK, advanceStreak, backfillStreak, emptyStreak, rewindStreak } from "./streak.js";

export type CompletionResult = {
  recorded: boolean;
  payout: Payout | null;
  streak: DbStreak | null;
  milestone: Milestone | null;
  medal_awarded: boolean;
  group_bonus: boolean;
};

export type UncompletionResult = {
  removed: boolean;
  payout: Payout | null;
  streak: DbStreak | null;
};

export function displayName(user: Pick<DbUser, "id" | "first_name" | "username">): string {
  return user.first_name || user.username || `User ${user.id}`;
}

async function applyPayout(tx: LedgerTx, userId: number, payout: Payout, sign: 1 | -1): Promise<void> {
  if (payout.kind === "coin") {
    await tx.adjustCoins(userId, sign * payout.amount);
  } else {
    await tx.adjustPoints(userId, payout.type, sign * payout.amount);
  }
}

/**
 * Records one completion and everything that follows from it: payout, streak, medal,
 * conversion tier and the group's perfect-month check. Idempotent per (user, habit, date).
 */
export async function recordCompletion(
  tx: LedgerTx,
  params: { user: DbUser; habit: DbHabit; date: string },
  events: LedgerEvent[]
): Promise<CompletionResult> {
  const { user, habit, date } = params;
  const hasMedal = await tx.hasMedal(user.id, habit.id);
  const payout = completionPayout(habit.point_type, hasMedal);
  const inserted = await tx.insertCompletion({
    user_id: user.id,
    habit_id: habit.id,
    completion_date: date,
    paid_in: paidIn(payout)
  });
  if (!inserted) {
    return { recorded: false, payout: null, streak: null, milestone: null, medal_awarded: false, group_bonus: false };
  }
  await applyPayout(tx, user.id, payout, 1);

  const prev = (await tx.getStreak(user.id, habit.id)) ?? emptyStreak(user.id, habit.id);
  const backdated = prev.last_completion_date !== null && date < prev.last_completion_date;
  const { streak, milestone } = backdated
    ? backfillStreak(prev, await tx.listCompletionDates(user.id, habit.id))
    : advanceStreak(prev, date);
  await tx.saveStreak(streak);

  const name = displayName(user);
  if (milestone !== null) {
    events.push({
      kind: "milestone_reached",
      group_id: habit.group_id,
      user_id: user.id,
      user_name: name,
      habit_id: habit.id,
      habit_name: habit.name,
      days: milestone
    });
  }

  let medalAwarded = false;
  // A backfilled day can carry the run past 30 in one step.
  if (streak.current_streak >= MEDAL_STREAK && !hasMedal) {
    medalAwarded = await tx.insertMedal({ user_id: user.id, habit_id: habit.id, habit_name: habit.name });
    if (medalAwarded) {
      events.push({
        kind: "medal_awarded",
        group_id: habit.group_id,
        user_id: user.id,
        user_name: name,
        habit_id: habit.id,
        habit_name: habit.name
      });
      const medals = await tx.countMedals(user.id);
      if (medals === IMPROVED_RATE_MEDALS) {
        events.push({
          kind: "conversion_rate_improved",
          group_id: habit.group_id,
          user_id: user.id,
          user_name: name,
          rate: conversionRate(medals)
        });
      }
    }
  }

  const month = monthOf(date);
  const credited = await checkGroupAchievement(tx, { group_id: habit.group_id, habit_id: habit.id, month });
  if (credited !== null) {
    events.push({
      kind: "group_habit_perfected",
      group_id: habit.group_id,
      habit_id: habit.id,
      habit_name: habit.name,
      month,
      bonus: GROUP_PERFECT_MONTH_BONUS
    });
  }

  return {
    recorded: true,
    payout,
    streak,
    milestone,
    medal_awarded: medalAwarded,
    group_bonus: credited !== null
  };
}

/**
 * Removes one completion and takes back what that completion paid, as recorded on its row.
 * The debit never drives a balance below zero. Medals are never revoked.
 */
export async function removeCompletion(
  tx: LedgerTx,
  params: { user: DbUser; habit: DbHabit; date: string }
): Promise<UncompletionResult> {
  const { user, habit, date } = params;
  const paid = await tx.deleteCompletion({ user_id: user.id, habit_id: habit.id, completion_date: date });
  if (paid === null) return { removed: false, payout: null, streak: null };

  const granted = payoutOf(paid);
  const payout: Payout =
    granted.kind === "coin"
      ? { kind: "coin", amount: Math.min(granted.amount, Math.max(0, user.coins)) }
      : granted;
  if (payout.kind === "point" && user.points[payout.type] < payout.amount) {
    // Point already spent; nothing left to take back.
    return { removed: true, payout: null, streak: await rewind(tx, user.id, habit.id) };
  }
  if (payout.amount > 0) await applyPayout(tx, user.id, payout, -1);

  return { removed: true, payout, streak: await rewind(tx, user.id, habit.id) };
}

async function rewind(tx: LedgerTx, userId: number, habitId: number): Promise<DbStreak | null> {
  const prev = await tx.getStreak(userId, habitId);
  if (!prev) return null;
  const next = rewindStreak(prev, await tx.listCompletionDates(userId, habitId));
  await tx.saveStreak(next);
  return next;
}
