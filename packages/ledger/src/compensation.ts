import type { DbHabit, PointType } from "@streakmarket/shared";
import type { LedgerTx } from "./store.js";

export type HabitReversal = {
  user_id: number;
  completions: number;
  type: PointType;
  debited: number;
};

/**
 * Takes back every point a habit ever paid out: one point of the habit's type per completion,
 * counted raw even for completions that were paid in coins after a medal. Balances floor at zero.
 */
export async function reverseHabitAwards(tx: LedgerTx, habit: DbHabit): Promise<HabitReversal[]> {
  const counts = await tx.countCompletionsByUser(habit.id);
  const out: HabitReversal[] = [];
  for (const { user_id, count } of counts) {
    const user = await tx.getUser(user_id);
    if (!user) continue;
    const debited = Math.min(count, Math.max(0, user.points[habit.point_type]));
    if (debited > 0) await tx.adjustPoints(user_id, habit.point_type, -debited);
    out.push({ user_id, completions: count, type: habit.point_type, debited });
  }
  return out;
}

/** Reverses a habit's awards and then removes every trace of it except medals. Irreversible. */
export async function purgeHabit(tx: LedgerTx, habit: DbHabit): Promise<HabitReversal[]> {
  const reversals = await reverseHabitAwards(tx, habit);
  await tx.deleteHabitStreaks(habit.id);
  await tx.deleteHabitAchievements(habit.id);
  await tx.deleteHabitCompletions(habit.id);
  await tx.deleteHabit(habit.id);
  return reversals;
}
