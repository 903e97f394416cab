import { daysInMonth, monthRange } from "@streakmarket/shared";
import type { LedgerTx } from "./store.js";

export const GROUP_PERFECT_MONTH_BONUS = 10;

export function coversWholeMonth(month: string, days: string[]): boolean {
  const seen = new Set(days.filter((d) => d.startsWith(`${month}-`)));
  return seen.size === daysInMonth(month);
}

/**
 * Awards the perfect-month bonus for (group, habit, month) at most once.
 * Returns the credited member ids, or null when nothing was awarded.
 */
export async function checkGroupAchievement(
  tx: LedgerTx,
  params: { group_id: number; habit_id: number; month: string }
): Promise<number[] | null> {
  const { group_id, habit_id, month } = params;
  if (await tx.hasGroupAchievement(group_id, habit_id, month)) return null;

  const members = await tx.listGroupMembers(group_id);
  if (members.length === 0) return null;
  const memberIds = members.map((m) => m.id);

  const { first, last } = monthRange(month);
  const days = await tx.listHabitCompletionDays(habit_id, memberIds, first, last);
  if (!coversWholeMonth(month, days)) return null;

  for (const id of memberIds) {
    await tx.adjustCoins(id, GROUP_PERFECT_MONTH_BONUS);
  }
  await tx.insertGroupAchievement(group_id, habit_id, month);
  return memberIds;
}
