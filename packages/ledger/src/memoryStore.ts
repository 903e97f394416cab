import {
  emptyBalances,
  type CompletionKey,
  type DbCompletion,
  type DbGroup,
  type DbGroupAchievement,
  type DbHabit,
  type DbMedal,
  type DbReward,
  type DbStreak,
  type DbTownMallItem,
  type DbTownMallPurchase,
  type DbTransaction,
  type DbUser,
  type LeaderboardRow,
  type PointType
} from "@streakmarket/shared";
import type {
  LedgerStore,
  LedgerTx,
  NewHabit,
  NewReward,
  NewTownMallItem,
  NewTransaction,
  TownMallItemPatch
} from "./store.js";

type State = {
  seq: number;
  users: DbUser[];
  groups: DbGroup[];
  habits: DbHabit[];
  completions: DbCompletion[];
  streaks: DbStreak[];
  medals: DbMedal[];
  rewards: DbReward[];
  transactions: DbTransaction[];
  achievements: DbGroupAchievement[];
  items: DbTownMallItem[];
  itemPurchases: DbTownMallPurchase[];
};

function emptyState(): State {
  return {
    seq: 0,
    users: [],
    groups: [],
    habits: [],
    completions: [],
    streaks: [],
    medals: [],
    rewards: [],
    transactions: [],
    achievements: [],
    items: [],
    itemPurchases: []
  };
}

function sameCompletion(a: CompletionKey, b: CompletionKey): boolean {
  return a.user_id === b.user_id && a.habit_id === b.habit_id && a.completion_date === b.completion_date;
}

class MemoryTx implements LedgerTx {
  constructor(
    private readonly s: State,
    private readonly now: () => string
  ) {}

  private nextId(): number {
    this.s.seq += 1;
    return this.s.seq;
  }

  private userRow(id: number): DbUser {
    const u = this.s.users.find((x) => x.id === id);
    if (!u) throw new Error(`user ${id} missing`);
    return u;
  }

  async getUser(id: number) {
    const u = this.s.users.find((x) => x.id === id);
    return u ? structuredClone(u) : null;
  }

  async upsertUser(input: { id: number; username: string | null; first_name: string | null }) {
    const existing = this.s.users.find((x) => x.id === input.id);
    if (existing) {
      existing.username = input.username;
      existing.first_name = input.first_name;
      return structuredClone(existing);
    }
    const row: DbUser = {
      id: input.id,
      username: input.username,
      first_name: input.first_name,
      group_id: null,
      points: emptyBalances(),
      coins: 0,
      created_at: this.now()
    };
    this.s.users.push(row);
    return structuredClone(row);
  }

  async setUserGroup(userId: number, groupId: number) {
    this.userRow(userId).group_id = groupId;
  }

  async adjustPoints(userId: number, type: PointType, delta: number) {
    this.userRow(userId).points[type] += delta;
  }

  async adjustCoins(userId: number, delta: number) {
    const u = this.userRow(userId);
    // One decimal place, same as the NUMERIC(12,1) column.
    u.coins = Math.round((u.coins + delta) * 10) / 10;
  }

  async createGroup(name: string) {
    const row: DbGroup = { id: this.nextId(), name, chat_id: null, created_at: this.now() };
    this.s.groups.push(row);
    return { ...row };
  }

  async getGroup(id: number) {
    const g = this.s.groups.find((x) => x.id === id);
    return g ? { ...g } : null;
  }

  async getGroupByName(name: string) {
    const g = this.s.groups.find((x) => x.name === name);
    return g ? { ...g } : null;
  }

  async setGroupChat(groupId: number, chatId: number | null) {
    const g = this.s.groups.find((x) => x.id === groupId);
    if (g) g.chat_id = chatId;
  }

  async listGroupMembers(groupId: number) {
    return this.s.users.filter((u) => u.group_id === groupId).map((u) => structuredClone(u));
  }

  async createHabit(input: NewHabit) {
    const row: DbHabit = { id: this.nextId(), ...input, created_at: this.now() };
    this.s.habits.push(row);
    return { ...row };
  }

  async getHabit(id: number) {
    const h = this.s.habits.find((x) => x.id === id);
    return h ? { ...h } : null;
  }

  async updateHabit(id: number, patch: { name: string; point_type: PointType }) {
    const h = this.s.habits.find((x) => x.id === id);
    if (h) Object.assign(h, patch);
  }

  async deleteHabit(id: number) {
    this.s.habits = this.s.habits.filter((h) => h.id !== id);
  }

  async listGroupHabits(groupId: number) {
    return this.s.habits.filter((h) => h.group_id === groupId).map((h) => ({ ...h }));
  }

  async insertCompletion(c: DbCompletion) {
    if (this.s.completions.some((x) => sameCompletion(x, c))) return false;
    this.s.completions.push({ ...c });
    return true;
  }

  async deleteCompletion(key: CompletionKey) {
    const row = this.s.completions.find((x) => sameCompletion(x, key));
    if (!row) return null;
    this.s.completions = this.s.completions.filter((x) => !sameCompletion(x, key));
    return row.paid_in;
  }

  async listCompletionDates(userId: number, habitId: number) {
    const dates = this.s.completions
      .filter((c) => c.user_id === userId && c.habit_id === habitId)
      .map((c) => c.completion_date);
    return [...new Set(dates)].sort();
  }

  async listHabitIdsCompletedOn(userId: number, date: string) {
    return this.s.completions
      .filter((c) => c.user_id === userId && c.completion_date === date)
      .map((c) => c.habit_id);
  }

  async countCompletionsByUser(habitId: number) {
    const counts = new Map<number, number>();
    for (const c of this.s.completions) {
      if (c.habit_id !== habitId) continue;
      counts.set(c.user_id, (counts.get(c.user_id) ?? 0) + 1);
    }
    return [...counts].map(([user_id, count]) => ({ user_id, count }));
  }

  async listHabitCompletionDays(habitId: number, userIds: number[], from: string, to: string) {
    const ids = new Set(userIds);
    const days = this.s.completions
      .filter((c) => c.habit_id === habitId && ids.has(c.user_id) && c.completion_date >= from && c.completion_date <= to)
      .map((c) => c.completion_date);
    return [...new Set(days)].sort();
  }

  async deleteHabitCompletions(habitId: number) {
    const before = this.s.completions.length;
    this.s.completions = this.s.completions.filter((c) => c.habit_id !== habitId);
    return before - this.s.completions.length;
  }

  async monthlyLeaderboard(groupId: number, from: string, to: string) {
    const rows: LeaderboardRow[] = [];
    for (const u of this.s.users) {
      if (u.group_id !== groupId) continue;
      const completions = this.s.completions.filter(
        (c) => c.user_id === u.id && c.completion_date >= from && c.completion_date <= to
      ).length;
      if (completions > 0) rows.push({ user_id: u.id, username: u.username, first_name: u.first_name, completions });
    }
    return rows.sort((a, b) => b.completions - a.completions || a.user_id - b.user_id);
  }

  async getStreak(userId: number, habitId: number) {
    const s = this.s.streaks.find((x) => x.user_id === userId && x.habit_id === habitId);
    return s ? { ...s } : null;
  }

  async saveStreak(streak: DbStreak) {
    this.s.streaks = this.s.streaks.filter((x) => !(x.user_id === streak.user_id && x.habit_id === streak.habit_id));
    this.s.streaks.push({ ...streak });
  }

  async deleteHabitStreaks(habitId: number) {
    this.s.streaks = this.s.streaks.filter((x) => x.habit_id !== habitId);
  }

  async hasMedal(userId: number, habitId: number) {
    return this.s.medals.some((m) => m.user_id === userId && m.habit_id === habitId);
  }

  async insertMedal(input: { user_id: number; habit_id: number; habit_name: string }) {
    if (await this.hasMedal(input.user_id, input.habit_id)) return false;
    this.s.medals.push({ ...input, earned_at: this.now() });
    return true;
  }

  async countMedals(userId: number) {
    return this.s.medals.filter((m) => m.user_id === userId).length;
  }

  async listMedals(userId: number) {
    return this.s.medals.filter((m) => m.user_id === userId).map((m) => ({ ...m }));
  }

  async createReward(input: NewReward) {
    const row: DbReward = { id: this.nextId(), ...input, is_active: true, created_at: this.now() };
    this.s.rewards.push(row);
    return { ...row };
  }

  async getReward(id: number) {
    const r = this.s.rewards.find((x) => x.id === id);
    return r ? { ...r } : null;
  }

  async updateReward(id: number, patch: { name?: string; price?: number }) {
    const r = this.s.rewards.find((x) => x.id === id);
    if (!r) return;
    if (patch.name !== undefined) r.name = patch.name;
    if (patch.price !== undefined) r.price = patch.price;
  }

  async deactivateReward(id: number) {
    const r = this.s.rewards.find((x) => x.id === id);
    if (r) r.is_active = false;
  }

  async listGroupRewards(groupId: number) {
    const owners = new Set(this.s.users.filter((u) => u.group_id === groupId).map((u) => u.id));
    return this.s.rewards
      .filter((r) => r.is_active && owners.has(r.owner_id))
      .sort((a, b) => a.price - b.price || a.id - b.id)
      .map((r) => ({ ...r }));
  }

  async insertTransaction(input: NewTransaction) {
    const row: DbTransaction = { id: this.nextId(), ...input, allocation: { ...input.allocation }, created_at: this.now() };
    this.s.transactions.push(row);
    return structuredClone(row);
  }

  async listUserTransactions(userId: number) {
    return this.s.transactions
      .filter((t) => t.buyer_id === userId || t.seller_id === userId)
      .reverse()
      .map((t) => structuredClone(t));
  }

  async hasGroupAchievement(groupId: number, habitId: number, month: string) {
    return this.s.achievements.some((a) => a.group_id === groupId && a.habit_id === habitId && a.month === month);
  }

  async insertGroupAchievement(groupId: number, habitId: number, month: string) {
    this.s.achievements.push({ group_id: groupId, habit_id: habitId, month, awarded_at: this.now() });
  }

  async deleteHabitAchievements(habitId: number) {
    this.s.achievements = this.s.achievements.filter((a) => a.habit_id !== habitId);
  }

  async createTownMallItem(input: NewTownMallItem) {
    const row: DbTownMallItem = { id: this.nextId(), ...input, is_active: true, created_at: this.now() };
    this.s.items.push(row);
    return { ...row };
  }

  async getTownMallItem(id: number) {
    const i = this.s.items.find((x) => x.id === id);
    return i ? { ...i } : null;
  }

  async updateTownMallItem(id: number, patch: TownMallItemPatch) {
    const i = this.s.items.find((x) => x.id === id);
    if (!i) return;
    if (patch.name !== undefined) i.name = patch.name;
    if (patch.description !== undefined) i.description = patch.description;
    if (patch.price !== undefined) i.price = patch.price;
    if (patch.stock !== undefined) i.stock = patch.stock;
  }

  async deactivateTownMallItem(id: number) {
    const i = this.s.items.find((x) => x.id === id);
    if (i) i.is_active = false;
  }

  async listTownMallItems() {
    return this.s.items
      .filter((i) => i.is_active)
      .sort((a, b) => a.price - b.price || a.id - b.id)
      .map((i) => ({ ...i }));
  }

  async decrementStock(itemId: number) {
    const i = this.s.items.find((x) => x.id === itemId);
    if (i && i.stock > 0) i.stock -= 1;
  }

  async insertTownMallPurchase(input: { item_id: number; buyer_id: number; price: number }) {
    const row: DbTownMallPurchase = { id: this.nextId(), ...input, created_at: this.now() };
    this.s.itemPurchases.push(row);
    return { ...row };
  }

  async listUserTownMallPurchases(userId: number) {
    return this.s.itemPurchases
      .filter((p) => p.buyer_id === userId)
      .reverse()
      .map((p) => ({ ...p }));
  }
}

/**
 * In-process store. Transactions run one at a time against a copy of the state,
 * which replaces the live state only when the callback resolves.
 */
export class MemoryLedgerStore implements LedgerStore {
  private state: State = emptyState();
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly now: () => string = () => new Date().toISOString()) {}

  transaction<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const draft = structuredClone(this.state);
      const result = await fn(new MemoryTx(draft, this.now));
      this.state = draft;
      return result;
    };
    const next = this.queue.then(run, run);
    this.queue = next.catch(() => undefined);
    return next;
  }
}
