import type {
  Allocation,
  CompletionKey,
  CompletionPaidIn,
  DbCompletion,
  DbGroup,
  DbHabit,
  DbMedal,
  DbReward,
  DbStreak,
  DbTownMallItem,
  DbTownMallPurchase,
  DbTransaction,
  DbUser,
  LeaderboardRow,
  PointType,
  RewardPointType
} from "@streakmarket/shared";

export type NewHabit = { group_id: number; name: string; point_type: PointType; created_by: number | null };
export type NewReward = { owner_id: number; name: string; price: number; point_type: RewardPointType };
export type NewTransaction = {
  buyer_id: number;
  seller_id: number;
  reward_id: number;
  price: number;
  point_type: RewardPointType;
  allocation: Allocation;
};
export type NewTownMallItem = { name: string; description: string | null; price: number; stock: number; sponsor_id: number | null };
export type TownMallItemPatch = Partial<Pick<DbTownMallItem, "name" | "description" | "price" | "stock">>;

/**
 * Row-level access used by the engine, always within one transaction.
 * Implementations do plain reads and writes; every rule lives in the engine.
 */
export interface LedgerTx {
  // users
  getUser(id: number): Promise<DbUser | null>;
  upsertUser(input: { id: number; username: string | null; first_name: string | null }): Promise<DbUser>;
  setUserGroup(userId: number, groupId: number): Promise<void>;
  adjustPoints(userId: number, type: PointType, delta: number): Promise<void>;
  adjustCoins(userId: number, delta: number): Promise<void>;

  // groups
  createGroup(name: string): Promise<DbGroup>;
  getGroup(id: number): Promise<DbGroup | null>;
  getGroupByName(name: string): Promise<DbGroup | null>;
  setGroupChat(groupId: number, chatId: number | null): Promise<void>;
  listGroupMembers(groupId: number): Promise<DbUser[]>;

  // habits
  createHabit(input: NewHabit): Promise<DbHabit>;
  getHabit(id: number): Promise<DbHabit | null>;
  updateHabit(id: number, patch: { name: string; point_type: PointType }): Promise<void>;
  deleteHabit(id: number): Promise<void>;
  listGroupHabits(groupId: number): Promise<DbHabit[]>;

  // completions
  /** False when the (user, habit, date) triple already exists. */
  insertCompletion(c: DbCompletion): Promise<boolean>;
  /** What the removed completion paid, or null when there was nothing to remove. */
  deleteCompletion(key: CompletionKey): Promise<CompletionPaidIn | null>;
  /** Ascending, distinct. */
  listCompletionDates(userId: number, habitId: number): Promise<string[]>;
  listHabitIdsCompletedOn(userId: number, date: string): Promise<number[]>;
  countCompletionsByUser(habitId: number): Promise<Array<{ user_id: number; count: number }>>;
  /** Distinct days in [from, to] on which any of userIds completed the habit. */
  listHabitCompletionDays(habitId: number, userIds: number[], from: string, to: string): Promise<string[]>;
  deleteHabitCompletions(habitId: number): Promise<number>;
  monthlyLeaderboard(groupId: number, from: string, to: string): Promise<LeaderboardRow[]>;

  // streaks
  getStreak(userId: number, habitId: number): Promise<DbStreak | null>;
  saveStreak(streak: DbStreak): Promise<void>;
  deleteHabitStreaks(habitId: number): Promise<void>;

  // medals
  hasMedal(userId: number, habitId: number): Promise<boolean>;
  /** False when the medal already exists. */
  insertMedal(input: { user_id: number; habit_id: number; habit_name: string }): Promise<boolean>;
  countMedals(userId: number): Promise<number>;
  listMedals(userId: number): Promise<DbMedal[]>;

  // rewards
  createReward(input: NewReward): Promise<DbReward>;
  getReward(id: number): Promise<DbReward | null>;
  updateReward(id: number, patch: { name?: string; price?: number }): Promise<void>;
  deactivateReward(id: number): Promise<void>;
  listGroupRewards(groupId: number): Promise<DbReward[]>;
  insertTransaction(input: NewTransaction): Promise<DbTransaction>;
  listUserTransactions(userId: number): Promise<DbTransaction[]>;

  // group achievements
  hasGroupAchievement(groupId: number, habitId: number, month: string): Promise<boolean>;
  insertGroupAchievement(groupId: number, habitId: number, month: string): Promise<void>;
  deleteHabitAchievements(habitId: number): Promise<void>;

  // town mall
  createTownMallItem(input: NewTownMallItem): Promise<DbTownMallItem>;
  getTownMallItem(id: number): Promise<DbTownMallItem | null>;
  updateTownMallItem(id: number, patch: TownMallItemPatch): Promise<void>;
  deactivateTownMallItem(id: number): Promise<void>;
  listTownMallItems(): Promise<DbTownMallItem[]>;
  decrementStock(itemId: number): Promise<void>;
  insertTownMallPurchase(input: { item_id: number; buyer_id: number; price: number }): Promise<DbTownMallPurchase>;
  listUserTownMallPurchases(userId: number): Promise<DbTownMallPurchase[]>;
}

export interface LedgerStore {
  /** Runs fn as one unit of work: all of its writes land, or none do. */
  transaction<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T>;
}
