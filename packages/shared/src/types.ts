// Shared domain types. Keep this file small and explicit.

export const POINT_TYPES = ["physical", "arts", "food_related", "educational", "other"] as const;

export type PointType = (typeof POINT_TYPES)[number];

// "any" only ever appears on rewards; habits and balances use PointType.
export const ANY_POINT_TYPE = "any";
export type RewardPointType = PointType | typeof ANY_POINT_TYPE;

export type PointBalances = Record<PointType, number>;
export type Allocation = Partial<Record<PointType, number>>;

export const MILESTONES = [30, 15, 7] as const;
export type Milestone = (typeof MILESTONES)[number];

export function isPointType(x: unknown): x is PointType {
  return typeof x === "string" && (POINT_TYPES as readonly string[]).includes(x);
}

export function isRewardPointType(x: unknown): x is RewardPointType {
  return x === ANY_POINT_TYPE || isPointType(x);
}

export function emptyBalances(): PointBalances {
  return { physical: 0, arts: 0, food_related: 0, educational: 0, other: 0 };
}

export interface DbUser {
  id: number;
  username: string | null;
  first_name: string | null;
  group_id: number | null;
  points: PointBalances;
  coins: number;
  created_at: string;
}

export interface DbGroup {
  id: number;
  name: string;
  chat_id: number | null;
  created_at: string;
}

export interface DbHabit {
  id: number;
  group_id: number;
  name: string;
  point_type: PointType;
  created_by: number | null;
  created_at: string;
}

// What a completion actually paid: a point of that type, or half a coin once the medal was held.
export type CompletionPaidIn = PointType | "coin";

export interface CompletionKey {
  user_id: number;
  habit_id: number;
  completion_date: string;
}

export interface DbCompletion extends CompletionKey {
  paid_in: CompletionPaidIn;
}

export interface DbStreak {
  user_id: number;
  habit_id: number;
  current_streak: number;
  best_streak: number;
  last_completion_date: string | null;
  milestone_7_announced: boolean;
  milestone_15_announced: boolean;
  milestone_30_announced: boolean;
}

export interface DbMedal {
  user_id: number;
  habit_id: number;
  habit_name: string;
  earned_at: string;
}

export interface DbReward {
  id: number;
  owner_id: number;
  name: string;
  price: number;
  point_type: RewardPointType;
  is_active: boolean;
  created_at: string;
}

export interface DbTransaction {
  id: number;
  buyer_id: number;
  seller_id: number;
  reward_id: number;
  price: number;
  point_type: RewardPointType;
  allocation: Allocation;
  created_at: string;
}

export interface DbGroupAchievement {
  group_id: number;
  habit_id: number;
  month: string;
  awarded_at: string;
}

export interface DbTownMallItem {
  id: number;
  name: string;
  description: string | null;
  price: number;
  // -1 means unlimited
  stock: number;
  sponsor_id: number | null;
  is_active: boolean;
  created_at: string;
}

export interface DbTownMallPurchase {
  id: number;
  item_id: number;
  buyer_id: number;
  price: number;
  created_at: string;
}

export interface LeaderboardRow {
  user_id: number;
  username: string | null;
  first_name: string | null;
  completions: number;
}
