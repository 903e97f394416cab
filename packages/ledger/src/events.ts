import type { Milestone } from "@streakmarket/shared";

// Announcement events. Display names ride along so a sink never needs to read the store.

export type MilestoneReached = {
  kind: "milestone_reached";
  group_id: number;
  user_id: number;
  user_name: string;
  habit_id: number;
  habit_name: string;
  days: Milestone;
};

export type MedalAwarded = {
  kind: "medal_awarded";
  group_id: number;
  user_id: number;
  user_name: string;
  habit_id: number;
  habit_name: string;
};

export type ConversionRateImproved = {
  kind: "conversion_rate_improved";
  group_id: number;
  user_id: number;
  user_name: string;
  rate: number;
};

export type GroupHabitPerfected = {
  kind: "group_habit_perfected";
  group_id: number;
  habit_id: number;
  habit_name: string;
  month: string;
  bonus: number;
};

export type RewardPurchased = {
  kind: "reward_purchased";
  group_id: number;
  buyer_id: number;
  buyer_name: string;
  seller_id: number;
  seller_name: string;
  reward_id: number;
  reward_name: string;
  price: number;
};

export type TownMallPurchased = {
  kind: "townmall_purchased";
  group_id: number | null;
  buyer_id: number;
  buyer_name: string;
  item_id: number;
  item_name: string;
  price: number;
};

export type LedgerEvent =
  | MilestoneReached
  | MedalAwarded
  | ConversionRateImproved
  | GroupHabitPerfected
  | RewardPurchased
  | TownMallPurchased;

/** Fire-and-forget delivery. A rejected publish is logged by the engine and never undoes the write. */
export interface AnnouncementSink {
  publish(event: LedgerEvent): Promise<void>;
}

export const silentSink: AnnouncementSink = {
  async publish() {
    // no channel configured
  }
};
