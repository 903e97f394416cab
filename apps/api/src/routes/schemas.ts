import { z } from "zod";
import { ANY_POINT_TYPE, POINT_TYPES, isIsoDate, isIsoMonth } from "@streakmarket/shared";

// Request shapes shared by the /bot routes.

export const id = z.coerce.number().int().positive();
export const pointType = z.enum(POINT_TYPES);
export const rewardPointType = z.union([pointType, z.literal(ANY_POINT_TYPE)]);
export const isoDate = z.string().refine(isIsoDate, "expected YYYY-MM-DD");
export const isoMonth = z.string().refine(isIsoMonth, "expected YYYY-MM");
export const price = z.number().int().positive();

const amount = z.number().int().nonnegative().optional();
export const allocation = z
  .object({ physical: amount, arts: amount, food_related: amount, educational: amount, other: amount })
  .strict();

export const UserParams = z.object({ userId: id });
export const GroupParams = z.object({ groupId: id });
export const HabitParams = z.object({ habitId: id });
export const RewardParams = z.object({ rewardId: id });
export const ItemParams = z.object({ itemId: id });
export const ActorQuery = z.object({ user_id: id });
export const ActorBody = z.object({ user_id: id });
