import { pino, type BaseLogger } from "pino";
import {
  type Allocation,
  type DbGroup,
  type DbHabit,
  type DbMedal,
  type DbReward,
  type DbStreak,
  type DbTownMallItem,
  type DbTownMallPurchase,
  type DbTransaction,
  type DbUser,
  type LeaderboardRow,
  type PointType,
  type RewardPointType,
  POINT_TYPES,
  isIsoDate,
  isIsoMonth,
  monthRange
} from "@streakmarket/shared";
import { type HabitReversal, purgeHabit } from "./compensation.js";
import {
  type CompletionResult,
  type UncompletionResult,
  displayName,
  recordCompletion,
  removeCompletion
} from "./completion.js";
import { LedgerError, notFound } from "./errors.js";
import { type AnnouncementSink, type LedgerEvent, silentSink } from "./events.js";
import { type ConversionQuote, conversionRate, quoteConversion } from "./payout.js";
import { resolvePayment } from "./settlement.js";
import type { LedgerStore, LedgerTx, TownMallItemPatch } from "./store.js";
import { emptyStreak, rebuildStreak } from "./streak.js";

export type LedgerEngineOptions = {
  store: LedgerStore;
  sink?: AnnouncementSink;
  log?: BaseLogger;
};

export type UserProfile = {
  user: DbUser;
  medals: DbMedal[];
  conversion_rate: number;
};

export type PurchaseResult = {
  transaction: DbTransaction;
  allocation: Allocation;
};

function requireDate(date: string): void {
  if (!isIsoDate(date)) throw new LedgerError("InvalidInput", `date must be YYYY-MM-DD, got "${date}"`);
}

function requireName(name: string, what: string): string {
  const s = name.trim();
  if (!s) throw new LedgerError("InvalidInput", `${what} name must not be empty`);
  return s;
}

function requirePrice(price: number): void {
  if (!Number.isInteger(price) || price <= 0) throw new LedgerError("InvalidInput", "price must be a positive integer");
}

async function loadUser(tx: LedgerTx, id: number): Promise<DbUser> {
  const user = await tx.getUser(id);
  if (!user) throw notFound("user", id);
  return user;
}

async function loadHabit(tx: LedgerTx, id: number): Promise<DbHabit> {
  const habit = await tx.getHabit(id);
  if (!habit) throw notFound("habit", id);
  return habit;
}

async function loadGroup(tx: LedgerTx, id: number): Promise<DbGroup> {
  const group = await tx.getGroup(id);
  if (!group) throw notFound("group", id);
  return group;
}

function requireMember(user: DbUser, groupId: number): void {
  if (user.group_id !== groupId) {
    throw new LedgerError("NotAllowed", `user ${user.id} is not a member of group ${groupId}`);
  }
}

/**
 * The ledger service. Every public method is one store transaction; announcements
 * collected along the way go to the sink only after the transaction commits.
 */
export class LedgerEngine {
  private readonly store: LedgerStore;
  private readonly sink: AnnouncementSink;
  private readonly log: BaseLogger;

  constructor(opts: LedgerEngineOptions) {
    this.store = opts.store;
    this.sink = opts.sink ?? silentSink;
    this.log = opts.log ?? pino({ level: "silent" });
  }

  private async run<T>(op: string, fn: (tx: LedgerTx, events: LedgerEvent[]) => Promise<T>): Promise<T> {
    const events: LedgerEvent[] = [];
    const result = await this.store.transaction((tx) => fn(tx, events));
    this.log.debug({ op, events: events.length }, "ledger op committed");
    await this.announce(events);
    return result;
  }

  private async announce(events: LedgerEvent[]): Promise<void> {
    for (const event of events) {
      try {
        await this.sink.publish(event);
      } catch (err) {
        this.log.warn({ err, event: event.kind }, "announcement delivery failed");
      }
    }
  }

  // --- users & groups ---

  registerUser(input: { id: number; username: string | null; first_name: string | null }): Promise<DbUser> {
    return this.run("registerUser", (tx) => tx.upsertUser(input));
  }

  getUser(userId: number): Promise<DbUser> {
    return this.run("getUser", (tx) => loadUser(tx, userId));
  }

  getProfile(userId: number): Promise<UserProfile> {
    return this.run("getProfile", async (tx) => {
      const user = await loadUser(tx, userId);
      const medals = await tx.listMedals(userId);
      return { user, medals, conversion_rate: conversionRate(medals.length) };
    });
  }

  createGroup(name: string): Promise<DbGroup> {
    return this.run("createGroup", async (tx) => {
      const clean = requireName(name, "group");
      if (await tx.getGroupByName(clean)) {
        throw new LedgerError("InvalidInput", `group "${clean}" already exists`);
      }
      return tx.createGroup(clean);
    });
  }

  getGroup(groupId: number): Promise<DbGroup> {
    return this.run("getGroup", (tx) => loadGroup(tx, groupId));
  }

  joinGroup(userId: number, groupId: number): Promise<DbGroup> {
    return this.run("joinGroup", async (tx) => {
      await loadUser(tx, userId);
      const group = await loadGroup(tx, groupId);
      await tx.setUserGroup(userId, groupId);
      return group;
    });
  }

  linkGroupChat(groupId: number, chatId: number | null): Promise<DbGroup> {
    return this.run("linkGroupChat", async (tx) => {
      const group = await loadGroup(tx, groupId);
      await tx.setGroupChat(groupId, chatId);
      return { ...group, chat_id: chatId };
    });
  }

  listGroupMembers(groupId: number): Promise<DbUser[]> {
    return this.run("listGroupMembers", async (tx) => {
      await loadGroup(tx, groupId);
      return tx.listGroupMembers(groupId);
    });
  }

  // --- habits ---

  listGroupHabits(groupId: number): Promise<DbHabit[]> {
    return this.run("listGroupHabits", async (tx) => {
      await loadGroup(tx, groupId);
      return tx.listGroupHabits(groupId);
    });
  }

  createHabit(actorId: number, input: { name: string; point_type: PointType }): Promise<DbHabit> {
    return this.run("createHabit", async (tx) => {
      const actor = await loadUser(tx, actorId);
      if (actor.group_id === null) throw new LedgerError("NotAllowed", "join a group before adding habits");
      return tx.createHabit({
        group_id: actor.group_id,
        name: requireName(input.name, "habit"),
        point_type: input.point_type,
        created_by: actorId
      });
    });
  }

  updateHabit(actorId: number, habitId: number, input: { name: string; point_type: PointType }): Promise<DbHabit> {
    return this.run("updateHabit", async (tx) => {
      const habit = await loadHabit(tx, habitId);
      requireMember(await loadUser(tx, actorId), habit.group_id);
      const name = requireName(input.name, "habit");
      await tx.updateHabit(habitId, { name, point_type: input.point_type });
      return { ...habit, name, point_type: input.point_type };
    });
  }

  /** Destructive: reverses the habit's point awards for every user, then deletes its history. */
  deleteHabit(actorId: number, habitId: number): Promise<HabitReversal[]> {
    return this.run("deleteHabit", async (tx) => {
      const habit = await loadHabit(tx, habitId);
      requireMember(await loadUser(tx, actorId), habit.group_id);
      const reversals = await purgeHabit(tx, habit);
      this.log.info({ habit_id: habitId, users: reversals.length }, "habit deleted");
      return reversals;
    });
  }

  // --- completions & streaks ---

  markComplete(userId: number, habitId: number, date: string): Promise<CompletionResult> {
    return this.run("markComplete", async (tx, events) => {
      requireDate(date);
      const user = await loadUser(tx, userId);
      const habit = await loadHabit(tx, habitId);
      requireMember(user, habit.group_id);
      return recordCompletion(tx, { user, habit, date }, events);
    });
  }

  unmarkComplete(userId: number, habitId: number, date: string): Promise<UncompletionResult> {
    return this.run("unmarkComplete", async (tx) => {
      requireDate(date);
      const user = await loadUser(tx, userId);
      const habit = await loadHabit(tx, habitId);
      return removeCompletion(tx, { user, habit, date });
    });
  }

  listCompletionsOn(userId: number, date: string): Promise<number[]> {
    return this.run("listCompletionsOn", async (tx) => {
      requireDate(date);
      await loadUser(tx, userId);
      return tx.listHabitIdsCompletedOn(userId, date);
    });
  }

  getStreak(userId: number, habitId: number): Promise<DbStreak> {
    return this.run("getStreak", async (tx) => {
      await loadHabit(tx, habitId);
      return (await tx.getStreak(userId, habitId)) ?? emptyStreak(userId, habitId);
    });
  }

  /** Rebuilds the stored streak from completion history; marks crossed milestones as announced without events. */
  recomputeStreak(userId: number, habitId: number): Promise<DbStreak> {
    return this.run("recomputeStreak", async (tx) => {
      await loadUser(tx, userId);
      await loadHabit(tx, habitId);
      const prev = (await tx.getStreak(userId, habitId)) ?? emptyStreak(userId, habitId);
      const next = rebuildStreak(prev, await tx.listCompletionDates(userId, habitId));
      await tx.saveStreak(next);
      return next;
    });
  }

  // --- points ---

  convertPoints(userId: number, from: PointType, to: PointType, amount: number): Promise<ConversionQuote> {
    return this.run("convertPoints", async (tx) => {
      const user = await loadUser(tx, userId);
      const quote = quoteConversion({
        from,
        to,
        amount,
        available: user.points[from],
        medalCount: await tx.countMedals(userId)
      });
      await tx.adjustPoints(userId, from, -quote.amount);
      await tx.adjustPoints(userId, to, quote.received);
      return quote;
    });
  }

  // --- rewards ---

  createReward(ownerId: number, input: { name: string; price: number; point_type: RewardPointType }): Promise<DbReward> {
    return this.run("createReward", async (tx) => {
      await loadUser(tx, ownerId);
      requirePrice(input.price);
      return tx.createReward({
        owner_id: ownerId,
        name: requireName(input.name, "reward"),
        price: input.price,
        point_type: input.point_type
      });
    });
  }

  updateReward(ownerId: number, rewardId: number, patch: { name?: string; price?: number }): Promise<DbReward> {
    return this.run("updateReward", async (tx) => {
      const reward = await this.loadOwnReward(tx, ownerId, rewardId);
      const clean: { name?: string; price?: number } = {};
      if (patch.name !== undefined) clean.name = requireName(patch.name, "reward");
      if (patch.price !== undefined) {
        requirePrice(patch.price);
        clean.price = patch.price;
      }
      await tx.updateReward(rewardId, clean);
      return { ...reward, ...clean };
    });
  }

  deleteReward(ownerId: number, rewardId: number): Promise<void> {
    return this.run("deleteReward", async (tx) => {
      await this.loadOwnReward(tx, ownerId, rewardId);
      await tx.deactivateReward(rewardId);
    });
  }

  listGroupRewards(groupId: number): Promise<DbReward[]> {
    return this.run("listGroupRewards", async (tx) => {
      await loadGroup(tx, groupId);
      return tx.listGroupRewards(groupId);
    });
  }

  /**
   * Buyer pays in typed points; the seller is credited the full price in coins.
   * For "any" rewards an explicit allocation is used as given, otherwise types are drained in order.
   */
  buyReward(buyerId: number, rewardId: number, allocation?: Allocation): Promise<PurchaseResult> {
    return this.run("buyReward", async (tx, events) => {
      const reward = await tx.getReward(rewardId);
      if (!reward || !reward.is_active) throw notFound("reward", rewardId);
      const buyer = await loadUser(tx, buyerId);
      const seller = await loadUser(tx, reward.owner_id);
      if (buyer.id === seller.id) throw new LedgerError("NotAllowed", "cannot buy your own reward");
      if (buyer.group_id === null || buyer.group_id !== seller.group_id) {
        throw new LedgerError("NotAllowed", "rewards can only be bought inside your group");
      }

      const debit = resolvePayment({
        point_type: reward.point_type,
        price: reward.price,
        balances: buyer.points,
        allocation
      });
      for (const type of POINT_TYPES) {
        const amount = debit[type];
        if (amount) await tx.adjustPoints(buyer.id, type, -amount);
      }
      await tx.adjustCoins(seller.id, reward.price);
      const transaction = await tx.insertTransaction({
        buyer_id: buyer.id,
        seller_id: seller.id,
        reward_id: reward.id,
        price: reward.price,
        point_type: reward.point_type,
        allocation: debit
      });

      events.push({
        kind: "reward_purchased",
        group_id: buyer.group_id,
        buyer_id: buyer.id,
        buyer_name: displayName(buyer),
        seller_id: seller.id,
        seller_name: displayName(seller),
        reward_id: reward.id,
        reward_name: reward.name,
        price: reward.price
      });
      return { transaction, allocation: debit };
    });
  }

  listTransactions(userId: number): Promise<DbTransaction[]> {
    return this.run("listTransactions", async (tx) => {
      await loadUser(tx, userId);
      return tx.listUserTransactions(userId);
    });
  }

  private async loadOwnReward(tx: LedgerTx, ownerId: number, rewardId: number): Promise<DbReward> {
    const reward = await tx.getReward(rewardId);
    if (!reward || !reward.is_active) throw notFound("reward", rewardId);
    if (reward.owner_id !== ownerId) throw new LedgerError("NotAllowed", "only the owner can change a reward");
    return reward;
  }

  // --- town mall ---

  addTownMallItem(input: {
    name: string;
    description?: string | null;
    price: number;
    stock?: number;
    sponsor_id?: number | null;
  }): Promise<DbTownMallItem> {
    return this.run("addTownMallItem", async (tx) => {
      requirePrice(input.price);
      const stock = input.stock ?? -1;
      if (!Number.isInteger(stock) || stock < -1) throw new LedgerError("InvalidInput", "stock must be -1 or a non-negative integer");
      const sponsor = input.sponsor_id ?? null;
      if (sponsor !== null) await loadUser(tx, sponsor);
      return tx.createTownMallItem({
        name: requireName(input.name, "item"),
        description: input.description ?? null,
        price: input.price,
        stock,
        sponsor_id: sponsor
      });
    });
  }

  updateTownMallItem(itemId: number, patch: TownMallItemPatch): Promise<DbTownMallItem> {
    return this.run("updateTownMallItem", async (tx) => {
      const item = await tx.getTownMallItem(itemId);
      if (!item || !item.is_active) throw notFound("item", itemId);
      const clean: TownMallItemPatch = { ...patch };
      if (clean.name !== undefined) clean.name = requireName(clean.name, "item");
      if (clean.price !== undefined) requirePrice(clean.price);
      if (clean.stock !== undefined && (!Number.isInteger(clean.stock) || clean.stock < -1)) {
        throw new LedgerError("InvalidInput", "stock must be -1 or a non-negative integer");
      }
      await tx.updateTownMallItem(itemId, clean);
      return { ...item, ...clean };
    });
  }

  removeTownMallItem(itemId: number): Promise<void> {
    return this.run("removeTownMallItem", async (tx) => {
      const item = await tx.getTownMallItem(itemId);
      if (!item || !item.is_active) throw notFound("item", itemId);
      await tx.deactivateTownMallItem(itemId);
    });
  }

  listTownMallItems(): Promise<DbTownMallItem[]> {
    return this.run("listTownMallItems", (tx) => tx.listTownMallItems());
  }

  buyTownMallItem(userId: number, itemId: number): Promise<DbTownMallPurchase> {
    return this.run("buyTownMallItem", async (tx, events) => {
      const item = await tx.getTownMallItem(itemId);
      if (!item || !item.is_active) throw notFound("item", itemId);
      const buyer = await loadUser(tx, userId);
      if (item.stock === 0) throw new LedgerError("OutOfStock", `${item.name} is out of stock`);
      if (buyer.coins < item.price) {
        throw new LedgerError("InsufficientFunds", `needs ${item.price} coins, has ${buyer.coins}`);
      }
      await tx.adjustCoins(buyer.id, -item.price);
      if (item.stock !== -1) await tx.decrementStock(item.id);
      const purchase = await tx.insertTownMallPurchase({ item_id: item.id, buyer_id: buyer.id, price: item.price });
      events.push({
        kind: "townmall_purchased",
        group_id: buyer.group_id,
        buyer_id: buyer.id,
        buyer_name: displayName(buyer),
        item_id: item.id,
        item_name: item.name,
        price: item.price
      });
      return purchase;
    });
  }

  listTownMallPurchases(userId: number): Promise<DbTownMallPurchase[]> {
    return this.run("listTownMallPurchases", async (tx) => {
      await loadUser(tx, userId);
      return tx.listUserTownMallPurchases(userId);
    });
  }

  // --- reports ---

  monthlyLeaderboard(groupId: number, month: string): Promise<LeaderboardRow[]> {
    return this.run("monthlyLeaderboard", async (tx) => {
      if (!isIsoMonth(month)) throw new LedgerError("InvalidInput", `month must be YYYY-MM, got "${month}"`);
      await loadGroup(tx, groupId);
      const { first, last } = monthRange(month);
      return tx.monthlyLeaderboard(groupId, first, last);
    });
  }
}
