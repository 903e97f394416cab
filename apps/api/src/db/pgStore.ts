import fs from "node:fs/promises";
import pg from "pg";
import type { Pool, PoolClient, QueryResultRow } from "pg";
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
import type {
  LedgerStore,
  LedgerTx,
  NewHabit,
  NewReward,
  NewTownMallItem,
  NewTransaction,
  TownMallItemPatch
} from "@streakmarket/ledger";

const INT8_OID = 20;
const NUMERIC_OID = 1700;
const DATE_OID = 1082;

// int8 ids (chat user ids) fit in a double; NUMERIC coins have one decimal; DATE stays "YYYY-MM-DD".
pg.types.setTypeParser(INT8_OID, (v: string) => Number(v));
pg.types.setTypeParser(NUMERIC_OID, (v: string) => Number.parseFloat(v));
pg.types.setTypeParser(DATE_OID, (v: string) => v);

export function createPool(connectionString: string): Pool {
  return new pg.Pool({ connectionString });
}

export async function migrate(pool: Pool): Promise<void> {
  const sql = await fs.readFile(new URL("../../sql/schema.sql", import.meta.url), "utf8");
  await pool.query(sql);
}

const POINT_COLUMN: Record<PointType, string> = {
  physical: "points_physical",
  arts: "points_arts",
  food_related: "points_food_related",
  educational: "points_educational",
  other: "points_other"
};

interface UserRow extends QueryResultRow {
  id: number;
  username: string | null;
  first_name: string | null;
  group_id: number | null;
  points_physical: number;
  points_arts: number;
  points_food_related: number;
  points_educational: number;
  points_other: number;
  coins: number;
  created_at: Date;
}

interface GroupRow extends QueryResultRow {
  id: number;
  name: string;
  chat_id: number | null;
  created_at: Date;
}

interface HabitRow extends QueryResultRow {
  id: number;
  group_id: number;
  name: string;
  point_type: PointType;
  created_by: number | null;
  created_at: Date;
}

interface RewardRow extends QueryResultRow {
  id: number;
  owner_id: number;
  name: string;
  price: number;
  point_type: RewardPointType;
  is_active: boolean;
  created_at: Date;
}

interface TransactionRow extends QueryResultRow {
  id: number;
  buyer_id: number;
  seller_id: number;
  reward_id: number;
  price: number;
  point_type: RewardPointType;
  allocation: Allocation;
  created_at: Date;
}

interface ItemRow extends QueryResultRow {
  id: number;
  name: string;
  description: string | null;
  price: number;
  stock: number;
  sponsor_id: number | null;
  is_active: boolean;
  created_at: Date;
}

interface PurchaseRow extends QueryResultRow {
  id: number;
  item_id: number;
  buyer_id: number;
  price: number;
  created_at: Date;
}

interface MedalRow extends QueryResultRow {
  user_id: number;
  habit_id: number;
  habit_name: string;
  earned_at: Date;
}

type StreakRow = DbStreak & QueryResultRow;

function toUser(r: UserRow): DbUser {
  return {
    id: r.id,
    username: r.username,
    first_name: r.first_name,
    group_id: r.group_id,
    points: {
      physical: r.points_physical,
      arts: r.points_arts,
      food_related: r.points_food_related,
      educational: r.points_educational,
      other: r.points_other
    },
    coins: r.coins,
    created_at: r.created_at.toISOString()
  };
}

function toGroup(r: GroupRow): DbGroup {
  return { id: r.id, name: r.name, chat_id: r.chat_id, created_at: r.created_at.toISOString() };
}

function toHabit(r: HabitRow): DbHabit {
  return {
    id: r.id,
    group_id: r.group_id,
    name: r.name,
    point_type: r.point_type,
    created_by: r.created_by,
    created_at: r.created_at.toISOString()
  };
}

function toReward(r: RewardRow): DbReward {
  return {
    id: r.id,
    owner_id: r.owner_id,
    name: r.name,
    price: r.price,
    point_type: r.point_type,
    is_active: r.is_active,
    created_at: r.created_at.toISOString()
  };
}

function toTransaction(r: TransactionRow): DbTransaction {
  return {
    id: r.id,
    buyer_id: r.buyer_id,
    seller_id: r.seller_id,
    reward_id: r.reward_id,
    price: r.price,
    point_type: r.point_type,
    allocation: r.allocation,
    created_at: r.created_at.toISOString()
  };
}

function toItem(r: ItemRow): DbTownMallItem {
  return {
    id: r.id,
    name: r.name,
    description: r.description,
    price: r.price,
    stock: r.stock,
    sponsor_id: r.sponsor_id,
    is_active: r.is_active,
    created_at: r.created_at.toISOString()
  };
}

function toPurchase(r: PurchaseRow): DbTownMallPurchase {
  return { id: r.id, item_id: r.item_id, buyer_id: r.buyer_id, price: r.price, created_at: r.created_at.toISOString() };
}

function toMedal(r: MedalRow): DbMedal {
  return { user_id: r.user_id, habit_id: r.habit_id, habit_name: r.habit_name, earned_at: r.earned_at.toISOString() };
}

function toStreak(r: StreakRow): DbStreak {
  return {
    user_id: r.user_id,
    habit_id: r.habit_id,
    current_streak: r.current_streak,
    best_streak: r.best_streak,
    last_completion_date: r.last_completion_date,
    milestone_7_announced: r.milestone_7_announced,
    milestone_15_announced: r.milestone_15_announced,
    milestone_30_announced: r.milestone_30_announced
  };
}

function required<T>(row: T | undefined, what: string): T {
  if (row === undefined) throw new Error(`${what}: no row returned`);
  return row;
}

class PgTx implements LedgerTx {
  constructor(private readonly client: PoolClient) {}

  private async rows<R extends QueryResultRow>(text: string, params: unknown[] = []): Promise<R[]> {
    const res = await this.client.query<R>(text, params);
    return res.rows;
  }

  private async count(text: string, params: unknown[]): Promise<number> {
    const res = await this.client.query(text, params);
    return res.rowCount ?? 0;
  }

  // --- users ---

  async getUser(id: number) {
    // Row lock: balance checks and debits for one user never interleave.
    const [row] = await this.rows<UserRow>("SELECT * FROM users WHERE id = $1 FOR UPDATE", [id]);
    return row ? toUser(row) : null;
  }

  async upsertUser(input: { id: number; username: string | null; first_name: string | null }) {
    const [row] = await this.rows<UserRow>(
      `INSERT INTO users (id, username, first_name) VALUES ($1, $2, $3)
       ON CONFLICT (id) DO UPDATE SET username = EXCLUDED.username, first_name = EXCLUDED.first_name
       RETURNING *`,
      [input.id, input.username, input.first_name]
    );
    return toUser(required(row, "upsertUser"));
  }

  async setUserGroup(userId: number, groupId: number) {
    await this.client.query("UPDATE users SET group_id = $2 WHERE id = $1", [userId, groupId]);
  }

  async adjustPoints(userId: number, type: PointType, delta: number) {
    const col = POINT_COLUMN[type];
    await this.client.query(`UPDATE users SET ${col} = ${col} + $2 WHERE id = $1`, [userId, delta]);
  }

  async adjustCoins(userId: number, delta: number) {
    await this.client.query("UPDATE users SET coins = coins + $2 WHERE id = $1", [userId, delta]);
  }

  // --- groups ---

  async createGroup(name: string) {
    const [row] = await this.rows<GroupRow>("INSERT INTO groups (name) VALUES ($1) RETURNING *", [name]);
    return toGroup(required(row, "createGroup"));
  }

  async getGroup(id: number) {
    const [row] = await this.rows<GroupRow>("SELECT * FROM groups WHERE id = $1", [id]);
    return row ? toGroup(row) : null;
  }

  async getGroupByName(name: string) {
    const [row] = await this.rows<GroupRow>("SELECT * FROM groups WHERE name = $1", [name]);
    return row ? toGroup(row) : null;
  }

  async setGroupChat(groupId: number, chatId: number | null) {
    await this.client.query("UPDATE groups SET chat_id = $2 WHERE id = $1", [groupId, chatId]);
  }

  async listGroupMembers(groupId: number) {
    const rows = await this.rows<UserRow>("SELECT * FROM users WHERE group_id = $1 ORDER BY id", [groupId]);
    return rows.map(toUser);
  }

  // --- habits ---

  async createHabit(input: NewHabit) {
    const [row] = await this.rows<HabitRow>(
      "INSERT INTO habits (group_id, name, point_type, created_by) VALUES ($1, $2, $3, $4) RETURNING *",
      [input.group_id, input.name, input.point_type, input.created_by]
    );
    return toHabit(required(row, "createHabit"));
  }

  async getHabit(id: number) {
    const [row] = await this.rows<HabitRow>("SELECT * FROM habits WHERE id = $1", [id]);
    return row ? toHabit(row) : null;
  }

  async updateHabit(id: number, patch: { name: string; point_type: PointType }) {
    await this.client.query("UPDATE habits SET name = $2, point_type = $3 WHERE id = $1", [id, patch.name, patch.point_type]);
  }

  async deleteHabit(id: number) {
    await this.client.query("DELETE FROM habits WHERE id = $1", [id]);
  }

  async listGroupHabits(groupId: number) {
    const rows = await this.rows<HabitRow>("SELECT * FROM habits WHERE group_id = $1 ORDER BY id", [groupId]);
    return rows.map(toHabit);
  }

  // --- completions ---

  async insertCompletion(c: DbCompletion) {
    const n = await this.count(
      `INSERT INTO habit_completions (user_id, habit_id, completion_date, paid_in) VALUES ($1, $2, $3, $4)
       ON CONFLICT DO NOTHING`,
      [c.user_id, c.habit_id, c.completion_date, c.paid_in]
    );
    return n > 0;
  }

  async deleteCompletion(key: CompletionKey) {
    const rows = await this.rows<{ paid_in: CompletionPaidIn }>(
      `DELETE FROM habit_completions WHERE user_id = $1 AND habit_id = $2 AND completion_date = $3
       RETURNING paid_in`,
      [key.user_id, key.habit_id, key.completion_date]
    );
    return rows[0]?.paid_in ?? null;
  }

  async listCompletionDates(userId: number, habitId: number) {
    const rows = await this.rows<{ completion_date: string }>(
      "SELECT completion_date FROM habit_completions WHERE user_id = $1 AND habit_id = $2 ORDER BY completion_date",
      [userId, habitId]
    );
    return rows.map((r) => r.completion_date);
  }

  async listHabitIdsCompletedOn(userId: number, date: string) {
    const rows = await this.rows<{ habit_id: number }>(
      "SELECT habit_id FROM habit_completions WHERE user_id = $1 AND completion_date = $2 ORDER BY habit_id",
      [userId, date]
    );
    return rows.map((r) => r.habit_id);
  }

  async countCompletionsByUser(habitId: number) {
    return this.rows<{ user_id: number; count: number }>(
      `SELECT user_id, count(*)::int AS count FROM habit_completions
       WHERE habit_id = $1 GROUP BY user_id ORDER BY user_id`,
      [habitId]
    );
  }

  async listHabitCompletionDays(habitId: number, userIds: number[], from: string, to: string) {
    const rows = await this.rows<{ completion_date: string }>(
      `SELECT DISTINCT completion_date FROM habit_completions
       WHERE habit_id = $1 AND user_id = ANY($2::bigint[]) AND completion_date BETWEEN $3 AND $4
       ORDER BY completion_date`,
      [habitId, userIds, from, to]
    );
    return rows.map((r) => r.completion_date);
  }

  async deleteHabitCompletions(habitId: number) {
    return this.count("DELETE FROM habit_completions WHERE habit_id = $1", [habitId]);
  }

  async monthlyLeaderboard(groupId: number, from: string, to: string) {
    return this.rows<LeaderboardRow & QueryResultRow>(
      `SELECT u.id AS user_id, u.username, u.first_name, count(*)::int AS completions
       FROM habit_completions c JOIN users u ON u.id = c.user_id
       WHERE u.group_id = $1 AND c.completion_date BETWEEN $2 AND $3
       GROUP BY u.id ORDER BY completions DESC, u.id`,
      [groupId, from, to]
    );
  }

  // --- streaks ---

  async getStreak(userId: number, habitId: number) {
    const [row] = await this.rows<StreakRow>("SELECT * FROM habit_streaks WHERE user_id = $1 AND habit_id = $2", [
      userId,
      habitId
    ]);
    return row ? toStreak(row) : null;
  }

  async saveStreak(s: DbStreak) {
    await this.client.query(
      `INSERT INTO habit_streaks (user_id, habit_id, current_streak, best_streak, last_completion_date,
         milestone_7_announced, milestone_15_announced, milestone_30_announced)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (user_id, habit_id) DO UPDATE SET
         current_streak = EXCLUDED.current_streak,
         best_streak = EXCLUDED.best_streak,
         last_completion_date = EXCLUDED.last_completion_date,
         milestone_7_announced = EXCLUDED.milestone_7_announced,
         milestone_15_announced = EXCLUDED.milestone_15_announced,
         milestone_30_announced = EXCLUDED.milestone_30_announced`,
      [
        s.user_id,
        s.habit_id,
        s.current_streak,
        s.best_streak,
        s.last_completion_date,
        s.milestone_7_announced,
        s.milestone_15_announced,
        s.milestone_30_announced
      ]
    );
  }

  async deleteHabitStreaks(habitId: number) {
    await this.client.query("DELETE FROM habit_streaks WHERE habit_id = $1", [habitId]);
  }

  // --- medals ---

  async hasMedal(userId: number, habitId: number) {
    const rows = await this.rows("SELECT 1 FROM medals WHERE user_id = $1 AND habit_id = $2", [userId, habitId]);
    return rows.length > 0;
  }

  async insertMedal(input: { user_id: number; habit_id: number; habit_name: string }) {
    const n = await this.count(
      "INSERT INTO medals (user_id, habit_id, habit_name) VALUES ($1, $2, $3) ON CONFLICT DO NOTHING",
      [input.user_id, input.habit_id, input.habit_name]
    );
    return n > 0;
  }

  async countMedals(userId: number) {
    const [row] = await this.rows<{ n: number }>("SELECT count(*)::int AS n FROM medals WHERE user_id = $1", [userId]);
    return row?.n ?? 0;
  }

  async listMedals(userId: number) {
    const rows = await this.rows<MedalRow>("SELECT * FROM medals WHERE user_id = $1 ORDER BY earned_at, habit_id", [userId]);
    return rows.map(toMedal);
  }

  // --- rewards ---

  async createReward(input: NewReward) {
    const [row] = await this.rows<RewardRow>(
      "INSERT INTO rewards (owner_id, name, price, point_type) VALUES ($1, $2, $3, $4) RETURNING *",
      [input.owner_id, input.name, input.price, input.point_type]
    );
    return toReward(required(row, "createReward"));
  }

  async getReward(id: number) {
    const [row] = await this.rows<RewardRow>("SELECT * FROM rewards WHERE id = $1", [id]);
    return row ? toReward(row) : null;
  }

  async updateReward(id: number, patch: { name?: string; price?: number }) {
    await this.client.query("UPDATE rewards SET name = COALESCE($2, name), price = COALESCE($3, price) WHERE id = $1", [
      id,
      patch.name ?? null,
      patch.price ?? null
    ]);
  }

  async deactivateReward(id: number) {
    await this.client.query("UPDATE rewards SET is_active = false WHERE id = $1", [id]);
  }

  async listGroupRewards(groupId: number) {
    const rows = await this.rows<RewardRow>(
      `SELECT r.* FROM rewards r JOIN users u ON u.id = r.owner_id
       WHERE u.group_id = $1 AND r.is_active ORDER BY r.price, r.id`,
      [groupId]
    );
    return rows.map(toReward);
  }

  async insertTransaction(input: NewTransaction) {
    const [row] = await this.rows<TransactionRow>(
      `INSERT INTO transactions (buyer_id, seller_id, reward_id, price, point_type, allocation)
       VALUES ($1, $2, $3, $4, $5, $6) RETURNING *`,
      [input.buyer_id, input.seller_id, input.reward_id, input.price, input.point_type, JSON.stringify(input.allocation)]
    );
    return toTransaction(required(row, "insertTransaction"));
  }

  async listUserTransactions(userId: number) {
    const rows = await this.rows<TransactionRow>(
      "SELECT * FROM transactions WHERE buyer_id = $1 OR seller_id = $1 ORDER BY id DESC",
      [userId]
    );
    return rows.map(toTransaction);
  }

  // --- group achievements ---

  async hasGroupAchievement(groupId: number, habitId: number, month: string) {
    const rows = await this.rows("SELECT 1 FROM group_achievements WHERE group_id = $1 AND habit_id = $2 AND month = $3", [
      groupId,
      habitId,
      month
    ]);
    return rows.length > 0;
  }

  async insertGroupAchievement(groupId: number, habitId: number, month: string) {
    await this.client.query(
      "INSERT INTO group_achievements (group_id, habit_id, month) VALUES ($1, $2, $3) ON CONFLICT DO NOTHING",
      [groupId, habitId, month]
    );
  }

  async deleteHabitAchievements(habitId: number) {
    await this.client.query("DELETE FROM group_achievements WHERE habit_id = $1", [habitId]);
  }

  // --- town mall ---

  async createTownMallItem(input: NewTownMallItem) {
    const [row] = await this.rows<ItemRow>(
      `INSERT INTO townmall_items (name, description, price, stock, sponsor_id)
       VALUES ($1, $2, $3, $4, $5) RETURNING *`,
      [input.name, input.description, input.price, input.stock, input.sponsor_id]
    );
    return toItem(required(row, "createTownMallItem"));
  }

  async getTownMallItem(id: number) {
    const [row] = await this.rows<ItemRow>("SELECT * FROM townmall_items WHERE id = $1 FOR UPDATE", [id]);
    return row ? toItem(row) : null;
  }

  async updateTownMallItem(id: number, patch: TownMallItemPatch) {
    const sets: string[] = [];
    const params: unknown[] = [id];
    const add = (col: string, value: unknown) => {
      params.push(value);
      sets.push(`${col} = $${params.length}`);
    };
    if (patch.name !== undefined) add("name", patch.name);
    if (patch.description !== undefined) add("description", patch.description);
    if (patch.price !== undefined) add("price", patch.price);
    if (patch.stock !== undefined) add("stock", patch.stock);
    if (sets.length === 0) return;
    await this.client.query(`UPDATE townmall_items SET ${sets.join(", ")} WHERE id = $1`, params);
  }

  async deactivateTownMallItem(id: number) {
    await this.client.query("UPDATE townmall_items SET is_active = false WHERE id = $1", [id]);
  }

  async listTownMallItems() {
    const rows = await this.rows<ItemRow>("SELECT * FROM townmall_items WHERE is_active ORDER BY price, id");
    return rows.map(toItem);
  }

  async decrementStock(itemId: number) {
    await this.client.query("UPDATE townmall_items SET stock = stock - 1 WHERE id = $1 AND stock > 0", [itemId]);
  }

  async insertTownMallPurchase(input: { item_id: number; buyer_id: number; price: number }) {
    const [row] = await this.rows<PurchaseRow>(
      "INSERT INTO townmall_purchases (item_id, buyer_id, price) VALUES ($1, $2, $3) RETURNING *",
      [input.item_id, input.buyer_id, input.price]
    );
    return toPurchase(required(row, "insertTownMallPurchase"));
  }

  async listUserTownMallPurchases(userId: number) {
    const rows = await this.rows<PurchaseRow>("SELECT * FROM townmall_purchases WHERE buyer_id = $1 ORDER BY id DESC", [
      userId
    ]);
    return rows.map(toPurchase);
  }
}

/** One pooled client per unit of work, wrapped in BEGIN / COMMIT, rolled back on any throw. */
export class PgLedgerStore implements LedgerStore {
  constructor(private readonly pool: Pool) {}

  async transaction<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await fn(new PgTx(client));
      await client.query("COMMIT");
      return result;
    } catch (e) {
      await client.query("ROLLBACK");
      throw e;
    } finally {
      client.release();
    }
  }
}
