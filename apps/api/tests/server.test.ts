import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type LedgerEvent, MemoryLedgerStore } from "@streakmarket/ledger";
import { buildServer } from "../src/server.js";

type App = ReturnType<typeof buildServer>;

let app: App;
let published: LedgerEvent[];

async function post(url: string, payload: object) {
  return app.inject({ method: "POST", url, payload });
}

async function seed() {
  await post("/bot/upsert-user", { telegram_user_id: 101, username: "alice", first_name: "Alice" });
  await post("/bot/upsert-user", { telegram_user_id: 102, username: "bob" });
  const group = (await post("/bot/groups", { name: "Night Owls" })).json().group;
  await post(`/bot/groups/${group.id}/join`, { user_id: 101 });
  await post(`/bot/groups/${group.id}/join`, { user_id: 102 });
  const habit = (await post("/bot/habits", { user_id: 101, name: "Run 5k", point_type: "physical" })).json().habit;
  return { groupId: Number(group.id), habitId: Number(habit.id) };
}

beforeEach(() => {
  published = [];
  app = buildServer({
    store: new MemoryLedgerStore(),
    logLevel: "silent",
    sink: () => ({
      async publish(event) {
        published.push(event);
      }
    })
  });
});

afterEach(async () => {
  await app.close();
});

describe("api", () => {
  it("reports health", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, service: "streakmarket-api" });
  });

  it("records a completion once and shows it on the profile", async () => {
    const { habitId } = await seed();
    const first = await post(`/bot/habits/${habitId}/complete`, { user_id: 101, date: "2024-03-01" });
    expect(first.statusCode).toBe(200);
    expect(first.json()).toMatchObject({
      ok: true,
      date: "2024-03-01",
      recorded: true,
      payout: { kind: "point", type: "physical", amount: 1 }
    });

    const again = await post(`/bot/habits/${habitId}/complete`, { user_id: 101, date: "2024-03-01" });
    expect(again.json()).toMatchObject({ ok: true, recorded: false, payout: null });

    const me = (await app.inject({ method: "GET", url: "/bot/me/101" })).json();
    expect(me.user.points.physical).toBe(1);
    expect(me.conversion_rate).toBe(2);
    expect(me.medals).toEqual([]);

    const done = (await app.inject({ method: "GET", url: "/bot/completions/101?date=2024-03-01" })).json();
    expect(done).toEqual({ ok: true, date: "2024-03-01", habit_ids: [habitId] });
  });

  it("maps ledger errors to status codes", async () => {
    await seed();
    const missing = await post("/bot/habits/999/complete", { user_id: 101, date: "2024-03-01" });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ ok: false, error: "NotFound", message: "habit 999 not found" });

    const reward = (await post("/bot/rewards", { user_id: 102, name: "Movie night", price: 3, point_type: "arts" })).json()
      .reward;
    const buy = await post(`/bot/rewards/${reward.id}/buy`, { user_id: 101 });
    expect(buy.statusCode).toBe(409);
    expect(buy.json()).toEqual({ ok: false, error: "InsufficientFunds", message: "needs 3 arts points, has 0" });

    const own = await post(`/bot/rewards/${reward.id}/buy`, { user_id: 102 });
    expect(own.statusCode).toBe(403);
    expect(own.json().error).toBe("NotAllowed");
  });

  it("rejects malformed requests with 400", async () => {
    const { habitId } = await seed();
    const badDate = await post(`/bot/habits/${habitId}/complete`, { user_id: 101, date: "2024-02-30" });
    expect(badDate.statusCode).toBe(400);
    expect(badDate.json()).toEqual({ ok: false, error: "InvalidInput", message: "date: expected YYYY-MM-DD" });

    const badType = await post("/bot/habits", { user_id: 101, name: "Nap", point_type: "sleep" });
    expect(badType.statusCode).toBe(400);
    expect(badType.json().error).toBe("InvalidInput");

    const badConversion = await post("/bot/points/convert", { user_id: 101, from: "arts", to: "arts", amount: 2 });
    expect(badConversion.statusCode).toBe(400);
    expect(badConversion.json().error).toBe("InvalidConversion");
  });

  it("pays for an any-type reward with an explicit allocation", async () => {
    const { habitId } = await seed();
    for (const day of ["2024-03-01", "2024-03-02", "2024-03-03"]) {
      await post(`/bot/habits/${habitId}/complete`, { user_id: 101, date: day });
    }
    const reward = (await post("/bot/rewards", { user_id: 102, name: "Coffee", price: 3, point_type: "any" })).json().reward;

    const off = await post(`/bot/rewards/${reward.id}/buy`, { user_id: 101, allocation: { physical: 2 } });
    expect(off.statusCode).toBe(400);
    expect(off.json().error).toBe("InvalidAllocation");

    const res = await post(`/bot/rewards/${reward.id}/buy`, { user_id: 101, allocation: { physical: 3 } });
    expect(res.statusCode).toBe(200);
    expect(res.json().allocation).toEqual({ physical: 3 });

    const bob = (await app.inject({ method: "GET", url: "/bot/me/102" })).json();
    expect(bob.user.coins).toBe(3);
    const history = (await app.inject({ method: "GET", url: "/bot/transactions/102" })).json();
    expect(history.transactions).toHaveLength(1);
    expect(published.map((e) => e.kind)).toEqual(["reward_purchased"]);
  });

  it("hands milestone events to the sink", async () => {
    const { habitId } = await seed();
    for (let day = 1; day <= 7; day++) {
      await post(`/bot/habits/${habitId}/complete`, { user_id: 101, date: `2024-03-0${day}` });
    }
    expect(published).toEqual([
      {
        kind: "milestone_reached",
        group_id: expect.any(Number),
        user_id: 101,
        user_name: "Alice",
        habit_id: habitId,
        habit_name: "Run 5k",
        days: 7
      }
    ]);
    const streak = (await app.inject({ method: "GET", url: `/bot/habits/${habitId}/streak/101` })).json().streak;
    expect(streak).toMatchObject({ current_streak: 7, best_streak: 7, last_completion_date: "2024-03-07" });
  });

  it("deletes a habit and returns the reversals", async () => {
    const { groupId, habitId } = await seed();
    await post(`/bot/habits/${habitId}/complete`, { user_id: 101, date: "2024-03-01" });
    const res = await app.inject({ method: "DELETE", url: `/bot/habits/${habitId}?user_id=101` });
    expect(res.json()).toEqual({
      ok: true,
      reversals: [{ user_id: 101, completions: 1, type: "physical", debited: 1 }]
    });
    const habits = (await app.inject({ method: "GET", url: `/bot/groups/${groupId}/habits` })).json();
    expect(habits).toEqual({ ok: true, habits: [] });
  });

  it("runs the town mall", async () => {
    await seed();
    const created = await post("/bot/townmall", { name: "Sticker pack", price: 2, stock: 0 });
    expect(created.statusCode).toBe(201);
    const item = created.json().item;
    expect(item).toMatchObject({ name: "Sticker pack", description: null, price: 2, stock: 0, sponsor_id: null });

    const sold = await post(`/bot/townmall/${item.id}/buy`, { user_id: 101 });
    expect(sold.statusCode).toBe(409);
    expect(sold.json().error).toBe("OutOfStock");

    await app.inject({ method: "DELETE", url: `/bot/townmall/${item.id}` });
    expect((await app.inject({ method: "GET", url: "/bot/townmall" })).json()).toEqual({ ok: true, items: [] });
  });

  it("links a chat and ranks the month", async () => {
    const { groupId, habitId } = await seed();
    const linked = await post(`/bot/groups/${groupId}/chat`, { chat_id: -100500 });
    expect(linked.json().group.chat_id).toBe(-100500);

    await post(`/bot/habits/${habitId}/complete`, { user_id: 102, date: "2024-03-05" });
    const board = (await app.inject({ method: "GET", url: `/bot/groups/${groupId}/leaderboard?month=2024-03` })).json();
    expect(board).toEqual({
      ok: true,
      month: "2024-03",
      leaderboard: [{ user_id: 102, username: "bob", first_name: null, completions: 1 }]
    });
  });
});
