import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { todayLocal } from "@streakmarket/shared";
import type { LedgerEngine } from "@streakmarket/ledger";
import { ActorQuery, GroupParams, HabitParams, UserParams, id, isoDate, pointType } from "./schemas.js";

const HabitBody = z.object({ user_id: id, name: z.string().min(1), point_type: pointType });
const CompletionBody = z.object({ user_id: id, date: isoDate.optional() });
const DateQuery = z.object({ date: isoDate.optional() });
const StreakParams = z.object({ habitId: id, userId: id });

export function registerHabitRoutes(app: FastifyInstance, engine: LedgerEngine) {
  app.get("/bot/groups/:groupId/habits", async (req) => {
    const { groupId } = GroupParams.parse(req.params);
    return { ok: true, habits: await engine.listGroupHabits(groupId) };
  });

  app.post("/bot/habits", async (req, reply) => {
    const body = HabitBody.parse(req.body);
    const habit = await engine.createHabit(body.user_id, { name: body.name, point_type: body.point_type });
    reply.code(201);
    return { ok: true, habit };
  });

  app.put("/bot/habits/:habitId", async (req) => {
    const { habitId } = HabitParams.parse(req.params);
    const body = HabitBody.parse(req.body);
    const habit = await engine.updateHabit(body.user_id, habitId, { name: body.name, point_type: body.point_type });
    return { ok: true, habit };
  });

  // Irreversible: takes back every point the habit paid out.
  app.delete("/bot/habits/:habitId", async (req) => {
    const { habitId } = HabitParams.parse(req.params);
    const { user_id } = ActorQuery.parse(req.query);
    const reversals = await engine.deleteHabit(user_id, habitId);
    return { ok: true, reversals };
  });

  app.post("/bot/habits/:habitId/complete", async (req) => {
    const { habitId } = HabitParams.parse(req.params);
    const body = CompletionBody.parse(req.body);
    const date = body.date ?? todayLocal();
    const result = await engine.markComplete(body.user_id, habitId, date);
    return { ok: true, date, ...result };
  });

  app.post("/bot/habits/:habitId/uncomplete", async (req) => {
    const { habitId } = HabitParams.parse(req.params);
    const body = CompletionBody.parse(req.body);
    const date = body.date ?? todayLocal();
    const result = await engine.unmarkComplete(body.user_id, habitId, date);
    return { ok: true, date, ...result };
  });

  app.get("/bot/completions/:userId", async (req) => {
    const { userId } = UserParams.parse(req.params);
    const date = DateQuery.parse(req.query).date ?? todayLocal();
    return { ok: true, date, habit_ids: await engine.listCompletionsOn(userId, date) };
  });

  app.get("/bot/habits/:habitId/streak/:userId", async (req) => {
    const { habitId, userId } = StreakParams.parse(req.params);
    return { ok: true, streak: await engine.getStreak(userId, habitId) };
  });

  app.post("/bot/habits/:habitId/streak/:userId/recompute", async (req) => {
    const { habitId, userId } = StreakParams.parse(req.params);
    return { ok: true, streak: await engine.recomputeStreak(userId, habitId) };
  });
}
